export interface OtpEntry {
  code: string;
  expiresAt: number;
}

export type OtpCheck = 'ok' | 'missing' | 'expired' | 'invalid';

export const OTP_TTL_MS = 10 * 60 * 1000;

/**
 * In-memory one-time codes keyed by email. Expired entries are swept on an
 * unref'd timer; call `dispose()` on shutdown.
 */
export class OtpCache {
  private readonly entries = new Map<string, OtpEntry>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    private readonly ttlMs: number = OTP_TTL_MS,
    sweepIntervalMs: number | null = 60_000,
  ) {
    if (sweepIntervalMs !== null) {
      this.sweeper = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweeper.unref();
    }
  }

  set(key: string, code: string, now = Date.now()): OtpEntry {
    const entry = { code, expiresAt: now + this.ttlMs };
    this.entries.set(key, entry);
    return entry;
  }

  get(key: string): OtpEntry | undefined {
    return this.entries.get(key);
  }

  /** Checks `code` and removes the entry when it matches or has expired. */
  consume(key: string, code: string, now = Date.now()): OtpCheck {
    const entry = this.entries.get(key);
    if (!entry) return 'missing';
    if (now > entry.expiresAt) {
      this.entries.delete(key);
      return 'expired';
    }
    if (entry.code !== code) return 'invalid';
    this.entries.delete(key);
    return 'ok';
  }

  clear(key: string) {
    this.entries.delete(key);
  }

  sweep(now = Date.now()) {
    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) this.entries.delete(key);
    }
  }

  get size() {
    return this.entries.size;
  }

  dispose() {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = null;
    this.entries.clear();
  }
}

export const otpCache = new OtpCache();
