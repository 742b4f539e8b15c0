import { randomInt } from 'crypto';

export const REFERRAL_PREFIXES = {
  user: 'USR',
  company: 'COM',
  serviceProvider: 'SP',
  wholesaler: 'WS',
  salesperson: 'SPR',
} as const;

export type ReferralPrefix = (typeof REFERRAL_PREFIXES)[keyof typeof REFERRAL_PREFIXES];

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
const CODE_LENGTH = 6;

export const generateReferralCode = (prefix: ReferralPrefix) => {
  let suffix = '';
  for (let i = 0; i < CODE_LENGTH; i++) {
    suffix += ALPHABET[randomInt(ALPHABET.length)];
  }
  return `${prefix}-${suffix}`;
};

/** Draws codes until `isTaken` reports a free one. */
export const generateUniqueReferralCode = async (
  prefix: ReferralPrefix,
  isTaken: (code: string) => Promise<boolean>,
  attempts = 5,
) => {
  for (let i = 0; i < attempts; i++) {
    const code = generateReferralCode(prefix);
    if (!(await isTaken(code))) return code;
  }
  throw new Error(`Could not allocate a unique ${prefix} referral code`);
};
