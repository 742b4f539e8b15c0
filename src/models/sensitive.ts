import { Schema } from 'mongoose';

export const SENSITIVE_FIELDS = ['password', 'otp', 'otpExpiresAt', 'refreshToken', 'resetToken'] as const;

/** Projection string that drops every sensitive field. */
export const HIDDEN_FIELDS = SENSITIVE_FIELDS.map((f) => `-${f}`).join(' ');

export const stripSensitive = (doc: Record<string, unknown>) => {
  const copy = { ...doc };
  for (const field of SENSITIVE_FIELDS) delete copy[field];
  return copy;
};

/** Strips sensitive fields whenever a document is serialised. */
export const hideSensitiveFields = (schema: Schema) => {
  schema.set('toJSON', {
    versionKey: false,
    transform: (_doc, ret: Record<string, unknown>) => stripSensitive(ret),
  });
};
