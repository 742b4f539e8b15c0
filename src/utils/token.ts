import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { getJwtSettings } from '../config/env';

export const USER_TYPES = [
  'super_admin',
  'admin',
  'manager',
  'sales_manager',
  'salesManager',
  'salesperson',
  'user',
  'company',
  'wholesaler',
  'serviceProvider',
] as const;
export type ClaimUserType = (typeof USER_TYPES)[number];

const claimsSchema = z.object({
  userId: z.string().min(1),
  email: z.string(),
  userType: z.enum(USER_TYPES),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

export const generateTokens = (claims: TokenClaims) => {
  const { accessSecret, refreshSecret, accessTtl, refreshTtl } = getJwtSettings();
  const accessToken = jwt.sign(claims, accessSecret, { expiresIn: accessTtl });
  const refreshToken = jwt.sign({ userId: claims.userId }, refreshSecret, { expiresIn: refreshTtl });
  return { accessToken, refreshToken };
};

/** Throws the jsonwebtoken error (or a zod error) when the token is invalid. */
export const verifyAccessToken = (token: string): TokenClaims => {
  const decoded = jwt.verify(token, getJwtSettings().accessSecret);
  return claimsSchema.parse(decoded);
};
