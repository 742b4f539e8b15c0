import { Types } from 'mongoose';
import ManagerModel from '../models/manager.model';
import SalesManagerModel from '../models/salesManager.model';
import { EntityKind, isEntityKind } from '../models/businessEntity';
import { getSuperAdminEmail } from '../config/env';
import { queryTimeout } from '../utils/db';
import { logger } from '../utils/logger';
import { TokenClaims } from '../utils/token';

/** Roles an admin can grant to managers and sales managers. */
export const ASSIGNABLE_ACCESS_ROLES = [
  'business_management',
  'user_management',
  'financial_dashboard_revenue',
  'referral_program_monitoring',
] as const;

export const CAPABILITIES = [
  'subscription_approval',
  ...ASSIGNABLE_ACCESS_ROLES,
  'sales_operations',
  'entity_self_service',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

interface PrincipalBase {
  userId: string;
  email: string;
  hasCapability(capability: Capability): boolean;
}

export type Principal =
  | (PrincipalBase & { kind: 'super_admin' })
  | (PrincipalBase & { kind: 'admin' })
  | (PrincipalBase & { kind: 'manager'; rolesAccess: string[] })
  | (PrincipalBase & { kind: 'sales_manager'; rolesAccess: string[] })
  | (PrincipalBase & { kind: 'salesperson' })
  | (PrincipalBase & { kind: 'entity'; entityKind: EntityKind; owns(entityUserId: Types.ObjectId | string): boolean })
  | (PrincipalBase & { kind: 'unknown' });

export type PrincipalKind = Principal['kind'];
export type EntityPrincipal = Extract<Principal, { kind: 'entity' }>;

const everything = () => true;
const nothing = () => false;
const only =
  (...allowed: Capability[]) =>
  (capability: Capability) =>
    allowed.includes(capability);

const unknownPrincipal = (claims: TokenClaims): Principal => ({
  kind: 'unknown',
  userId: claims.userId,
  email: claims.email,
  hasCapability: nothing,
});

const loadRolesAccess = async (kind: 'manager' | 'sales_manager', userId: string) => {
  if (!Types.ObjectId.isValid(userId)) return null;

  const record =
    kind === 'manager'
      ? await ManagerModel.findById(userId).select('rolesAccess').maxTimeMS(queryTimeout()).lean()
      : await SalesManagerModel.findById(userId).select('rolesAccess').maxTimeMS(queryTimeout()).lean();

  return record ? record.rolesAccess : null;
};

/**
 * Turns verified token claims into the caller's principal. Staff roles are
 * read from their stored record; a record that no longer exists resolves to
 * `unknown`, which holds no capability.
 */
export const resolvePrincipal = async (claims: TokenClaims): Promise<Principal> => {
  const { userId, email } = claims;

  switch (claims.userType) {
    case 'super_admin': {
      const superAdminEmail = getSuperAdminEmail();
      if (!superAdminEmail || email.toLowerCase() !== superAdminEmail) {
        logger.warn('Super admin claim does not match configured email', { email });
        return unknownPrincipal(claims);
      }
      return { kind: 'super_admin', userId, email, hasCapability: everything };
    }

    case 'admin':
      return { kind: 'admin', userId, email, hasCapability: everything };

    case 'manager':
    case 'sales_manager':
    case 'salesManager': {
      const kind = claims.userType === 'manager' ? 'manager' : 'sales_manager';
      const rolesAccess = await loadRolesAccess(kind, userId);
      if (!rolesAccess) {
        logger.warn('Staff record not found for token', { userId, kind });
        return unknownPrincipal(claims);
      }
      const roles = new Set(rolesAccess);
      return { kind, userId, email, rolesAccess, hasCapability: (capability) => roles.has(capability) };
    }

    case 'salesperson':
      return { kind: 'salesperson', userId, email, hasCapability: only('sales_operations') };

    default: {
      const entityKind = claims.userType;
      if (!isEntityKind(entityKind)) return unknownPrincipal(claims);
      return {
        kind: 'entity',
        entityKind,
        userId,
        email,
        hasCapability: only('entity_self_service'),
        owns: (entityUserId) => String(entityUserId) === userId,
      };
    }
  }
};

export const authorize = async (claims: TokenClaims, capability: Capability) => {
  const principal = await resolvePrincipal(claims);
  return principal.hasCapability(capability);
};
