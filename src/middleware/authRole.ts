import '../types/express';
import { Request, Response, NextFunction } from 'express';
import createError from 'http-errors';
import { Capability, EntityPrincipal, Principal, resolvePrincipal } from '../services/access.service';
import { ClaimUserType } from '../utils/token';
import { logger } from '../utils/logger';

/** Gate on the token's user type alone; `sales_manager` and `salesManager` are interchangeable. */
export const requireUserType = (types: ClaimUserType[]) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const user = req.user;
    if (!user) return next(createError(401, 'Unauthorized'));

    const allowed =
      types.includes(user.userType) ||
      (user.userType === 'salesManager' && types.includes('sales_manager')) ||
      (user.userType === 'sales_manager' && types.includes('salesManager'));

    if (!allowed) return next(createError(403, 'Access denied for your user type'));
    next();
  };
};

/** Resolves the caller once and checks it holds `capability`. */
export const requireCapability = (capability: Capability) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const claims = req.user;
    if (!claims) return next(createError(401, 'Unauthorized'));

    const resolve = req.principal ? Promise.resolve(req.principal) : resolvePrincipal(claims);

    resolve
      .then((principal) => {
        req.principal = principal;
        if (!principal.hasCapability(capability)) {
          logger.warn('Capability check failed', { userId: claims.userId, userType: claims.userType, capability });
          return next(createError(403, 'Access denied: insufficient permissions'));
        }
        next();
      })
      .catch(next);
  };
};

/** Principal cached by `requireCapability`. */
export const currentPrincipal = (req: Request): Principal => {
  if (!req.principal) throw createError(401, 'Unauthorized');
  return req.principal;
};

export const currentEntityOwner = (req: Request): EntityPrincipal => {
  const principal = currentPrincipal(req);
  if (principal.kind !== 'entity') throw createError(403, 'Only business accounts can do this');
  return principal;
};

export const currentClaims = (req: Request) => {
  if (!req.user) throw createError(401, 'Unauthorized');
  return req.user;
};
