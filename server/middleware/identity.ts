import type { Request, Response, NextFunction } from 'express';
import type { AccountRole, Identity } from '@shared/schema';
import { ForbiddenError, UnauthorizedError } from '../errors';
import type { IdentityDirectory } from '../storage/interfaces';

declare global {
  namespace Express {
    interface Request {
      identity?: Identity;
    }
  }
}

declare module 'express-session' {
  interface SessionData {
    accountId: string;
  }
}

/** Works out who is calling. Login itself lives outside this service. */
export type IdentityResolver = (req: Request) => Promise<Identity | undefined>;

export function sessionIdentityResolver(directory: IdentityDirectory): IdentityResolver {
  return async (req) => {
    const accountId = req.session?.accountId;
    return accountId ? directory.getIdentity(accountId) : undefined;
  };
}

export function requireIdentity(resolve: IdentityResolver) {
  return (req: Request, _res: Response, next: NextFunction) => {
    resolve(req)
      .then((identity) => {
        if (!identity) {
          next(new UnauthorizedError());
          return;
        }
        req.identity = identity;
        next();
      })
      .catch(next);
  };
}

export function requireRole(...allowedRoles: AccountRole[]) {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.identity) {
      next(new UnauthorizedError());
      return;
    }
    if (!allowedRoles.includes(req.identity.role)) {
      next(new ForbiddenError(`Requires role ${allowedRoles.join(' or ')}`));
      return;
    }
    next();
  };
}

export function currentIdentity(req: Request): Identity {
  if (!req.identity) {
    throw new UnauthorizedError();
  }
  return req.identity;
}
