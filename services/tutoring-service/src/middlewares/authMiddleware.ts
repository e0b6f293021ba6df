import { Request, Response, NextFunction } from 'express';
import { AppError } from '@tutoriapp/shared/config/errorHandler';
import { logAuthEvent } from '@tutoriapp/shared/config/logger';
import { verifyAccessToken } from '@tutoriapp/shared/utils/tokenManager';
import { USER_ROLES, type UserRole } from '../models/user.model';

export interface AuthUser {
  id: number;
  role: UserRole;
  email: string;
}

declare global {
  namespace Express {
    interface Request {
      authUser?: AuthUser;
    }
  }
}

function toUserRole(role: string): UserRole | undefined {
  return USER_ROLES.find((candidate) => candidate === role);
}

/**
 * Resolve the caller from an Authorization header value.
 *
 * @throws AppError (401) when the header is missing, malformed or carries an invalid token
 */
export function authenticate(header: string | undefined, secret: string): AuthUser {
  if (!header || !header.startsWith('Bearer ')) {
    throw new AppError('Authentication required', 401);
  }

  const token = header.substring('Bearer '.length).trim();
  if (!token) {
    throw new AppError('Access token missing', 401);
  }

  const payload = verifyAccessToken(token, secret);
  const role = toUserRole(payload.role);
  if (!role) {
    throw new AppError('Invalid token payload', 401);
  }
  return { id: payload.sub, role, email: payload.email };
}

/**
 * @throws AppError (401) without a caller, (403) when the caller has none of the roles
 */
export function authorize(user: AuthUser | undefined, roles: UserRole[]): AuthUser {
  if (!user) {
    throw new AppError('Authentication required', 401);
  }
  if (!roles.includes(user.role)) {
    throw new AppError(`${roles.join(' or ')} privileges required`, 403);
  }
  return user;
}

export function createAuthMiddleware(secret: string) {
  /**
   * Bearer token check; attaches req.authUser
   */
  const requireAuth = (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.authUser = authenticate(req.headers.authorization, secret);
    } catch (error) {
      logAuthEvent('token_verify', undefined, false, {
        error: error instanceof Error ? error.message : String(error),
      });
      return next(error instanceof AppError ? error : new AppError('Invalid or expired token', 401));
    }
    next();
  };

  /**
   * Use after requireAuth
   */
  const requireRole =
    (...roles: UserRole[]) =>
    (req: Request, _res: Response, next: NextFunction) => {
      try {
        authorize(req.authUser, roles);
      } catch (error) {
        return next(error);
      }
      next();
    };

  return { requireAuth, requireRole };
}

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
