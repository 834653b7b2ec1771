/**
 * Authentication Middleware
 *
 * Session-cookie check in front of the API. A no-op when no app password is
 * configured.
 */

import { Request, Response, NextFunction } from 'express';
import type { AuthService } from '@/services/auth.service';
import { SESSION_COOKIE } from '@/constants/http.constants';
import { AuthenticationError } from '@/utils/errors';

/** Session token from the cookie, if cookie-parser found one. */
export function getSessionToken(req: Request): string | undefined {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const token = cookies[SESSION_COOKIE.NAME];
  return typeof token === 'string' && token.length > 0 ? token : undefined;
}

export function createAuthMiddleware(authService: AuthService) {
  return function authMiddleware(
    req: Request,
    _res: Response,
    next: NextFunction
  ): void {
    authService
      .isAuthenticated(getSessionToken(req))
      .then((authenticated) => {
        if (!authenticated) {
          return next(new AuthenticationError('Not authenticated'));
        }
        next();
      })
      .catch(next);
  };
}
