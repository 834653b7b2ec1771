/**
 * Auth Routes
 *
 * Login, logout and session status. No auth middleware; no CSRF on these routes.
 * The session token is set in an httpOnly cookie.
 */

import { Router, Request, Response } from 'express';
import type { AppConfig } from '@/config/env';
import type { AuthService } from '@/services/auth.service';
import { asyncHandler } from '@/middleware/errorHandler';
import { validateRequest } from '@/middleware/validation';
import { getSessionToken } from '@/middleware/auth';
import { LoginSchema, type LoginInput } from '@/schemas/auth.schemas';
import { SESSION_COOKIE } from '@/constants/http.constants';
import { AuthenticationError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface AuthRouterDeps {
  authService: AuthService;
  config: Pick<AppConfig, 'NODE_ENV'>;
}

/** Use Secure cookie when over HTTPS (direct or via proxy with X-Forwarded-Proto). */
function isSecureRequest(req: Request): boolean {
  return req.secure || req.get('x-forwarded-proto') === 'https';
}

export function createAuthRouter({ authService, config }: AuthRouterDeps): Router {
  const router = Router();

  const cookieOptions = (req: Request) => ({
    httpOnly: true,
    secure: config.NODE_ENV === 'production' || isSecureRequest(req),
    sameSite: SESSION_COOKIE.SAME_SITE,
    path: SESSION_COOKIE.PATH,
  });

  function setSessionCookie(req: Request, res: Response, token: string): void {
    res.cookie(SESSION_COOKIE.NAME, token, {
      ...cookieOptions(req),
      maxAge: authService.sessionTtlMs,
    });
  }

  /**
   * POST /api/auth/login
   * Exchange the app password for a session cookie
   */
  router.post(
    '/login',
    validateRequest(LoginSchema),
    asyncHandler(async (req, res) => {
      if (!authService.enabled) {
        return res.json({ success: true, data: { authEnabled: false, authenticated: true } });
      }

      const { password }: LoginInput = req.body;
      const session = await authService.login(password);
      if (!session) {
        logger.warn('Failed login attempt', { requestId: req.requestId, ip: req.ip });
        throw new AuthenticationError('Invalid password');
      }

      setSessionCookie(req, res, session.token);
      logger.info('Login succeeded', { requestId: req.requestId });
      return res.json({
        success: true,
        data: { authEnabled: true, authenticated: true, expiresAt: session.expiresAt.toISOString() },
      });
    })
  );

  /**
   * POST /api/auth/logout
   * Expire the current session and clear the cookie
   */
  router.post(
    '/logout',
    asyncHandler(async (req, res) => {
      await authService.logout(getSessionToken(req));
      res.clearCookie(SESSION_COOKIE.NAME, cookieOptions(req));
      return res.json({ success: true, data: { authenticated: false } });
    })
  );

  /**
   * GET /api/auth/session
   * Whether auth is on and whether this browser holds a live session
   */
  router.get(
    '/session',
    asyncHandler(async (req, res) => {
      const authenticated = await authService.isAuthenticated(getSessionToken(req));
      return res.json({
        success: true,
        data: { authEnabled: authService.enabled, authenticated },
      });
    })
  );

  return router;
}
