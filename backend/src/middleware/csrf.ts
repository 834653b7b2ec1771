/**
 * CSRF Protection Middleware
 *
 * The session lives in a SameSite=Lax cookie. State-changing requests must
 * additionally come from an allowed Origin (or Referer), or carry the
 * X-Requested-With header, which browsers do not let cross-origin pages set
 * without a CORS preflight.
 */

import { Request, Response, NextFunction } from 'express';

const SAFE_METHODS = ['GET', 'HEAD', 'OPTIONS'];

export function createCsrfProtection(allowedOrigins: string[]) {
  return function csrfProtection(
    req: Request,
    res: Response,
    next: NextFunction
  ): void {
    if (SAFE_METHODS.includes(req.method)) {
      return next();
    }

    const origin = req.headers.origin;
    const referer = req.headers.referer;

    if (origin) {
      if (!allowedOrigins.includes(origin)) {
        res.status(403).json({
          success: false,
          error: 'CSRF validation failed: Invalid origin',
          code: 'PERMISSION_DENIED',
          requestId: req.requestId,
        });
        return;
      }
    } else if (referer) {
      let refererOrigin: string | null = null;
      try {
        refererOrigin = new URL(referer).origin;
      } catch {
        refererOrigin = null;
      }
      if (!refererOrigin || !allowedOrigins.includes(refererOrigin)) {
        res.status(403).json({
          success: false,
          error: refererOrigin ? 'CSRF validation failed: Invalid referer' : 'CSRF validation failed: Malformed referer URL',
          code: 'PERMISSION_DENIED',
          requestId: req.requestId,
        });
        return;
      }
    } else if (!req.headers['x-requested-with']) {
      res.status(403).json({
        success: false,
        error: 'CSRF validation failed: Missing required header',
        code: 'PERMISSION_DENIED',
        requestId: req.requestId,
        hint: 'Include X-Requested-With header in requests',
      });
      return;
    }

    next();
  };
}
