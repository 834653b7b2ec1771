/**
 * Error Handling Middleware
 *
 * Centralized error handling with proper error messages
 */

import { Request, Response, NextFunction } from 'express';
import type { AppConfig } from '@/config/env';
import { AppError, ValidationError } from '@/utils/errors';
import { logger, serializeError } from '@/utils/logger';

/** Errors raised by body-parser (malformed JSON, body too large) carry a status. */
function httpStatusOf(err: Error): number | undefined {
  if (!('status' in err) || typeof err.status !== 'number') {
    return undefined;
  }
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

export function createErrorHandler(config: Pick<AppConfig, 'NODE_ENV'>) {
  const isDevelopment = config.NODE_ENV === 'development';

  return function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
  ): Response {
    if (err instanceof AppError) {
      if (err.isOperational && err.statusCode < 500) {
        logger.warn('Request rejected', {
          code: err.code,
          message: err.message,
          path: req.path,
          method: req.method,
          requestId: req.requestId,
        });
      } else {
        logger.error('Request failed', {
          error: serializeError(err),
          path: req.path,
          method: req.method,
          requestId: req.requestId,
        });
      }

      return res.status(err.statusCode).json({
        success: false,
        error: err.message,
        code: err.code,
        requestId: req.requestId,
        ...(err instanceof ValidationError && err.details.length > 0 && { details: err.details }),
        ...(isDevelopment && {
          stack: err.stack,
          path: req.path,
        }),
      });
    }

    const status = httpStatusOf(err);
    if (status !== undefined) {
      logger.warn('Malformed request', { message: err.message, path: req.path, requestId: req.requestId });
      return res.status(status).json({
        success: false,
        error: status === 413 ? 'Request body too large' : 'Malformed request body',
        code: 'INVALID_ARGUMENT',
        requestId: req.requestId,
      });
    }

    // Unexpected errors, including lost database connections
    logger.error('Unhandled request error', {
      error: serializeError(err),
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    });

    return res.status(500).json({
      success: false,
      error: isDevelopment ? err.message : 'An internal error occurred',
      code: 'INTERNAL',
      requestId: req.requestId,
      ...(isDevelopment && {
        stack: err.stack,
        path: req.path,
      }),
    });
  };
}

/**
 * Async error wrapper
 * Catches async errors and passes them to error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
