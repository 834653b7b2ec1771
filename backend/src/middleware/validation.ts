/**
 * Request Validation
 *
 * Bodies are validated by middleware and replaced with the parsed value.
 * Express 5 makes req.query read-only, so query strings and route params are
 * parsed inside the handler with parseQuery / parseParams instead.
 */

import { Request, Response, NextFunction } from 'express';
import { z, type ZodType } from 'zod';
import { ValidationError, type ValidationIssue } from '@/utils/errors';

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function parseWith<T>(schema: ZodType<T>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, toIssues(result.error));
  }
  return result.data;
}

/**
 * Validate request body against Zod schema
 */
export function validateRequest(schema: ZodType) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      req.body = parseWith(schema, req.body ?? {}, 'Validation failed');
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function parseQuery<T>(schema: ZodType<T>, req: Request): T {
  return parseWith(schema, req.query, 'Invalid query parameters');
}

export function parseParams<T>(schema: ZodType<T>, req: Request): T {
  return parseWith(schema, req.params, 'Invalid route parameters');
}
