/**
 * Application error types
 *
 * Every error the request layer can expect carries an HTTP status and a
 * stable machine-readable code; anything else is treated as internal.
 */

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNAUTHENTICATED'
  | 'NOT_FOUND'
  | 'INTERNAL';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly isOperational = true,
    public readonly code: ErrorCode = statusCode >= 500 ? 'INTERNAL' : 'INVALID_ARGUMENT'
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public readonly details: ValidationIssue[] = []) {
    super(400, message, true, 'INVALID_ARGUMENT');
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, message, true, 'UNAUTHENTICATED');
  }
}

export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super(404, `${resource} not found`, true, 'NOT_FOUND');
  }
}
