/**
 * Request ID Middleware
 *
 * Reuses a client-supplied X-Request-ID when it is short and plain, otherwise
 * assigns a fresh UUID. The id is echoed back and attached to logs.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

function acceptedRequestId(header: string | string[] | undefined): string | undefined {
  const incoming = typeof header === 'string' ? header.trim() : '';
  if (!incoming || incoming.length > MAX_REQUEST_ID_LENGTH || !REQUEST_ID_PATTERN.test(incoming)) {
    return undefined;
  }
  return incoming;
}

export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = acceptedRequestId(req.headers['x-request-id']) ?? uuidv4();
  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
}
