/**
 * Tests for authentication middleware
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { createAuthMiddleware, getSessionToken } from '../../middleware/auth';
import { AuthService } from '../../services/auth.service';
import { MemorySessionStore } from '../../services/session-store.service';
import { AuthenticationError } from '../../utils/errors';

const TTL_MS = 60 * 60 * 1000;

describe('getSessionToken', () => {
  it('reads the session cookie', () => {
    const req = { cookies: { session_token: 'abc' } } as unknown as Request;
    expect(getSessionToken(req)).toBe('abc');
  });

  it('ignores missing or empty cookies', () => {
    expect(getSessionToken({} as Request)).toBeUndefined();
    expect(getSessionToken({ cookies: { session_token: '' } } as unknown as Request)).toBeUndefined();
  });
});

describe('authMiddleware', () => {
  let sessions: MemorySessionStore;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    sessions = new MemorySessionStore();
    mockResponse = {};
    mockNext = vi.fn();
  });

  it('lets every request through when no password is configured', async () => {
    const middleware = createAuthMiddleware(new AuthService(sessions, { sessionTtlMs: TTL_MS }));

    middleware({ cookies: {} } as unknown as Request, mockResponse as Response, mockNext);

    await vi.waitFor(() => expect(mockNext).toHaveBeenCalledWith());
  });

  it('rejects a request without a session cookie', async () => {
    const middleware = createAuthMiddleware(
      new AuthService(sessions, { password: 'test-secret', sessionTtlMs: TTL_MS })
    );

    middleware({ cookies: {} } as unknown as Request, mockResponse as Response, mockNext);

    await vi.waitFor(() => expect(mockNext).toHaveBeenCalledTimes(1));
    const error = vi.mocked(mockNext).mock.calls[0][0];
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ statusCode: 401, message: 'Not authenticated' });
  });

  it('rejects an unknown session token', async () => {
    const middleware = createAuthMiddleware(
      new AuthService(sessions, { password: 'test-secret', sessionTtlMs: TTL_MS })
    );

    middleware({ cookies: { session_token: 'forged' } } as unknown as Request, mockResponse as Response, mockNext);

    await vi.waitFor(() => expect(mockNext).toHaveBeenCalledTimes(1));
    expect(vi.mocked(mockNext).mock.calls[0][0]).toBeInstanceOf(AuthenticationError);
  });

  it('accepts a live session', async () => {
    const session = await sessions.create(TTL_MS);
    const middleware = createAuthMiddleware(
      new AuthService(sessions, { password: 'test-secret', sessionTtlMs: TTL_MS })
    );

    middleware({ cookies: { session_token: session.token } } as unknown as Request, mockResponse as Response, mockNext);

    await vi.waitFor(() => expect(mockNext).toHaveBeenCalledWith());
  });

  it('forwards session store failures', async () => {
    const failure = new Error('session store down');
    vi.spyOn(sessions, 'validate').mockRejectedValue(failure);
    const middleware = createAuthMiddleware(
      new AuthService(sessions, { password: 'test-secret', sessionTtlMs: TTL_MS })
    );

    middleware({ cookies: { session_token: 'abc' } } as unknown as Request, mockResponse as Response, mockNext);

    await vi.waitFor(() => expect(mockNext).toHaveBeenCalledWith(failure));
  });
});
