import { describe, expect, it, vi } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { requestIdMiddleware } from '@/middleware/requestId';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function run(headers: Record<string, string>) {
  const req = { headers } as unknown as Request;
  const res = { setHeader: vi.fn() } as unknown as Response;
  const next = vi.fn() as NextFunction;
  requestIdMiddleware(req, res, next);
  return { req, res, next };
}

describe('requestIdMiddleware', () => {
  it('generates a uuid when header is missing', () => {
    const { req, res, next } = run({});

    expect(req.requestId).toMatch(UUID_PATTERN);
    expect(res.setHeader).toHaveBeenCalledWith('X-Request-ID', req.requestId);
    expect(next).toHaveBeenCalledOnce();
  });

  it('reuses incoming x-request-id when present', () => {
    const { req, res } = run({ 'x-request-id': ' incoming-request-id ' });

    expect(req.requestId).toBe('incoming-request-id');
    expect(res.setHeader).toHaveBeenCalledWith('X-Request-ID', 'incoming-request-id');
  });

  it('replaces ids that are too long', () => {
    const { req } = run({ 'x-request-id': 'a'.repeat(129) });

    expect(req.requestId).toMatch(UUID_PATTERN);
  });

  it('replaces ids with characters unsafe for log lines', () => {
    const { req } = run({ 'x-request-id': 'abc\ninjected' });

    expect(req.requestId).toMatch(UUID_PATTERN);
  });
});
