/**
 * Tests for validation middleware
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { validateRequest, parseQuery, parseParams } from '../../middleware/validation';
import { ValidationError } from '../../utils/errors';
import { CardIdParamSchema, ListCardsQuerySchema } from '../../schemas/card.schemas';

describe('validateRequest', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    mockRequest = {
      body: {},
    };
    mockResponse = {
      status: vi.fn().mockReturnThis(),
      json: vi.fn().mockReturnThis(),
    };
    mockNext = vi.fn();
  });

  it('should validate and pass valid request body', () => {
    const schema = z.object({
      vietnamese: z.string(),
      difficulty_level: z.number(),
    });

    mockRequest.body = { vietnamese: 'xin chào', difficulty_level: 2 };

    const middleware = validateRequest(schema);
    middleware(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.body).toEqual({ vietnamese: 'xin chào', difficulty_level: 2 });
    expect(mockNext).toHaveBeenCalledWith();
    expect(mockResponse.status).not.toHaveBeenCalled();
  });

  it('should replace the body with parsed defaults', () => {
    const schema = z.object({ record: z.boolean().optional().default(false) });

    validateRequest(schema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.body).toEqual({ record: false });
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('should treat a missing body as an empty object', () => {
    const schema = z.object({ category: z.string().optional() });
    mockRequest.body = undefined;

    validateRequest(schema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.body).toEqual({});
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('should pass a ValidationError with details to next', () => {
    const schema = z.object({ userInput: z.string() });
    mockRequest.body = { userInput: 42 };

    validateRequest(schema)(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockNext).toHaveBeenCalledTimes(1);
    const error = vi.mocked(mockNext).mock.calls[0][0];
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      statusCode: 400,
      message: 'Validation failed',
      details: [{ path: 'userInput', message: expect.any(String) }],
    });
    expect(mockResponse.status).not.toHaveBeenCalled();
  });
});

describe('parseQuery', () => {
  it('should convert numeric query strings', () => {
    const req = { query: { category: 'time', skip: '10', limit: '5' } } as unknown as Request;

    expect(parseQuery(ListCardsQuerySchema, req)).toEqual({ category: 'time', skip: 10, limit: 5 });
  });

  it('should reject a limit above the maximum', () => {
    const req = { query: { limit: '501' } } as unknown as Request;

    expect(() => parseQuery(ListCardsQuerySchema, req)).toThrow(ValidationError);
    expect(() => parseQuery(ListCardsQuerySchema, req)).toThrow('Invalid query parameters');
  });
});

describe('parseParams', () => {
  it('should convert the card id to a number', () => {
    const req = { params: { id: '42' } } as unknown as Request;

    expect(parseParams(CardIdParamSchema, req)).toEqual({ id: 42 });
  });

  it('should reject a non-numeric card id', () => {
    const req = { params: { id: 'abc' } } as unknown as Request;

    try {
      parseParams(CardIdParamSchema, req);
      expect.unreachable('parseParams should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: 'Invalid route parameters',
        details: [{ path: 'id', message: 'Invalid card ID format' }],
      });
    }
  });
});
