import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { respond, errorHandler, formatZodError } from './handler';
import { createMockRequest, createMockResponse } from '../test/mockData';
import { ForbiddenError, NotFoundError } from './errors';

describe('Handler Utilities', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('respond', () => {
    it('should send the handler result as JSON', async () => {
      const res = createMockResponse();
      const next = vi.fn();

      await respond(async () => ({ ok: true }))(createMockRequest(), res, next);

      expect(res.status).not.toHaveBeenCalled();
      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({ ok: true });
      expect(next).not.toHaveBeenCalled();
    });

    it('should pass errors to the next middleware', async () => {
      const error = new NotFoundError('Budget not found');
      const res = createMockResponse();
      const next = vi.fn();

      await respond(async () => {
        throw error;
      })(createMockRequest(), res, next);

      expect(next).toHaveBeenCalledWith(error);
      expect(res.json).not.toHaveBeenCalled();
    });
  });

  describe('errorHandler', () => {
    it('should keep the status of API errors', () => {
      const res = createMockResponse();

      errorHandler(new ForbiddenError('Transaction does not belong to current user'), createMockRequest(), res, vi.fn());

      expect(res.statusCode).toBe(403);
      expect(res.body).toEqual({ error: 'Transaction does not belong to current user' });
    });

    it('should turn validation errors into 400', () => {
      const res = createMockResponse();
      const result = z.object({ amount: z.number().positive() }).safeParse({ amount: -1 });
      if (result.success) {
        throw new Error('expected a validation error');
      }

      errorHandler(result.error, createMockRequest(), res, vi.fn());

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: 'amount: Number must be greater than 0' });
    });

    it('should hide unexpected errors behind a 500', () => {
      const res = createMockResponse();

      errorHandler(new Error('ER_LOCK_DEADLOCK'), createMockRequest({ method: 'PUT', originalUrl: '/api/transactions/4' }), res, vi.fn());

      expect(res.statusCode).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error' });
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Unhandled error on PUT /api/transactions/4'));
    });
  });

  describe('formatZodError', () => {
    it('should join issues with their paths', () => {
      const result = z.object({ month: z.number(), year: z.number() }).safeParse({});
      if (result.success) {
        throw new Error('expected a validation error');
      }

      expect(formatZodError(result.error)).toBe('month: Required; year: Required');
    });
  });
});
