import { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { ApiError } from './errors';
import { err } from '../log';

/**
 * Wraps an API function as an Express handler that answers with its JSON result
 * and hands any thrown error to the error middleware
 * @param handler - API function taking the request
 */
export function respond<T>(handler: (request: Request) => Promise<T>): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await handler(req));
    } catch (error) {
      next(error);
    }
  };
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Error middleware: ApiErrors keep their status, validation errors become 400
 * and anything else is logged and answered with 500
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof ApiError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({ error: formatZodError(error) });
    return;
  }
  err('Unhandled error on', req.method, req.originalUrl, error);
  res.status(500).json({ error: 'Internal server error' });
}
