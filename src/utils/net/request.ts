import { Request } from 'express';
import { z } from 'zod';
import type { AccountType } from '../../data/transaction/types';
import { BadRequestError, UnauthorizedError } from './errors';

export type TransactionFilters = {
  budgetId?: number;
  accountType?: AccountType;
  month?: number;
  year?: number;
};

const transactionFiltersSchema = z.object({
  budgetId: z.coerce.number().int().positive().optional(),
  accountType: z.enum(['checking', 'savings']).optional(),
  month: z.coerce.number().int().min(1).max(12).optional(),
  year: z.coerce.number().int().min(1900).max(9999).optional(),
});

/**
 * Returns the id of the authenticated user set by the token middleware
 * @param request - Express request object
 * @throws UnauthorizedError if the request did not pass the token middleware
 */
export function getUserId(request: Request): number {
  if (request.userId === undefined) {
    throw new UnauthorizedError();
  }
  return request.userId;
}

/**
 * Parses a positive integer route parameter
 * @param request - Express request object
 * @param name - Route parameter name, e.g. "budgetId"
 * @throws BadRequestError if the parameter is missing or not a positive integer
 */
export function getIdParam(request: Request, name: string): number {
  const raw = request.params[name];
  const id = Number(raw);
  if (!raw || !Number.isInteger(id) || id <= 0) {
    throw new BadRequestError(`Invalid ${name}`);
  }
  return id;
}

/**
 * Validates the request body against a schema
 *
 * A string body is parsed as JSON first; a string that is not JSON is validated as is.
 * @param request - Express request object
 * @param schema - zod schema describing the expected body
 * @returns The parsed body
 * @throws ZodError if the body does not match
 */
export function getBody<T>(request: Request, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let data: unknown = request.body;
  if (typeof data === 'string') {
    try {
      data = JSON.parse(data);
    } catch (_) {
      // Pass the raw value if it's not JSON
    }
  }
  return schema.parse(data ?? {});
}

/**
 * Extracts transaction list filters from query parameters
 * @param request - Express request object with optional budgetId, accountType, month and year
 * @throws BadRequestError if only one of month and year is given
 */
export function getTransactionFilters(request: Request): TransactionFilters {
  const filters = transactionFiltersSchema.parse(request.query ?? {});
  if ((filters.month === undefined) !== (filters.year === undefined)) {
    throw new BadRequestError('month and year must be given together');
  }
  return filters;
}
