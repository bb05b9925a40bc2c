import { Request } from 'express';
import { z } from 'zod';
import type { Repository } from '../../utils/io/types';
import type { Budget } from '../../data/budget/types';
import type { VarianceReport } from '../../data/report/types';
import { getBody, getIdParam, getUserId } from '../../utils/net/request';
import { BadRequestError, NotFoundError } from '../../utils/net/errors';
import { getBudgetName, getCurrentMonth } from '../../utils/date/date';
import { buildVarianceReport } from '../../data/report/variance';
import { getCategoryNames, getOwnedBudget } from '../access';

const budgetSchema = z.object({
  month: z.number().int().min(1).max(12),
  year: z.number().int().min(1900).max(9999),
});

/**
 * Creates the budget for a month. The name is generated, e.g. "March 2025".
 * @throws BadRequestError if the user already has an active budget for that month
 */
export async function addBudget(request: Request, repository: Repository): Promise<Budget> {
  const userId = getUserId(request);
  const { month, year } = getBody(request, budgetSchema);

  const existing = await repository.findActiveBudgetForMonth(userId, month, year);
  if (existing) {
    throw new BadRequestError(`A budget for ${month}/${year} already exists`);
  }

  return repository.createBudget({ userId, month, year, name: getBudgetName(month, year) });
}

/**
 * Lists the user's budgets, newest month first
 */
export async function getBudgets(request: Request, repository: Repository): Promise<Budget[]> {
  return repository.listBudgets(getUserId(request));
}

/**
 * Returns this month's budget, or the most recent one when this month has none
 * @param now - Current time, used to pick the month (UTC)
 * @throws NotFoundError if the user has no budgets
 */
export async function getCurrentBudget(
  request: Request,
  repository: Repository,
  now: Date = new Date(),
): Promise<Budget> {
  const userId = getUserId(request);
  const { month, year } = getCurrentMonth(now);

  const current = await repository.findActiveBudgetForMonth(userId, month, year);
  if (current) {
    return current;
  }

  const [latest] = await repository.listBudgets(userId);
  if (!latest) {
    throw new NotFoundError('No budgets found');
  }
  return latest;
}

export async function getBudget(request: Request, repository: Repository): Promise<Budget> {
  return getOwnedBudget(repository, getUserId(request), getIdParam(request, 'budgetId'));
}

/**
 * Budgeted against actual for every item of the budget
 */
export async function getBudgetVariance(request: Request, repository: Repository): Promise<VarianceReport> {
  const userId = getUserId(request);
  const budget = await getOwnedBudget(repository, userId, getIdParam(request, 'budgetId'));
  const items = await repository.listBudgetItems(budget.id);
  const transactions = await repository.listTransactions(userId, { accountType: 'checking' });
  const categoryNames = await getCategoryNames(
    repository,
    items.map((item) => item.categoryId),
  );
  return buildVarianceReport(budget, items, categoryNames, transactions);
}
