import { Request } from 'express';
import type { Repository } from '../../utils/io/types';
import type { BudgetSummary } from '../../data/report/types';
import { getIdParam, getUserId } from '../../utils/net/request';
import { buildBudgetSummary } from '../../data/report/summary';
import { getCategoryNames, getOwnedBudget } from '../access';

/**
 * Spending per account and category for one budget
 * @throws NotFoundError if the budget is not the user's
 */
export async function getBudgetSummary(request: Request, repository: Repository): Promise<BudgetSummary> {
  const userId = getUserId(request);
  const budget = await getOwnedBudget(repository, userId, getIdParam(request, 'budgetId'));

  const items = await repository.listBudgetItems(budget.id);
  const transactions = await repository.listTransactions(userId, { accountType: 'checking' });
  const categoryNames = await getCategoryNames(
    repository,
    items.map((item) => item.categoryId),
  );

  return buildBudgetSummary(items, categoryNames, transactions);
}
