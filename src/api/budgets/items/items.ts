import { Request } from 'express';
import { z } from 'zod';
import type { Repository } from '../../../utils/io/types';
import type { BudgetItem } from '../../../data/budget/types';
import { getBody, getIdParam, getUserId } from '../../../utils/net/request';
import { BadRequestError } from '../../../utils/net/errors';
import { getBudgetItemOfBudget, getOwnedBudget, getOwnedCategory } from '../../access';

const categoryTypeSchema = z.enum(['income', 'expense', 'savings']);

const budgetItemSchema = z.object({
  categoryId: z.number().int().positive(),
  categoryType: categoryTypeSchema.default('expense'),
  amount: z.number().finite().nonnegative(),
});

const budgetItemChangesSchema = z.object({
  categoryId: z.number().int().positive().optional(),
  categoryType: categoryTypeSchema.optional(),
  amount: z.number().finite().nonnegative().optional(),
});

/**
 * Adds a category allocation to a budget. If the budget already has an active
 * item for the same category and type, that item's amount is replaced instead.
 * @throws NotFoundError if the budget or the category is not the user's
 */
export async function addBudgetItem(request: Request, repository: Repository): Promise<BudgetItem> {
  const userId = getUserId(request);
  const budget = await getOwnedBudget(repository, userId, getIdParam(request, 'budgetId'));
  const data = getBody(request, budgetItemSchema);
  await getOwnedCategory(repository, userId, data.categoryId, true);

  const existing = await repository.findActiveBudgetItem(budget.id, data.categoryId, data.categoryType);
  if (existing) {
    return repository.updateBudgetItem(existing.id, { amount: data.amount });
  }

  return repository.createBudgetItem({ budgetId: budget.id, ...data });
}

export async function getBudgetItems(request: Request, repository: Repository): Promise<BudgetItem[]> {
  const budget = await getOwnedBudget(repository, getUserId(request), getIdParam(request, 'budgetId'));
  return repository.listBudgetItems(budget.id);
}

/**
 * Updates an item's amount, category or type. Category and type are frozen once
 * transactions point at the item, since moving them would send the reversal of
 * those transactions to a different savings balance.
 */
export async function updateBudgetItem(request: Request, repository: Repository): Promise<BudgetItem> {
  const userId = getUserId(request);
  const budget = await getOwnedBudget(repository, userId, getIdParam(request, 'budgetId'));
  const item = await getBudgetItemOfBudget(repository, budget.id, getIdParam(request, 'itemId'));
  const changes = getBody(request, budgetItemChangesSchema);

  const categoryChanged = changes.categoryId !== undefined && changes.categoryId !== item.categoryId;
  const typeChanged = changes.categoryType !== undefined && changes.categoryType !== item.categoryType;

  if (categoryChanged && changes.categoryId !== undefined) {
    await getOwnedCategory(repository, userId, changes.categoryId, true);
  }
  if ((categoryChanged || typeChanged) && (await repository.countActiveTransactionsForBudgetItem(item.id)) > 0) {
    throw new BadRequestError('Budget item has transactions; only its amount can change');
  }
  if (categoryChanged || typeChanged) {
    const clash = await repository.findActiveBudgetItem(
      budget.id,
      changes.categoryId ?? item.categoryId,
      changes.categoryType ?? item.categoryType,
    );
    if (clash && clash.id !== item.id) {
      throw new BadRequestError('Budget already has an item for this category and type');
    }
  }

  return repository.updateBudgetItem(item.id, changes);
}

/**
 * Removes an item from its budget
 * @throws BadRequestError if active transactions still point at the item
 */
export async function deleteBudgetItem(request: Request, repository: Repository) {
  const budget = await getOwnedBudget(repository, getUserId(request), getIdParam(request, 'budgetId'));
  const item = await getBudgetItemOfBudget(repository, budget.id, getIdParam(request, 'itemId'));

  if ((await repository.countActiveTransactionsForBudgetItem(item.id)) > 0) {
    throw new BadRequestError('Budget item has transactions and cannot be deleted');
  }

  await repository.updateBudgetItem(item.id, { isActive: false });
  return { ok: true };
}
