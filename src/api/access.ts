import type { Repository } from '../utils/io/types';
import type { Budget, BudgetItem } from '../data/budget/types';
import type { Category } from '../data/category/types';
import type { Transaction } from '../data/transaction/types';
import { ForbiddenError, NotFoundError } from '../utils/net/errors';

/**
 * Loads an active budget owned by the user
 * @throws NotFoundError if the budget is missing, archived or someone else's
 */
export async function getOwnedBudget(repository: Repository, userId: number, budgetId: number): Promise<Budget> {
  const budget = await repository.findBudget(budgetId);
  if (!budget || !budget.isActive || budget.userId !== userId) {
    throw new NotFoundError('Budget not found');
  }
  return budget;
}

/**
 * Loads a category owned by the user
 * @param activeOnly - Treat archived categories as missing
 * @throws NotFoundError if the category is missing or someone else's
 */
export async function getOwnedCategory(
  repository: Repository,
  userId: number,
  categoryId: number,
  activeOnly: boolean = false,
): Promise<Category> {
  const category = await repository.findCategory(categoryId);
  if (!category || category.userId !== userId || (activeOnly && !category.isActive)) {
    throw new NotFoundError('Category not found');
  }
  return category;
}

/**
 * Loads an active item of the given budget
 * @throws NotFoundError if the item is missing, deleted or in another budget
 */
export async function getBudgetItemOfBudget(
  repository: Repository,
  budgetId: number,
  itemId: number,
): Promise<BudgetItem> {
  const item = await repository.findBudgetItem(itemId);
  if (!item || !item.isActive || item.budgetId !== budgetId) {
    throw new NotFoundError('Budget item not found');
  }
  return item;
}

/**
 * Loads an active transaction and checks it belongs to the user
 * @throws NotFoundError if it is missing or deleted
 * @throws ForbiddenError if it belongs to another user
 */
export async function getOwnedTransaction(
  repository: Repository,
  userId: number,
  transactionId: number,
): Promise<Transaction> {
  const transaction = await repository.findTransaction(transactionId);
  if (!transaction || !transaction.isActive) {
    throw new NotFoundError('Transaction not found');
  }
  if (transaction.userId !== userId) {
    throw new ForbiddenError('Transaction does not belong to current user');
  }
  return transaction;
}

/**
 * Category name by id for the given ids, archived categories included
 */
export async function getCategoryNames(
  repository: Repository,
  categoryIds: Iterable<number>,
): Promise<Map<number, string>> {
  const names = new Map<number, string>();
  for (const id of new Set(categoryIds)) {
    const category = await repository.findCategory(id);
    if (category) {
      names.set(id, category.name);
    }
  }
  return names;
}
