import { Request } from 'express';
import { z } from 'zod';
import type { Repository } from '../../utils/io/types';
import type { AccountType, Transaction } from '../../data/transaction/types';
import { SavingsBalanceReconciler } from '../../data/savings/reconciler';
import { filterForBudget } from '../../data/transaction/filter';
import { getBody, getIdParam, getTransactionFilters, getUserId } from '../../utils/net/request';
import { BadRequestError, ForbiddenError, NotFoundError } from '../../utils/net/errors';
import { getMonthRange } from '../../utils/date/date';
import { getOwnedBudget, getOwnedTransaction } from '../access';
import { log } from '../../utils/log';

const idSchema = z.number().int().positive();

// Strings and dates only: coercing null or a number would yield an epoch date
const dateSchema = z.union([z.string(), z.date()]).pipe(z.coerce.date());

const newTransactionSchema = z.object({
  amount: z.number().finite().positive(),
  description: z.string().max(512).nullable().optional(),
  transactionDate: dateSchema.optional(),
  accountType: z.enum(['checking', 'savings']),
  budgetItemId: idSchema.nullable().optional(),
  categoryId: idSchema.nullable().optional(),
});

const transactionChangesSchema = newTransactionSchema.partial();

type Links = {
  budgetItemId: number | null;
  categoryId: number | null;
};

/**
 * Checks the link a transaction needs for its account type and drops the other one.
 * Checking transactions need a budget item of one of the user's budgets, savings
 * transactions need one of the user's categories.
 */
async function resolveLinks(
  repository: Repository,
  userId: number,
  accountType: AccountType,
  budgetItemId: number | null | undefined,
  categoryId: number | null | undefined,
): Promise<Links> {
  if (accountType === 'checking') {
    if (budgetItemId === null || budgetItemId === undefined) {
      throw new BadRequestError('Checking account transactions must specify a budgetItemId');
    }
    const budgetItem = await repository.findBudgetItem(budgetItemId);
    if (!budgetItem || !budgetItem.isActive) {
      throw new NotFoundError('Budget item not found');
    }
    const budget = await repository.findBudget(budgetItem.budgetId);
    if (!budget || budget.userId !== userId) {
      throw new ForbiddenError('Budget item does not belong to current user');
    }
    return { budgetItemId, categoryId: null };
  }

  if (categoryId === null || categoryId === undefined) {
    throw new BadRequestError('Savings account transactions must specify a categoryId');
  }
  const category = await repository.findCategory(categoryId);
  if (!category || !category.isActive) {
    throw new NotFoundError('Category not found');
  }
  if (category.userId !== userId) {
    throw new ForbiddenError('Category does not belong to current user');
  }
  return { budgetItemId: null, categoryId };
}

/**
 * Records a transaction and applies its effect on savings balances
 *
 * @param request - Express request with { amount, accountType, budgetItemId | categoryId, description?, transactionDate? }
 * @throws BadRequestError if the link for the account type is missing
 * @throws NotFoundError if the budget item or category does not exist
 * @throws ForbiddenError if the budget item or category belongs to another user
 */
export async function addTransaction(request: Request, repository: Repository): Promise<Transaction> {
  const userId = getUserId(request);
  const data = getBody(request, newTransactionSchema);

  return repository.withTransaction(async (tx) => {
    const links = await resolveLinks(tx, userId, data.accountType, data.budgetItemId, data.categoryId);
    const transaction = await tx.createTransaction({
      userId,
      amount: data.amount,
      description: data.description ?? null,
      transactionDate: data.transactionDate ?? new Date(),
      accountType: data.accountType,
      ...links,
    });
    await new SavingsBalanceReconciler(tx).applyCreate(transaction);
    log('Created transaction', { userId, transactionId: transaction.id, accountType: transaction.accountType });
    return transaction;
  });
}

/**
 * Lists active transactions, newest first
 *
 * Filters: budgetId (the budget's checking transactions, plus every savings
 * transaction when month and year are also given), accountType, month and year.
 */
export async function getTransactions(request: Request, repository: Repository): Promise<Transaction[]> {
  const userId = getUserId(request);
  const filters = getTransactionFilters(request);
  const range =
    filters.month !== undefined && filters.year !== undefined ? getMonthRange(filters.month, filters.year) : {};

  const transactions = await repository.listTransactions(userId, { ...range, accountType: filters.accountType });
  if (filters.budgetId === undefined) {
    return transactions;
  }

  const budget = await getOwnedBudget(repository, userId, filters.budgetId);
  const items = await repository.listBudgetItems(budget.id);
  return filterForBudget(transactions, new Set(items.map((item) => item.id)), filters.month !== undefined);
}

export async function getTransaction(request: Request, repository: Repository): Promise<Transaction> {
  return getOwnedTransaction(repository, getUserId(request), getIdParam(request, 'transactionId'));
}

/**
 * Updates a transaction. Only the fields present in the body change. The old
 * effect on savings balances is reversed before the new one is applied, in the
 * same storage transaction as the update itself.
 */
export async function updateTransaction(request: Request, repository: Repository): Promise<Transaction> {
  const userId = getUserId(request);
  const transactionId = getIdParam(request, 'transactionId');
  const changes = getBody(request, transactionChangesSchema);

  return repository.withTransaction(async (tx) => {
    const before = await getOwnedTransaction(tx, userId, transactionId);

    const accountType = changes.accountType ?? before.accountType;
    const budgetItemId = changes.budgetItemId !== undefined ? changes.budgetItemId : before.budgetItemId;
    const categoryId = changes.categoryId !== undefined ? changes.categoryId : before.categoryId;

    const linksChanged =
      accountType !== before.accountType ||
      (accountType === 'checking' && budgetItemId !== before.budgetItemId) ||
      (accountType === 'savings' && categoryId !== before.categoryId);
    const links: Links = linksChanged
      ? await resolveLinks(tx, userId, accountType, budgetItemId, categoryId)
      : { budgetItemId: before.budgetItemId, categoryId: before.categoryId };

    const after = await tx.updateTransaction(transactionId, {
      amount: changes.amount,
      description: changes.description,
      transactionDate: changes.transactionDate,
      accountType,
      ...links,
    });
    await new SavingsBalanceReconciler(tx).applyUpdate(before, after);
    return after;
  });
}

/**
 * Soft deletes a transaction after reversing its effect on savings balances
 */
export async function deleteTransaction(request: Request, repository: Repository) {
  const userId = getUserId(request);
  const transactionId = getIdParam(request, 'transactionId');

  await repository.withTransaction(async (tx) => {
    const transaction = await getOwnedTransaction(tx, userId, transactionId);
    await new SavingsBalanceReconciler(tx).applyDelete(transaction);
    await tx.updateTransaction(transaction.id, { isActive: false, deletedAt: new Date() });
  });

  return { message: 'Transaction deleted successfully' };
}
