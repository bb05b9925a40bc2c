import type { Transaction } from './types';

/**
 * Keeps the transactions that belong to a budget.
 *
 * Checking transactions belong to a budget through one of its items. Savings
 * transactions carry no budget item, so they are only kept when the caller
 * already narrowed the list to the budget's month.
 *
 * @param transactions - Transactions to filter
 * @param budgetItemIds - Ids of the budget's items
 * @param includeSavings - Keep every savings transaction
 */
export function filterForBudget(
  transactions: Transaction[],
  budgetItemIds: ReadonlySet<number>,
  includeSavings: boolean,
): Transaction[] {
  return transactions.filter((transaction) => {
    if (transaction.accountType === 'savings') {
      return includeSavings;
    }
    return transaction.budgetItemId !== null && budgetItemIds.has(transaction.budgetItemId);
  });
}
