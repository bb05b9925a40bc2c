import type { BudgetItem } from '../budget/types';
import type { AccountType, Transaction } from '../transaction/types';
import type { AccountSummary, BudgetSummary, CategorySpending } from './types';
import { addMoney, subtractMoney } from '../../utils/money/money';

/**
 * Groups a budget's transactions by account type and category name
 *
 * Only transactions linked to one of the given items are counted. A category
 * appears once it has at least one transaction; its budgeted amount comes from
 * the first item seen for that category name.
 *
 * @param items - The budget's items
 * @param categoryNames - Category name by category id
 * @param transactions - Active transactions of the budget's owner
 */
export function buildBudgetSummary(
  items: BudgetItem[],
  categoryNames: ReadonlyMap<number, string>,
  transactions: Transaction[],
): BudgetSummary {
  // Category names are user input and may shadow Object.prototype keys
  const spending: Record<AccountType, Map<string, CategorySpending>> = { checking: new Map(), savings: new Map() };
  const totals: Record<AccountType, number> = { checking: 0, savings: 0 };
  const itemsById = new Map(items.map((item) => [item.id, item]));

  for (const transaction of transactions) {
    const item = transaction.budgetItemId === null ? undefined : itemsById.get(transaction.budgetItemId);
    if (!item) {
      continue;
    }
    const categories = spending[transaction.accountType];
    const categoryName = categoryNames.get(item.categoryId) || `Category ${item.categoryId}`;

    totals[transaction.accountType] = addMoney(totals[transaction.accountType], transaction.amount);
    let category = categories.get(categoryName);
    if (!category) {
      category = { budgeted: item.amount, spent: 0, remaining: 0 };
      categories.set(categoryName, category);
    }
    category.spent = addMoney(category.spent, transaction.amount);
  }

  const summarize = (accountType: AccountType): AccountSummary => ({
    totalSpent: totals[accountType],
    categories: Object.fromEntries(
      [...spending[accountType]].map(([name, category]) => [
        name,
        { ...category, remaining: subtractMoney(category.budgeted, category.spent) },
      ]),
    ),
  });

  return { checking: summarize('checking'), savings: summarize('savings') };
}
