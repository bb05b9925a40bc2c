import type { Budget, BudgetItem } from '../budget/types';
import type { CategoryType } from '../category/types';
import type { Transaction } from '../transaction/types';
import type { VarianceLine, VarianceReport, VarianceTotals } from './types';
import { addMoney, subtractMoney } from '../../utils/money/money';

function emptyTotals(): VarianceTotals {
  return { budgeted: 0, actual: 0, variance: 0 };
}

/**
 * Budgeted against actual for every item of a budget. Actual is the sum of the
 * active checking transactions recorded against the item; variance is
 * budgeted - actual, so overspending is negative.
 */
export function buildVarianceReport(
  budget: Budget,
  items: BudgetItem[],
  categoryNames: ReadonlyMap<number, string>,
  transactions: Transaction[],
): VarianceReport {
  const actualByItem = new Map<number, number>();
  for (const transaction of transactions) {
    if (transaction.accountType !== 'checking' || transaction.budgetItemId === null) {
      continue;
    }
    actualByItem.set(
      transaction.budgetItemId,
      addMoney(actualByItem.get(transaction.budgetItemId) || 0, transaction.amount),
    );
  }

  const totals: Record<CategoryType, VarianceTotals> = {
    income: emptyTotals(),
    expense: emptyTotals(),
    savings: emptyTotals(),
  };

  const lines: VarianceLine[] = items.map((item) => {
    const actual = actualByItem.get(item.id) || 0;
    const variance = subtractMoney(item.amount, actual);

    const total = totals[item.categoryType];
    total.budgeted = addMoney(total.budgeted, item.amount);
    total.actual = addMoney(total.actual, actual);
    total.variance = addMoney(total.variance, variance);

    return {
      budgetItemId: item.id,
      categoryId: item.categoryId,
      categoryName: categoryNames.get(item.categoryId) || `Category ${item.categoryId}`,
      categoryType: item.categoryType,
      budgeted: item.amount,
      actual,
      variance,
    };
  });

  return { budgetId: budget.id, budgetName: budget.name, lines, totals };
}
