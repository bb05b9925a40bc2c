import type { AccountType } from '../transaction/types';
import type { CategoryType } from '../category/types';

export type CategorySpending = {
  budgeted: number;
  spent: number;
  remaining: number;
};

export type AccountSummary = {
  totalSpent: number;
  categories: Record<string, CategorySpending>;
};

export type BudgetSummary = Record<AccountType, AccountSummary>;

export type VarianceLine = {
  budgetItemId: number;
  categoryId: number;
  categoryName: string;
  categoryType: CategoryType;
  budgeted: number;
  actual: number;
  variance: number;
};

export type VarianceTotals = {
  budgeted: number;
  actual: number;
  variance: number;
};

export type VarianceReport = {
  budgetId: number;
  budgetName: string;
  lines: VarianceLine[];
  totals: Record<CategoryType, VarianceTotals>;
};
