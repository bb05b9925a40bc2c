import type { CategoryType } from '../category/types';

export type Budget = {
  id: number;
  userId: number;
  month: number;
  year: number;
  name: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export type NewBudget = Pick<Budget, 'userId' | 'month' | 'year' | 'name'>;

/**
 * A per-category allocation inside a monthly budget
 */
export type BudgetItem = {
  id: number;
  budgetId: number;
  categoryId: number;
  categoryType: CategoryType;
  amount: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export type NewBudgetItem = Pick<BudgetItem, 'budgetId' | 'categoryId' | 'categoryType' | 'amount'>;

export type BudgetItemChanges = Partial<Pick<BudgetItem, 'categoryId' | 'categoryType' | 'amount' | 'isActive'>>;
