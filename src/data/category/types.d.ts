/**
 * How a budget item uses its category. Only savings items fund a savings balance.
 */
export type CategoryType = 'income' | 'expense' | 'savings';

export type Category = {
  id: number;
  userId: number;
  name: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export type NewCategory = {
  userId: number;
  name: string;
};

export type CategoryChanges = Partial<Pick<Category, 'name' | 'isActive'>>;
