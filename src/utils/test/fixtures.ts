import type { Repository } from '../io/types';
import type { User } from '../../data/user/types';
import type { Category, CategoryType } from '../../data/category/types';
import type { Budget, BudgetItem } from '../../data/budget/types';
import type { AccountType, Transaction } from '../../data/transaction/types';

export type BudgetFixture = {
  user: User;
  emergency: Category;
  vacation: Category;
  groceries: Category;
  budget: Budget;
  emergencyItem: BudgetItem;
  vacationItem: BudgetItem;
  groceriesItem: BudgetItem;
};

/**
 * A user with a March 2025 budget funding two savings categories and one expense
 */
export async function createBudgetFixture(repository: Repository, email = 'sam@example.com'): Promise<BudgetFixture> {
  const user = await repository.createUser(email, null);
  const emergency = await repository.createCategory({ userId: user.id, name: 'Emergency Fund' });
  const vacation = await repository.createCategory({ userId: user.id, name: 'Vacation' });
  const groceries = await repository.createCategory({ userId: user.id, name: 'Groceries' });
  const budget = await repository.createBudget({ userId: user.id, month: 3, year: 2025, name: 'March 2025' });

  const item = (category: Category, categoryType: CategoryType, amount: number) =>
    repository.createBudgetItem({ budgetId: budget.id, categoryId: category.id, categoryType, amount });

  return {
    user,
    emergency,
    vacation,
    groceries,
    budget,
    emergencyItem: await item(emergency, 'savings', 200),
    vacationItem: await item(vacation, 'savings', 100),
    groceriesItem: await item(groceries, 'expense', 400),
  };
}

type TransactionInput = {
  amount: number;
  accountType: AccountType;
  budgetItemId?: number;
  categoryId?: number;
  transactionDate?: Date;
  description?: string;
};

/**
 * Stores a transaction directly, without touching savings balances
 */
export function storeTransaction(repository: Repository, userId: number, input: TransactionInput): Promise<Transaction> {
  return repository.createTransaction({
    userId,
    amount: input.amount,
    description: input.description ?? null,
    transactionDate: input.transactionDate ?? new Date(Date.UTC(2025, 2, 10)),
    accountType: input.accountType,
    budgetItemId: input.budgetItemId ?? null,
    categoryId: input.categoryId ?? null,
  });
}
