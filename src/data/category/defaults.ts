import type { Repository } from '../../utils/io/types';

export const DEFAULT_CATEGORY_NAMES: readonly string[] = [
  // Income
  'Salary',
  'Freelance',
  'Investments',
  'Other Income',
  // Savings
  'Emergency Fund',
  'Retirement',
  'Vacation',
  'Major Purchase',
  // Monthly bills
  'Rent/Mortgage',
  'Utilities',
  'Internet/Phone',
  'Insurance',
  'Subscriptions',
  // Common expenses
  'Groceries',
  'Dining Out',
  'Entertainment',
  'Transportation',
  'Shopping',
  'Personal Care',
  'Gifts',
  'Miscellaneous',
];

/**
 * Gives a new user the starter category list. Does nothing if the user already
 * has categories, archived ones included.
 * @returns Number of categories created
 */
export async function seedDefaultCategories(repository: Repository, userId: number): Promise<number> {
  if ((await repository.countCategories(userId)) > 0) {
    return 0;
  }
  for (const name of DEFAULT_CATEGORY_NAMES) {
    await repository.createCategory({ userId, name });
  }
  return DEFAULT_CATEGORY_NAMES.length;
}
