import type { User } from '../../data/user/types';
import type { Category, CategoryChanges, CategoryType, NewCategory } from '../../data/category/types';
import type { Budget, BudgetItem, BudgetItemChanges, NewBudget, NewBudgetItem } from '../../data/budget/types';
import type { NewTransaction, Transaction, TransactionChanges, TransactionQuery } from '../../data/transaction/types';
import type {
  NewSavingsCategoryBalance,
  SavingsBalanceChanges,
  SavingsCategoryBalance,
} from '../../data/savings/types';

/**
 * Storage for every entity of the API. Lookups by id return inactive rows too;
 * list methods return active rows only.
 */
export interface Repository {
  findUserByEmail(email: string): Promise<User | null>;
  findUserById(id: number): Promise<User | null>;
  createUser(email: string, name: string | null): Promise<User>;

  countCategories(userId: number): Promise<number>;
  listCategories(userId: number): Promise<Category[]>;
  findCategory(id: number): Promise<Category | null>;
  createCategory(category: NewCategory): Promise<Category>;
  updateCategory(id: number, changes: CategoryChanges): Promise<Category>;

  listBudgets(userId: number): Promise<Budget[]>;
  findBudget(id: number): Promise<Budget | null>;
  findActiveBudgetForMonth(userId: number, month: number, year: number): Promise<Budget | null>;
  createBudget(budget: NewBudget): Promise<Budget>;

  listBudgetItems(budgetId: number): Promise<BudgetItem[]>;
  findBudgetItem(id: number): Promise<BudgetItem | null>;
  findActiveBudgetItem(budgetId: number, categoryId: number, categoryType: CategoryType): Promise<BudgetItem | null>;
  createBudgetItem(item: NewBudgetItem): Promise<BudgetItem>;
  updateBudgetItem(id: number, changes: BudgetItemChanges): Promise<BudgetItem>;
  countActiveTransactionsForBudgetItem(budgetItemId: number): Promise<number>;

  /** Active transactions of a user, newest first */
  listTransactions(userId: number, query?: TransactionQuery): Promise<Transaction[]>;
  findTransaction(id: number): Promise<Transaction | null>;
  createTransaction(transaction: NewTransaction): Promise<Transaction>;
  updateTransaction(id: number, changes: TransactionChanges): Promise<Transaction>;

  findSavingsBalance(userId: number, categoryId: number): Promise<SavingsCategoryBalance | null>;
  listSavingsBalances(userId: number): Promise<SavingsCategoryBalance[]>;
  createSavingsBalance(balance: NewSavingsCategoryBalance): Promise<SavingsCategoryBalance>;
  updateSavingsBalance(id: number, changes: SavingsBalanceChanges): Promise<SavingsCategoryBalance>;

  /**
   * Runs work against a repository bound to one storage transaction. The
   * transaction commits when work resolves and rolls back when it rejects.
   */
  withTransaction<T>(work: (repository: Repository) => Promise<T>): Promise<T>;
}
