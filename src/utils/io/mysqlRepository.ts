import mysql from 'mysql';
import type { Repository } from './types';
import type { User } from '../../data/user/types';
import type { Category, CategoryChanges, CategoryType, NewCategory } from '../../data/category/types';
import type { Budget, BudgetItem, BudgetItemChanges, NewBudget, NewBudgetItem } from '../../data/budget/types';
import type {
  AccountType,
  NewTransaction,
  Transaction,
  TransactionChanges,
  TransactionQuery,
} from '../../data/transaction/types';
import type {
  NewSavingsCategoryBalance,
  SavingsBalanceChanges,
  SavingsCategoryBalance,
} from '../../data/savings/types';
import { beginTransaction, commit, getConnection, query, rollback, type Queryable, type WriteResult } from './mysql';
import { NotFoundError } from '../net/errors';

type UserRow = {
  id: number;
  email: string;
  name: string | null;
  is_active: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

type CategoryRow = {
  id: number;
  user_id: number;
  name: string;
  is_active: number;
  created_at: Date;
  updated_at: Date;
};

type BudgetRow = {
  id: number;
  user_id: number;
  month: number;
  year: number;
  name: string;
  is_active: number;
  created_at: Date;
  updated_at: Date;
};

type BudgetItemRow = {
  id: number;
  budget_id: number;
  category_id: number;
  category_type: string;
  amount: string;
  is_active: number;
  created_at: Date;
  updated_at: Date;
};

type TransactionRow = {
  id: number;
  user_id: number;
  amount: string;
  description: string | null;
  transaction_date: Date;
  account_type: string;
  budget_item_id: number | null;
  category_id: number | null;
  is_active: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

type SavingsBalanceRow = {
  id: number;
  user_id: number;
  category_id: number;
  funded_amount: string;
  spent_amount: string;
  available_balance: string;
  last_transaction_id: number | null;
  updated_at: Date;
};

type CountRow = { total: number };

function toCategoryType(value: string): CategoryType {
  switch (value) {
    case 'income':
    case 'expense':
    case 'savings':
      return value;
    default:
      throw new Error(`Unknown category type '${value}'`);
  }
}

function toAccountType(value: string): AccountType {
  if (value === 'checking' || value === 'savings') {
    return value;
  }
  throw new Error(`Unknown account type '${value}'`);
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toBudget(row: BudgetRow): Budget {
  return {
    id: row.id,
    userId: row.user_id,
    month: row.month,
    year: row.year,
    name: row.name,
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toBudgetItem(row: BudgetItemRow): BudgetItem {
  return {
    id: row.id,
    budgetId: row.budget_id,
    categoryId: row.category_id,
    categoryType: toCategoryType(row.category_type),
    amount: Number(row.amount),
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    userId: row.user_id,
    amount: Number(row.amount),
    description: row.description,
    transactionDate: row.transaction_date,
    accountType: toAccountType(row.account_type),
    budgetItemId: row.budget_item_id,
    categoryId: row.category_id,
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

function toSavingsBalance(row: SavingsBalanceRow): SavingsCategoryBalance {
  return {
    id: row.id,
    userId: row.user_id,
    categoryId: row.category_id,
    fundedAmount: Number(row.funded_amount),
    spentAmount: Number(row.spent_amount),
    availableBalance: Number(row.available_balance),
    lastTransactionId: row.last_transaction_id,
    updatedAt: row.updated_at,
  };
}

type ColumnMap<T> = ReadonlyArray<readonly [keyof T & string, string]>;

const TRANSACTION_COLUMNS: ColumnMap<TransactionChanges> = [
  ['amount', 'amount'],
  ['description', 'description'],
  ['transactionDate', 'transaction_date'],
  ['accountType', 'account_type'],
  ['budgetItemId', 'budget_item_id'],
  ['categoryId', 'category_id'],
  ['isActive', 'is_active'],
  ['deletedAt', 'deleted_at'],
];

const BUDGET_ITEM_COLUMNS: ColumnMap<BudgetItemChanges> = [
  ['categoryId', 'category_id'],
  ['categoryType', 'category_type'],
  ['amount', 'amount'],
  ['isActive', 'is_active'],
];

const CATEGORY_COLUMNS: ColumnMap<CategoryChanges> = [
  ['name', 'name'],
  ['isActive', 'is_active'],
];

/**
 * Builds "col = ?" assignments and their values from the fields that are set
 */
function buildAssignments<T>(changes: T, columns: ColumnMap<T>): { assignments: string[]; values: unknown[] } {
  const assignments: string[] = [];
  const values: unknown[] = [];
  for (const [key, column] of columns) {
    const value = changes[key];
    if (value !== undefined) {
      assignments.push(`${column} = ?`);
      values.push(value);
    }
  }
  return { assignments, values };
}

/**
 * Repository backed by MySQL. A root repository owns the pool; the repository
 * handed to withTransaction work is bound to a single pooled connection.
 */
export class MysqlRepository implements Repository {
  private executor: Queryable;
  private pool: mysql.Pool | null;

  constructor(executor: Queryable, pool: mysql.Pool | null) {
    this.executor = executor;
    this.pool = pool;
  }

  static fromPool(pool: mysql.Pool): MysqlRepository {
    return new MysqlRepository(pool, pool);
  }

  private select<T>(sql: string, values: unknown[] = []): Promise<T[]> {
    return query<T[]>(this.executor, sql, values);
  }

  private write(sql: string, values: unknown[] = []): Promise<WriteResult> {
    return query<WriteResult>(this.executor, sql, values);
  }

  private async first<T>(sql: string, values: unknown[]): Promise<T | null> {
    const rows = await this.select<T>(sql, values);
    return rows.length > 0 ? rows[0] : null;
  }

  private async require<T>(found: Promise<T | null>, what: string, id: number): Promise<T> {
    const value = await found;
    if (!value) {
      throw new NotFoundError(`${what} ${id} not found`);
    }
    return value;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const row = await this.first<UserRow>('SELECT * FROM users WHERE email = ?', [email]);
    return row ? toUser(row) : null;
  }

  async findUserById(id: number): Promise<User | null> {
    const row = await this.first<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
    return row ? toUser(row) : null;
  }

  async createUser(email: string, name: string | null): Promise<User> {
    const now = new Date();
    const result = await this.write(
      'INSERT INTO users (email, name, is_active, created_at, updated_at) VALUES (?, ?, 1, ?, ?)',
      [email, name, now, now],
    );
    return this.require(this.findUserById(result.insertId), 'User', result.insertId);
  }

  async countCategories(userId: number): Promise<number> {
    const rows = await this.select<CountRow>('SELECT COUNT(*) AS total FROM categories WHERE user_id = ?', [userId]);
    return rows.length > 0 ? Number(rows[0].total) : 0;
  }

  async listCategories(userId: number): Promise<Category[]> {
    const rows = await this.select<CategoryRow>(
      'SELECT * FROM categories WHERE user_id = ? AND is_active = 1 ORDER BY id',
      [userId],
    );
    return rows.map(toCategory);
  }

  async findCategory(id: number): Promise<Category | null> {
    const row = await this.first<CategoryRow>('SELECT * FROM categories WHERE id = ?', [id]);
    return row ? toCategory(row) : null;
  }

  async createCategory(category: NewCategory): Promise<Category> {
    const now = new Date();
    const result = await this.write(
      'INSERT INTO categories (user_id, name, is_active, created_at, updated_at) VALUES (?, ?, 1, ?, ?)',
      [category.userId, category.name, now, now],
    );
    return this.require(this.findCategory(result.insertId), 'Category', result.insertId);
  }

  async updateCategory(id: number, changes: CategoryChanges): Promise<Category> {
    const { assignments, values } = buildAssignments(changes, CATEGORY_COLUMNS);
    await this.write(`UPDATE categories SET ${[...assignments, 'updated_at = ?'].join(', ')} WHERE id = ?`, [
      ...values,
      new Date(),
      id,
    ]);
    return this.require(this.findCategory(id), 'Category', id);
  }

  async listBudgets(userId: number): Promise<Budget[]> {
    const rows = await this.select<BudgetRow>(
      'SELECT * FROM budgets WHERE user_id = ? AND is_active = 1 ORDER BY year DESC, month DESC',
      [userId],
    );
    return rows.map(toBudget);
  }

  async findBudget(id: number): Promise<Budget | null> {
    const row = await this.first<BudgetRow>('SELECT * FROM budgets WHERE id = ?', [id]);
    return row ? toBudget(row) : null;
  }

  async findActiveBudgetForMonth(userId: number, month: number, year: number): Promise<Budget | null> {
    const row = await this.first<BudgetRow>(
      'SELECT * FROM budgets WHERE user_id = ? AND month = ? AND year = ? AND is_active = 1 LIMIT 1',
      [userId, month, year],
    );
    return row ? toBudget(row) : null;
  }

  async createBudget(budget: NewBudget): Promise<Budget> {
    const now = new Date();
    const result = await this.write(
      'INSERT INTO budgets (user_id, month, year, name, is_active, created_at, updated_at) VALUES (?, ?, ?, ?, 1, ?, ?)',
      [budget.userId, budget.month, budget.year, budget.name, now, now],
    );
    return this.require(this.findBudget(result.insertId), 'Budget', result.insertId);
  }

  async listBudgetItems(budgetId: number): Promise<BudgetItem[]> {
    const rows = await this.select<BudgetItemRow>(
      'SELECT * FROM budget_items WHERE budget_id = ? AND is_active = 1 ORDER BY id',
      [budgetId],
    );
    return rows.map(toBudgetItem);
  }

  async findBudgetItem(id: number): Promise<BudgetItem | null> {
    const row = await this.first<BudgetItemRow>('SELECT * FROM budget_items WHERE id = ?', [id]);
    return row ? toBudgetItem(row) : null;
  }

  async findActiveBudgetItem(
    budgetId: number,
    categoryId: number,
    categoryType: CategoryType,
  ): Promise<BudgetItem | null> {
    const row = await this.first<BudgetItemRow>(
      'SELECT * FROM budget_items WHERE budget_id = ? AND category_id = ? AND category_type = ? AND is_active = 1 LIMIT 1',
      [budgetId, categoryId, categoryType],
    );
    return row ? toBudgetItem(row) : null;
  }

  async createBudgetItem(item: NewBudgetItem): Promise<BudgetItem> {
    const now = new Date();
    const result = await this.write(
      'INSERT INTO budget_items (budget_id, category_id, category_type, amount, is_active, created_at, updated_at) VALUES (?, ?, ?, ?, 1, ?, ?)',
      [item.budgetId, item.categoryId, item.categoryType, item.amount, now, now],
    );
    return this.require(this.findBudgetItem(result.insertId), 'Budget item', result.insertId);
  }

  async updateBudgetItem(id: number, changes: BudgetItemChanges): Promise<BudgetItem> {
    const { assignments, values } = buildAssignments(changes, BUDGET_ITEM_COLUMNS);
    await this.write(`UPDATE budget_items SET ${[...assignments, 'updated_at = ?'].join(', ')} WHERE id = ?`, [
      ...values,
      new Date(),
      id,
    ]);
    return this.require(this.findBudgetItem(id), 'Budget item', id);
  }

  async countActiveTransactionsForBudgetItem(budgetItemId: number): Promise<number> {
    const rows = await this.select<CountRow>(
      'SELECT COUNT(*) AS total FROM transactions WHERE budget_item_id = ? AND is_active = 1',
      [budgetItemId],
    );
    return rows.length > 0 ? Number(rows[0].total) : 0;
  }

  async listTransactions(userId: number, transactionQuery: TransactionQuery = {}): Promise<Transaction[]> {
    const conditions = ['user_id = ?', 'is_active = 1'];
    const values: unknown[] = [userId];
    if (transactionQuery.from) {
      conditions.push('transaction_date >= ?');
      values.push(transactionQuery.from);
    }
    if (transactionQuery.to) {
      conditions.push('transaction_date < ?');
      values.push(transactionQuery.to);
    }
    if (transactionQuery.accountType) {
      conditions.push('account_type = ?');
      values.push(transactionQuery.accountType);
    }
    const rows = await this.select<TransactionRow>(
      `SELECT * FROM transactions WHERE ${conditions.join(' AND ')} ORDER BY transaction_date DESC, id DESC`,
      values,
    );
    return rows.map(toTransaction);
  }

  async findTransaction(id: number): Promise<Transaction | null> {
    const row = await this.first<TransactionRow>('SELECT * FROM transactions WHERE id = ?', [id]);
    return row ? toTransaction(row) : null;
  }

  async createTransaction(transaction: NewTransaction): Promise<Transaction> {
    const now = new Date();
    const result = await this.write(
      `INSERT INTO transactions
        (user_id, amount, description, transaction_date, account_type, budget_item_id, category_id, is_active, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`,
      [
        transaction.userId,
        transaction.amount,
        transaction.description,
        transaction.transactionDate,
        transaction.accountType,
        transaction.budgetItemId,
        transaction.categoryId,
        now,
        now,
      ],
    );
    return this.require(this.findTransaction(result.insertId), 'Transaction', result.insertId);
  }

  async updateTransaction(id: number, changes: TransactionChanges): Promise<Transaction> {
    const { assignments, values } = buildAssignments(changes, TRANSACTION_COLUMNS);
    await this.write(`UPDATE transactions SET ${[...assignments, 'updated_at = ?'].join(', ')} WHERE id = ?`, [
      ...values,
      new Date(),
      id,
    ]);
    return this.require(this.findTransaction(id), 'Transaction', id);
  }

  async findSavingsBalance(userId: number, categoryId: number): Promise<SavingsCategoryBalance | null> {
    const row = await this.first<SavingsBalanceRow>(
      'SELECT * FROM savings_category_balances WHERE user_id = ? AND category_id = ?',
      [userId, categoryId],
    );
    return row ? toSavingsBalance(row) : null;
  }

  async listSavingsBalances(userId: number): Promise<SavingsCategoryBalance[]> {
    const rows = await this.select<SavingsBalanceRow>(
      'SELECT * FROM savings_category_balances WHERE user_id = ? ORDER BY id',
      [userId],
    );
    return rows.map(toSavingsBalance);
  }

  async createSavingsBalance(balance: NewSavingsCategoryBalance): Promise<SavingsCategoryBalance> {
    const result = await this.write(
      `INSERT INTO savings_category_balances
        (user_id, category_id, funded_amount, spent_amount, available_balance, last_transaction_id, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        balance.userId,
        balance.categoryId,
        balance.fundedAmount,
        balance.spentAmount,
        balance.availableBalance,
        balance.lastTransactionId,
        balance.updatedAt,
      ],
    );
    const created = await this.first<SavingsBalanceRow>('SELECT * FROM savings_category_balances WHERE id = ?', [
      result.insertId,
    ]);
    if (!created) {
      throw new NotFoundError(`Savings balance ${result.insertId} not found`);
    }
    return toSavingsBalance(created);
  }

  async updateSavingsBalance(id: number, changes: SavingsBalanceChanges): Promise<SavingsCategoryBalance> {
    await this.write(
      `UPDATE savings_category_balances
       SET funded_amount = ?, spent_amount = ?, available_balance = ?, last_transaction_id = ?, updated_at = ?
       WHERE id = ?`,
      [
        changes.fundedAmount,
        changes.spentAmount,
        changes.availableBalance,
        changes.lastTransactionId,
        changes.updatedAt,
        id,
      ],
    );
    const updated = await this.first<SavingsBalanceRow>('SELECT * FROM savings_category_balances WHERE id = ?', [id]);
    if (!updated) {
      throw new NotFoundError(`Savings balance ${id} not found`);
    }
    return toSavingsBalance(updated);
  }

  async withTransaction<T>(work: (repository: Repository) => Promise<T>): Promise<T> {
    if (!this.pool) {
      // Already bound to a connection inside a transaction
      return work(this);
    }

    const connection = await getConnection(this.pool);
    try {
      await beginTransaction(connection);
      try {
        const result = await work(new MysqlRepository(connection, null));
        await commit(connection);
        return result;
      } catch (error) {
        await rollback(connection);
        throw error;
      }
    } finally {
      connection.release();
    }
  }
}
