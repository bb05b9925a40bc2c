import { describe, it, expect, vi } from 'vitest';
import { readFileSync } from 'fs';
import mysql from 'mysql';
import { splitStatements, query, initializeSchema, SCHEMA_FILE, type Queryable } from './mysql';

type QueryCallback = (error: Error | null, results?: unknown) => void;

function createExecutor(respond: (sql: string) => { error?: Error; results?: unknown }) {
  const calls: { sql: string; values: unknown[] }[] = [];
  const executor = {
    query: vi.fn((options: { sql: string; values: unknown[] }, callback: QueryCallback) => {
      calls.push(options);
      const { error, results } = respond(options.sql);
      callback(error ?? null, results);
    }),
  };
  return { executor: executor as unknown as Queryable & mysql.Pool, calls };
}

describe('MySQL Utilities', () => {
  describe('splitStatements', () => {
    it('should split on semicolons and drop blank statements', () => {
      expect(splitStatements('CREATE TABLE a (id INT);\n\n  CREATE TABLE b (id INT) ;\n;')).toEqual([
        'CREATE TABLE a (id INT)',
        'CREATE TABLE b (id INT)',
      ]);
    });

    it('should find one statement per table in the schema file', () => {
      const statements = splitStatements(readFileSync(SCHEMA_FILE, 'utf8'));

      expect(statements).toHaveLength(6);
      expect(statements.every((statement) => statement.startsWith('CREATE TABLE IF NOT EXISTS'))).toBe(true);
    });
  });

  describe('query', () => {
    it('should resolve with the driver results', async () => {
      const { executor, calls } = createExecutor(() => ({ results: [{ total: 3 }] }));

      await expect(query(executor, 'SELECT COUNT(*) AS total FROM users WHERE id = ?', [4])).resolves.toEqual([
        { total: 3 },
      ]);
      expect(calls).toEqual([{ sql: 'SELECT COUNT(*) AS total FROM users WHERE id = ?', values: [4] }]);
    });

    it('should reject with the driver error', async () => {
      const { executor } = createExecutor(() => ({ error: new Error('ER_NO_SUCH_TABLE') }));

      await expect(query(executor, 'SELECT 1')).rejects.toThrow('ER_NO_SUCH_TABLE');
    });
  });

  describe('initializeSchema', () => {
    it('should run every statement of the schema in order', async () => {
      const { executor, calls } = createExecutor(() => ({ results: { insertId: 0, affectedRows: 0 } }));

      await initializeSchema(executor);

      expect(calls.map((call) => /CREATE TABLE IF NOT EXISTS (\w+)/.exec(call.sql)?.[1])).toEqual([
        'users',
        'categories',
        'budgets',
        'budget_items',
        'transactions',
        'savings_category_balances',
      ]);
    });
  });
});
