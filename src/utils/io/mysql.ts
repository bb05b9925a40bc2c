import mysql from 'mysql';
import { readFileSync } from 'fs';
import path from 'path';
import type { Config } from '../config';
import { debug } from '../log';

// Point to the sql directory at repository root (CommonJS)
export const SCHEMA_FILE = path.join(__dirname, '../../../sql/schema.sql');

export type Queryable = Pick<mysql.Connection, 'query'>;

export type WriteResult = {
  insertId: number;
  affectedRows: number;
};

/**
 * Creates the connection pool. Dates are read and written as UTC.
 */
export function createPool(config: Config['mysql']): mysql.Pool {
  return mysql.createPool({
    connectionLimit: 10,
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    timezone: 'Z',
  });
}

/**
 * Runs a parameterized statement and resolves with the driver's result
 * @template T - Row array for SELECT statements, WriteResult for writes
 */
export function query<T>(executor: Queryable, sql: string, values: unknown[] = []): Promise<T> {
  return new Promise((resolve, reject) => {
    executor.query({ sql, values }, (error, results) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(results);
    });
  });
}

export function getConnection(pool: mysql.Pool): Promise<mysql.PoolConnection> {
  return new Promise((resolve, reject) => {
    pool.getConnection((error, connection) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(connection);
    });
  });
}

export function beginTransaction(connection: mysql.PoolConnection): Promise<void> {
  return new Promise((resolve, reject) => {
    connection.beginTransaction((error) => (error ? reject(error) : resolve()));
  });
}

export function commit(connection: mysql.PoolConnection): Promise<void> {
  return new Promise((resolve, reject) => {
    connection.commit((error) => (error ? reject(error) : resolve()));
  });
}

export function rollback(connection: mysql.PoolConnection): Promise<void> {
  return new Promise((resolve) => {
    connection.rollback(() => resolve());
  });
}

export function endPool(pool: mysql.Pool): Promise<void> {
  return new Promise((resolve, reject) => {
    pool.end((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Splits a schema file into single statements, dropping blank ones
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * Creates any missing table from sql/schema.sql
 */
export async function initializeSchema(pool: mysql.Pool, schemaFile: string = SCHEMA_FILE): Promise<void> {
  const statements = splitStatements(readFileSync(schemaFile, 'utf8'));
  for (const statement of statements) {
    await query<WriteResult>(pool, statement);
  }
  debug('Schema ready', { statements: statements.length });
}
