import express, { Express, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Repository } from './utils/io/types';
import type { Config } from './utils/config';
import { MagicLinkStore } from './utils/auth/magicLink';
import { createVerifyToken } from './utils/auth/middleware';
import { errorHandler, respond } from './utils/net/handler';
import { login, verify, getCurrentUser } from './api/auth/auth';
import { getCategories, getCategory, addCategory, renameCategory, archiveCategory } from './api/categories/categories';
import { getBudgets, getCurrentBudget, getBudget, addBudget, getBudgetVariance } from './api/budgets/budgets';
import { getBudgetItems, addBudgetItem, updateBudgetItem, deleteBudgetItem } from './api/budgets/items/items';
import {
  getTransactions,
  getTransaction,
  addTransaction,
  updateTransaction,
  deleteTransaction,
} from './api/transactions/transactions';
import { getBudgetSummary } from './api/transactions/summary';
import {
  getSavingsBalances,
  getSavingsBalance,
  rebuildSavingsBalances,
} from './api/transactions/savings/balances';

export type AppContext = {
  repository: Repository;
  config: Config;
  magicLinks: MagicLinkStore;
};

/**
 * Builds the Express app around a repository, so the server and the tests can
 * share every route
 */
export function createApp({ repository, config, magicLinks }: AppContext): Express {
  const app: Express = express();
  const verifyToken = createVerifyToken(repository, config.jwtSecret);
  const auth = { repository, magicLinks, config };

  // Middleware
  app.use(cors({ origin: config.corsOrigins, credentials: true }));
  app.use(express.json());
  app.use(bodyParser.urlencoded({ extended: true }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Budget Compass API is running!' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  // Auth
  app.post('/api/auth/login', respond((req) => login(req, auth)));
  app.post('/api/auth/verify', respond((req) => verify(req, auth)));
  app.get('/api/users/me', verifyToken, respond((req) => getCurrentUser(req, repository)));

  // Categories
  app.get('/api/categories', verifyToken, respond((req) => getCategories(req, repository)));
  app.post('/api/categories', verifyToken, respond((req) => addCategory(req, repository)));
  app.get('/api/categories/:categoryId', verifyToken, respond((req) => getCategory(req, repository)));
  app.patch('/api/categories/:categoryId', verifyToken, respond((req) => renameCategory(req, repository)));
  app.delete('/api/categories/:categoryId', verifyToken, respond((req) => archiveCategory(req, repository)));

  // Budgets
  app.get('/api/budgets', verifyToken, respond((req) => getBudgets(req, repository)));
  app.post('/api/budgets', verifyToken, respond((req) => addBudget(req, repository)));
  app.get('/api/budgets/current', verifyToken, respond((req) => getCurrentBudget(req, repository)));
  app.get('/api/budgets/:budgetId', verifyToken, respond((req) => getBudget(req, repository)));
  app.get('/api/budgets/:budgetId/variance', verifyToken, respond((req) => getBudgetVariance(req, repository)));

  // Budget items
  app.get('/api/budgets/:budgetId/items', verifyToken, respond((req) => getBudgetItems(req, repository)));
  app.post('/api/budgets/:budgetId/items', verifyToken, respond((req) => addBudgetItem(req, repository)));
  app.patch('/api/budgets/:budgetId/items/:itemId', verifyToken, respond((req) => updateBudgetItem(req, repository)));
  app.delete('/api/budgets/:budgetId/items/:itemId', verifyToken, respond((req) => deleteBudgetItem(req, repository)));

  // Transactions
  app.get('/api/transactions', verifyToken, respond((req) => getTransactions(req, repository)));
  app.post('/api/transactions', verifyToken, respond((req) => addTransaction(req, repository)));
  app.get(
    '/api/transactions/budget/:budgetId/summary',
    verifyToken,
    respond((req) => getBudgetSummary(req, repository)),
  );
  app.get('/api/transactions/savings/balances', verifyToken, respond((req) => getSavingsBalances(req, repository)));
  app.post(
    '/api/transactions/savings/balances/rebuild',
    verifyToken,
    respond((req) => rebuildSavingsBalances(req, repository)),
  );
  app.get(
    '/api/transactions/savings/balances/:categoryId',
    verifyToken,
    respond((req) => getSavingsBalance(req, repository)),
  );
  app.get('/api/transactions/:transactionId', verifyToken, respond((req) => getTransaction(req, repository)));
  app.put('/api/transactions/:transactionId', verifyToken, respond((req) => updateTransaction(req, repository)));
  app.delete('/api/transactions/:transactionId', verifyToken, respond((req) => deleteTransaction(req, repository)));

  app.use(errorHandler);

  return app;
}
