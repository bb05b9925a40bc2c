import { describe, it, expect, beforeEach } from 'vitest';
import { getBudgetSummary } from './summary';
import { MemoryRepository } from '../../utils/test/memoryRepository';
import { createMockRequest } from '../../utils/test/mockData';
import { createBudgetFixture, storeTransaction, type BudgetFixture } from '../../utils/test/fixtures';
import { NotFoundError } from '../../utils/net/errors';

describe('Budget summary API', () => {
  let repository: MemoryRepository;
  let fixture: BudgetFixture;

  beforeEach(async () => {
    repository = new MemoryRepository();
    fixture = await createBudgetFixture(repository);
  });

  it('should group checking spending by category name', async () => {
    const userId = fixture.user.id;
    await storeTransaction(repository, userId, { amount: 60.25, accountType: 'checking', budgetItemId: fixture.groceriesItem.id });
    await storeTransaction(repository, userId, { amount: 39.75, accountType: 'checking', budgetItemId: fixture.groceriesItem.id });
    await storeTransaction(repository, userId, { amount: 200, accountType: 'checking', budgetItemId: fixture.emergencyItem.id });
    await storeTransaction(repository, userId, { amount: 15, accountType: 'savings', categoryId: fixture.vacation.id });

    const summary = await getBudgetSummary(
      createMockRequest({ userId, params: { budgetId: String(fixture.budget.id) } }),
      repository,
    );

    expect(summary).toEqual({
      checking: {
        totalSpent: 300,
        categories: {
          Groceries: { budgeted: 400, spent: 100, remaining: 300 },
          'Emergency Fund': { budgeted: 200, spent: 200, remaining: 0 },
        },
      },
      savings: { totalSpent: 0, categories: {} },
    });
  });

  it('should keep categories whose names match object prototype keys', async () => {
    const userId = fixture.user.id;
    for (const name of ['__proto__', 'toString']) {
      const category = await repository.createCategory({ userId, name });
      const item = await repository.createBudgetItem({
        budgetId: fixture.budget.id,
        categoryId: category.id,
        categoryType: 'expense',
        amount: 50,
      });
      await storeTransaction(repository, userId, { amount: 40, accountType: 'checking', budgetItemId: item.id });
    }

    const summary = await getBudgetSummary(
      createMockRequest({ userId, params: { budgetId: String(fixture.budget.id) } }),
      repository,
    );

    const categories = summary.checking.categories;
    expect(summary.checking.totalSpent).toBe(80);
    expect(Object.keys(categories)).toEqual(['__proto__', 'toString']);
    expect(Object.getOwnPropertyDescriptor(categories, '__proto__')?.value).toEqual({ budgeted: 50, spent: 40, remaining: 10 });
    expect(categories.toString).toEqual({ budgeted: 50, spent: 40, remaining: 10 });
    expect(Object.hasOwn(Object.prototype, 'spent')).toBe(false);
  });

  it('should ignore transactions of other budgets', async () => {
    const april = await repository.createBudget({ userId: fixture.user.id, month: 4, year: 2025, name: 'April 2025' });
    const aprilItem = await repository.createBudgetItem({
      budgetId: april.id,
      categoryId: fixture.groceries.id,
      categoryType: 'expense',
      amount: 300,
    });
    await storeTransaction(repository, fixture.user.id, { amount: 80, accountType: 'checking', budgetItemId: aprilItem.id });

    const summary = await getBudgetSummary(
      createMockRequest({ userId: fixture.user.id, params: { budgetId: String(fixture.budget.id) } }),
      repository,
    );

    expect(summary.checking).toEqual({ totalSpent: 0, categories: {} });
  });

  it("should answer 404 for another user's budget", async () => {
    const other = await createBudgetFixture(repository, 'alex@example.com');

    await expect(
      getBudgetSummary(
        createMockRequest({ userId: fixture.user.id, params: { budgetId: String(other.budget.id) } }),
        repository,
      ),
    ).rejects.toThrow(new NotFoundError('Budget not found'));
  });
});
