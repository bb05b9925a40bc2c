import type { Repository } from '../../utils/io/types';
import type { Transaction } from '../transaction/types';
import type { SavingsCategoryBalance, SavingsEffect, SavingsEffectKind } from './types';
import { fromCents, toCents } from '../../utils/money/money';
import { debug } from '../../utils/log';

type Totals = {
  fundedCents: number;
  spentCents: number;
  lastTransactionId: number | null;
};

/**
 * Keeps SavingsCategoryBalance rows in step with transactions.
 *
 * A checking transaction against a savings-type budget item funds the item's
 * category; a savings transaction spends from its category. Every write keeps
 * availableBalance equal to fundedAmount - spentAmount.
 *
 * The reconciler writes through whatever repository it is given. Callers run it
 * inside Repository.withTransaction together with the transaction write so that
 * a failure between reversing and applying leaves nothing half done.
 */
export class SavingsBalanceReconciler {
  private repository: Repository;
  private now: () => Date;

  constructor(repository: Repository, now: () => Date = () => new Date()) {
    this.repository = repository;
    this.now = now;
  }

  /**
   * Resolves what a transaction does to savings balances, or null when it does nothing.
   * Inactive transactions have no effect.
   */
  async effectOf(transaction: Transaction): Promise<SavingsEffect | null> {
    if (!transaction.isActive) {
      return null;
    }

    if (transaction.accountType === 'checking') {
      if (transaction.budgetItemId === null) {
        return null;
      }
      const budgetItem = await this.repository.findBudgetItem(transaction.budgetItemId);
      if (!budgetItem || budgetItem.categoryType !== 'savings') {
        return null;
      }
      return { kind: 'funding', categoryId: budgetItem.categoryId, amount: transaction.amount };
    }

    if (transaction.categoryId === null) {
      return null;
    }
    return { kind: 'spending', categoryId: transaction.categoryId, amount: transaction.amount };
  }

  async applyCreate(transaction: Transaction): Promise<void> {
    const effect = await this.effectOf(transaction);
    if (effect) {
      await this.adjust(transaction.userId, effect.categoryId, effect.kind, effect.amount, transaction.id);
    }
  }

  /**
   * Reverses the effect of the transaction as it was, then applies the effect of
   * the transaction as it is now. Both may be null, and they may target different
   * categories or kinds when the account type changed.
   *
   * @param before - The transaction before the update was written
   * @param after - The transaction after the update was written
   */
  async applyUpdate(before: Transaction, after: Transaction): Promise<void> {
    const previous = await this.effectOf(before);
    const next = await this.effectOf(after);

    if (previous) {
      await this.adjust(before.userId, previous.categoryId, previous.kind, -previous.amount, before.id);
    }
    if (next) {
      await this.adjust(after.userId, next.categoryId, next.kind, next.amount, after.id);
    }
  }

  /**
   * Reverses the effect of a transaction that is about to be soft deleted
   * @param transaction - The transaction while still active
   */
  async applyDelete(transaction: Transaction): Promise<void> {
    const effect = await this.effectOf(transaction);
    if (effect) {
      await this.adjust(transaction.userId, effect.categoryId, effect.kind, -effect.amount, transaction.id);
    }
  }

  /**
   * Adds amount (negative to reverse) to the funded or spent side of a balance,
   * creating the balance with zeros if it does not exist yet
   */
  async adjust(
    userId: number,
    categoryId: number,
    kind: SavingsEffectKind,
    amount: number,
    transactionId: number,
  ): Promise<SavingsCategoryBalance> {
    const balance = await this.getOrCreate(userId, categoryId);

    let fundedCents = toCents(balance.fundedAmount);
    let spentCents = toCents(balance.spentAmount);
    if (kind === 'funding') {
      fundedCents += toCents(amount);
    } else {
      spentCents += toCents(amount);
    }

    const updated = await this.repository.updateSavingsBalance(balance.id, {
      fundedAmount: fromCents(fundedCents),
      spentAmount: fromCents(spentCents),
      availableBalance: fromCents(fundedCents - spentCents),
      lastTransactionId: transactionId,
      updatedAt: this.now(),
    });

    debug('Adjusted savings balance', {
      userId,
      categoryId,
      kind,
      amount,
      transactionId,
      availableBalance: updated.availableBalance,
    });

    return updated;
  }

  /**
   * Recomputes every savings balance of a user from their active transactions.
   * Balances whose category no longer has any activity are reset to zero.
   *
   * lastTransactionId becomes the highest contributing transaction id. After an
   * edit of an older transaction this can differ from the incremental path, which
   * records whichever transaction changed the balance last.
   */
  async rebuild(userId: number): Promise<SavingsCategoryBalance[]> {
    const transactions = await this.repository.listTransactions(userId);
    const totals = new Map<number, Totals>();

    for (const transaction of [...transactions].sort((a, b) => a.id - b.id)) {
      const effect = await this.effectOf(transaction);
      if (!effect) {
        continue;
      }
      const current = totals.get(effect.categoryId) || { fundedCents: 0, spentCents: 0, lastTransactionId: null };
      if (effect.kind === 'funding') {
        current.fundedCents += toCents(effect.amount);
      } else {
        current.spentCents += toCents(effect.amount);
      }
      current.lastTransactionId = transaction.id;
      totals.set(effect.categoryId, current);
    }

    const existing = await this.repository.listSavingsBalances(userId);
    for (const balance of existing) {
      if (!totals.has(balance.categoryId)) {
        totals.set(balance.categoryId, { fundedCents: 0, spentCents: 0, lastTransactionId: null });
      }
    }

    for (const [categoryId, total] of totals) {
      const balance = await this.getOrCreate(userId, categoryId);
      await this.repository.updateSavingsBalance(balance.id, {
        fundedAmount: fromCents(total.fundedCents),
        spentAmount: fromCents(total.spentCents),
        availableBalance: fromCents(total.fundedCents - total.spentCents),
        lastTransactionId: total.lastTransactionId,
        updatedAt: this.now(),
      });
    }

    debug('Rebuilt savings balances', { userId, categories: totals.size });

    return this.repository.listSavingsBalances(userId);
  }

  private async getOrCreate(userId: number, categoryId: number): Promise<SavingsCategoryBalance> {
    const existing = await this.repository.findSavingsBalance(userId, categoryId);
    if (existing) {
      return existing;
    }
    return this.repository.createSavingsBalance({
      userId,
      categoryId,
      fundedAmount: 0,
      spentAmount: 0,
      availableBalance: 0,
      lastTransactionId: null,
      updatedAt: this.now(),
    });
  }
}
