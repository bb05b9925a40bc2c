import { Request } from 'express';
import type { Repository } from '../../../utils/io/types';
import type { SavingsBalanceView, SavingsCategoryBalance } from '../../../data/savings/types';
import { SavingsBalanceReconciler } from '../../../data/savings/reconciler';
import { getIdParam, getUserId } from '../../../utils/net/request';
import { getCategoryNames, getOwnedCategory } from '../../access';
import { log } from '../../../utils/log';

function toView(balance: SavingsCategoryBalance, categoryName: string): SavingsBalanceView {
  return {
    id: balance.id,
    categoryId: balance.categoryId,
    categoryName,
    fundedAmount: balance.fundedAmount,
    spentAmount: balance.spentAmount,
    availableBalance: balance.availableBalance,
    updatedAt: balance.updatedAt,
  };
}

async function withCategoryNames(
  repository: Repository,
  balances: SavingsCategoryBalance[],
): Promise<SavingsBalanceView[]> {
  const names = await getCategoryNames(
    repository,
    balances.map((balance) => balance.categoryId),
  );
  const views: SavingsBalanceView[] = [];
  for (const balance of balances) {
    const name = names.get(balance.categoryId);
    if (name !== undefined) {
      views.push(toView(balance, name));
    }
  }
  return views;
}

/**
 * Lists the user's savings balances with their category names
 */
export async function getSavingsBalances(request: Request, repository: Repository): Promise<SavingsBalanceView[]> {
  const userId = getUserId(request);
  return withCategoryNames(repository, await repository.listSavingsBalances(userId));
}

/**
 * Balance of one category. A category that was never funded or spent from
 * answers with zeros and a null id.
 * @throws NotFoundError if the category is not the user's
 */
export async function getSavingsBalance(request: Request, repository: Repository): Promise<SavingsBalanceView> {
  const userId = getUserId(request);
  const category = await getOwnedCategory(repository, userId, getIdParam(request, 'categoryId'));

  const balance = await repository.findSavingsBalance(userId, category.id);
  if (balance) {
    return toView(balance, category.name);
  }
  return {
    id: null,
    categoryId: category.id,
    categoryName: category.name,
    fundedAmount: 0,
    spentAmount: 0,
    availableBalance: 0,
    updatedAt: null,
  };
}

/**
 * Recomputes every savings balance of the user from their transactions
 */
export async function rebuildSavingsBalances(request: Request, repository: Repository): Promise<SavingsBalanceView[]> {
  const userId = getUserId(request);
  const balances = await repository.withTransaction((tx) => new SavingsBalanceReconciler(tx).rebuild(userId));
  log('Rebuilt savings balances', { userId, balances: balances.length });
  return withCategoryNames(repository, balances);
}
