export type SavingsCategoryBalance = {
  id: number;
  userId: number;
  categoryId: number;
  fundedAmount: number;
  spentAmount: number;
  availableBalance: number;
  lastTransactionId: number | null;
  updatedAt: Date;
};

export type NewSavingsCategoryBalance = Omit<SavingsCategoryBalance, 'id'>;

export type SavingsBalanceChanges = Pick<
  SavingsCategoryBalance,
  'fundedAmount' | 'spentAmount' | 'availableBalance' | 'lastTransactionId' | 'updatedAt'
>;

/**
 * Funding comes from checking into a savings category, spending goes out of the
 * savings account against a category
 */
export type SavingsEffectKind = 'funding' | 'spending';

export type SavingsEffect = {
  kind: SavingsEffectKind;
  categoryId: number;
  amount: number;
};

/**
 * A balance as returned by the API, with the category name attached
 */
export type SavingsBalanceView = {
  id: number | null;
  categoryId: number;
  categoryName: string;
  fundedAmount: number;
  spentAmount: number;
  availableBalance: number;
  updatedAt: Date | null;
};
