export type AccountType = 'checking' | 'savings';

/**
 * Money moved on one account. Checking transactions point at a budget item,
 * savings transactions point straight at a category.
 */
export type Transaction = {
  id: number;
  userId: number;
  amount: number;
  description: string | null;
  transactionDate: Date;
  accountType: AccountType;
  budgetItemId: number | null;
  categoryId: number | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
};

export type NewTransaction = Pick<
  Transaction,
  'userId' | 'amount' | 'description' | 'transactionDate' | 'accountType' | 'budgetItemId' | 'categoryId'
>;

export type TransactionChanges = Partial<
  Pick<
    Transaction,
    'amount' | 'description' | 'transactionDate' | 'accountType' | 'budgetItemId' | 'categoryId' | 'isActive' | 'deletedAt'
  >
>;

/**
 * Storage-level filter; a missing field does not filter
 */
export type TransactionQuery = {
  from?: Date;
  to?: Date;
  accountType?: AccountType;
};
