import { type Result, err, ok } from 'neverthrow';

import type { Account } from '../domain/account.js';
import type { Transaction } from '../domain/transaction.js';

import { InsufficientFundsError, MissingAmountError } from './rule.errors.js';

export function withdrawal(
  account: Account,
  transaction: Transaction
): Result<void, MissingAmountError | InsufficientFundsError> {
  const { amount, txId } = transaction;

  if (amount === undefined) {
    return err(new MissingAmountError(txId, 'withdrawal'));
  }

  if (account.available.isLessThan(amount)) {
    return err(new InsufficientFundsError(txId, account.available, amount));
  }

  account.available = account.available.subtract(amount);

  return ok();
}
