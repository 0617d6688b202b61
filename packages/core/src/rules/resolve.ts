import { type Result, err, ok } from 'neverthrow';

import type { Account } from '../domain/account.js';
import type { Transaction } from '../domain/transaction.js';

import { DepositNotFoundError, TransactionNotDisputedError } from './rule.errors.js';

/**
 * Close a dispute in the client's favour: the held amount returns to available.
 */
export function resolve(
  account: Account,
  transaction: Transaction
): Result<void, DepositNotFoundError | TransactionNotDisputedError> {
  const { txId } = transaction;
  const amount = account.depositAmount(txId);

  if (amount === undefined) {
    return err(new DepositNotFoundError(txId));
  }

  if (!account.isDisputed(txId)) {
    return err(new TransactionNotDisputedError(txId));
  }

  account.held = account.held.subtract(amount);
  account.available = account.available.add(amount);
  account.activeDisputes.delete(txId);

  return ok();
}
