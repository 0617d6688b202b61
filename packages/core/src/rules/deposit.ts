import { type Result, err, ok } from 'neverthrow';

import type { Account } from '../domain/account.js';
import type { Transaction } from '../domain/transaction.js';

import { DuplicateDepositError, MissingAmountError } from './rule.errors.js';
import { type RulePolicy, STRICT_POLICY } from './rule-policy.js';

/**
 * Credit the deposit to available funds and index its amount by txId so later
 * disputes can find it.
 */
export function deposit(
  account: Account,
  transaction: Transaction,
  policy: RulePolicy = STRICT_POLICY
): Result<void, MissingAmountError | DuplicateDepositError> {
  const { amount, txId } = transaction;

  if (amount === undefined) {
    return err(new MissingAmountError(txId, 'deposit'));
  }

  if (policy.rejectDuplicateDeposits && account.deposits.has(txId)) {
    return err(new DuplicateDepositError(txId));
  }

  account.available = account.available.add(amount);
  account.deposits.set(txId, amount);

  return ok();
}
