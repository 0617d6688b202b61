import { type Result, err, ok } from 'neverthrow';

import type { Account } from '../domain/account.js';
import type { Transaction } from '../domain/transaction.js';

import { AlreadyDisputedError, DepositNotFoundError } from './rule.errors.js';
import { type RulePolicy, STRICT_POLICY } from './rule-policy.js';

/**
 * Move the referenced deposit's amount from available to held.
 *
 * Available may go negative when the client already withdrew part of the
 * disputed deposit.
 */
export function dispute(
  account: Account,
  transaction: Transaction,
  policy: RulePolicy = STRICT_POLICY
): Result<void, DepositNotFoundError | AlreadyDisputedError> {
  const { txId } = transaction;
  const amount = account.depositAmount(txId);

  if (amount === undefined) {
    return err(new DepositNotFoundError(txId));
  }

  if (policy.rejectActiveRedispute && account.isDisputed(txId)) {
    return err(new AlreadyDisputedError(txId));
  }

  account.available = account.available.subtract(amount);
  account.held = account.held.add(amount);
  account.activeDisputes.add(txId);

  return ok();
}
