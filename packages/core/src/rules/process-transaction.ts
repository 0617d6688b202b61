import { type Result, err, ok } from 'neverthrow';

import type { Account } from '../domain/account.js';
import type { Transaction } from '../domain/transaction.js';

import { chargeback } from './chargeback.js';
import { deposit } from './deposit.js';
import { dispute } from './dispute.js';
import { resolve } from './resolve.js';
import { AccountFrozenError, type GuardError, MismatchedAccountError, type RuleError } from './rule.errors.js';
import { type RulePolicy, STRICT_POLICY } from './rule-policy.js';
import { withdrawal } from './withdrawal.js';

/**
 * Checks shared by every kind: the transaction must belong to this account
 * and the account must not be frozen. The per-kind rules assume both hold.
 */
export function guardTransaction(account: Account, transaction: Transaction): Result<void, GuardError> {
  if (transaction.clientId !== account.clientId) {
    return err(new MismatchedAccountError(account.clientId, transaction.clientId));
  }

  if (account.frozen) {
    return err(new AccountFrozenError(account.clientId));
  }

  return ok();
}

/**
 * Apply one transaction to its account.
 *
 * Either every effect of the transaction is applied or, on failure, the
 * account is left exactly as it was.
 */
export function processTransaction(
  account: Account,
  transaction: Transaction,
  policy: RulePolicy = STRICT_POLICY
): Result<void, RuleError> {
  return guardTransaction(account, transaction).andThen(() => applyRule(account, transaction, policy));
}

function applyRule(account: Account, transaction: Transaction, policy: RulePolicy): Result<void, RuleError> {
  switch (transaction.kind) {
    case 'deposit':
      return deposit(account, transaction, policy);
    case 'withdrawal':
      return withdrawal(account, transaction);
    case 'dispute':
      return dispute(account, transaction, policy);
    case 'resolve':
      return resolve(account, transaction);
    case 'chargeback':
      return chargeback(account, transaction);
  }
}
