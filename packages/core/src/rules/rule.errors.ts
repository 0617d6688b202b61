import { LedgerError } from '../errors/ledger-error.js';
import type { TransactionKind } from '../domain/transaction.js';
import type { Amount } from '../value-objects/amount.js';

export class MismatchedAccountError extends LedgerError {
  readonly code = 'MISMATCHED_ACCOUNT';

  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Transaction for client ${actual} routed to account ${expected}`, { expected, actual });
  }
}

export class AccountFrozenError extends LedgerError {
  readonly code = 'ACCOUNT_FROZEN';

  constructor(public readonly clientId: number) {
    super(`Account ${clientId} is frozen`, { clientId });
  }
}

export class MissingAmountError extends LedgerError {
  readonly code = 'MISSING_AMOUNT';

  constructor(
    public readonly txId: number,
    kind: TransactionKind
  ) {
    super(`Transaction ${txId} is a ${kind} without an amount`, { txId, kind });
  }
}

export class InsufficientFundsError extends LedgerError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(
    public readonly txId: number,
    available: Amount,
    requested: Amount
  ) {
    super(`Withdrawal ${txId} of ${requested.toString()} exceeds available ${available.toString()}`, {
      txId,
      available: available.toString(),
      requested: requested.toString(),
    });
  }
}

export class DepositNotFoundError extends LedgerError {
  readonly code = 'DEPOSIT_NOT_FOUND';

  constructor(public readonly txId: number) {
    super(`Deposit not found: ${txId}`, { txId });
  }
}

export class TransactionNotDisputedError extends LedgerError {
  readonly code = 'TRANSACTION_NOT_DISPUTED';

  constructor(public readonly txId: number) {
    super(`Transaction not under dispute: ${txId}`, { txId });
  }
}

export class DuplicateDepositError extends LedgerError {
  readonly code = 'DUPLICATE_DEPOSIT';

  constructor(public readonly txId: number) {
    super(`Deposit ${txId} was already recorded`, { txId });
  }
}

export class AlreadyDisputedError extends LedgerError {
  readonly code = 'ALREADY_DISPUTED';

  constructor(public readonly txId: number) {
    super(`Transaction ${txId} is already under dispute`, { txId });
  }
}

export type GuardError = MismatchedAccountError | AccountFrozenError;

export type RuleError =
  | GuardError
  | MissingAmountError
  | InsufficientFundsError
  | DepositNotFoundError
  | TransactionNotDisputedError
  | DuplicateDepositError
  | AlreadyDisputedError;
