import { type Result, err, ok } from 'neverthrow';

import { LedgerError } from '../errors/ledger-error.js';
import type { Amount } from '../value-objects/amount.js';

export const TRANSACTION_KINDS = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

/** Kinds that carry their own amount; the others act on a prior deposit's amount. */
export const AMOUNT_BEARING_KINDS: readonly TransactionKind[] = ['deposit', 'withdrawal'];

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffff_ffff;

/**
 * A single ledger record. `amount` is present for deposits and withdrawals;
 * disputes, resolves and chargebacks reference a prior deposit by `txId`.
 */
export interface Transaction {
  readonly kind: TransactionKind;
  readonly clientId: number;
  readonly txId: number;
  readonly amount?: Amount | undefined;
}

export class InvalidIdentifierError extends LedgerError {
  readonly code = 'INVALID_IDENTIFIER';

  constructor(field: 'clientId' | 'txId', value: number, max: number) {
    super(`${field} must be an integer between 0 and ${max}, received: ${value}`, { field, value, max });
  }
}

export function isTransactionKind(value: string): value is TransactionKind {
  return TRANSACTION_KINDS.some((kind) => kind === value);
}

function isIdentifierInRange(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

/**
 * Build an immutable transaction after checking the identifier ranges
 * (client ids are unsigned 16-bit, transaction ids unsigned 32-bit).
 */
export function createTransaction(data: Transaction): Result<Transaction, InvalidIdentifierError> {
  if (!isIdentifierInRange(data.clientId, MAX_CLIENT_ID)) {
    return err(new InvalidIdentifierError('clientId', data.clientId, MAX_CLIENT_ID));
  }

  if (!isIdentifierInRange(data.txId, MAX_TX_ID)) {
    return err(new InvalidIdentifierError('txId', data.txId, MAX_TX_ID));
  }

  return ok(
    Object.freeze({
      kind: data.kind,
      clientId: data.clientId,
      txId: data.txId,
      amount: data.amount,
    })
  );
}
