import { getLogger } from '@txledger/logger';
import { type Result, err, ok } from 'neverthrow';

import { Account, type AccountSnapshot } from '../domain/account.js';
import type { Transaction } from '../domain/transaction.js';
import type { LedgerError } from '../errors/ledger-error.js';
import { processTransaction } from '../rules/process-transaction.js';
import type { RuleError } from '../rules/rule.errors.js';
import { type RulePolicy, STRICT_POLICY } from '../rules/rule-policy.js';

const logger = getLogger('Ledger');

export interface LedgerOptions {
  policy?: RulePolicy | undefined;
}

export interface LedgerSummary {
  /** Transactions applied successfully */
  applied: number;

  /** Transactions refused by the rule engine */
  rejected: number;

  /** Input records that never became a transaction */
  malformed: number;

  /** Accounts opened during the run */
  accounts: number;

  /** Failure count keyed by error code, covering rejected and malformed records */
  rejectionsByCode: Record<string, number>;
}

/**
 * Folds a stream of transactions into one account per client.
 *
 * Accounts are opened lazily the first time a client id is seen. A record
 * that fails is logged, counted and skipped; the fold always continues.
 */
export class Ledger {
  private readonly _accounts = new Map<number, Account>();
  private readonly policy: RulePolicy;
  private readonly failures = new Map<string, number>();
  private applied = 0;
  private rejected = 0;
  private malformed = 0;

  constructor(options: LedgerOptions = {}) {
    this.policy = options.policy ?? STRICT_POLICY;
  }

  /**
   * Apply one transaction to the account its client id names.
   */
  apply(transaction: Transaction): Result<Account, RuleError> {
    const account = this.openAccount(transaction.clientId);
    const result = processTransaction(account, transaction, this.policy);

    if (result.isErr()) {
      this.rejected++;
      this.countFailure(result.error.code);
      logger.warn(
        {
          client: transaction.clientId,
          tx: transaction.txId,
          type: transaction.kind,
          code: result.error.code,
        },
        `Transaction rejected: ${result.error.message}`
      );
      return err(result.error);
    }

    this.applied++;
    logger.trace({ client: transaction.clientId, tx: transaction.txId, type: transaction.kind }, 'Transaction applied');
    return ok(account);
  }

  applyAll(transactions: Iterable<Transaction>): LedgerSummary {
    for (const transaction of transactions) {
      this.apply(transaction);
    }
    return this.summary();
  }

  /**
   * Count an input record that could not be turned into a transaction.
   */
  rejectInput(error: LedgerError): void {
    this.malformed++;
    this.countFailure(error.code);
    logger.warn({ code: error.code, ...error.details }, `Record skipped: ${error.message}`);
  }

  getAccount(clientId: number): Account | undefined {
    return this._accounts.get(clientId);
  }

  /** All accounts in ascending client id order. */
  accounts(): Account[] {
    return [...this._accounts.values()].sort((a, b) => a.clientId - b.clientId);
  }

  snapshot(): AccountSnapshot[] {
    return this.accounts().map((account) => account.snapshot());
  }

  summary(): LedgerSummary {
    return {
      applied: this.applied,
      rejected: this.rejected,
      malformed: this.malformed,
      accounts: this._accounts.size,
      rejectionsByCode: Object.fromEntries(this.failures),
    };
  }

  private openAccount(clientId: number): Account {
    let account = this._accounts.get(clientId);
    if (account === undefined) {
      account = new Account(clientId);
      this._accounts.set(clientId, account);
      logger.debug({ client: clientId }, 'Account opened');
    }
    return account;
  }

  private countFailure(code: string): void {
    this.failures.set(code, (this.failures.get(code) ?? 0) + 1);
  }
}
