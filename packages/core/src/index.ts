export { LedgerError } from './errors/ledger-error.js';

export { AMOUNT_SCALE, Amount } from './value-objects/amount.js';
export { InvalidAmountError } from './value-objects/amount.errors.js';

export { Account, type AccountSnapshot, type AccountState } from './domain/account.js';
export {
  AMOUNT_BEARING_KINDS,
  InvalidIdentifierError,
  MAX_CLIENT_ID,
  MAX_TX_ID,
  TRANSACTION_KINDS,
  createTransaction,
  isTransactionKind,
  type Transaction,
  type TransactionKind,
} from './domain/transaction.js';

export { chargeback } from './rules/chargeback.js';
export { deposit } from './rules/deposit.js';
export { dispute } from './rules/dispute.js';
export { guardTransaction, processTransaction } from './rules/process-transaction.js';
export { resolve } from './rules/resolve.js';
export { withdrawal } from './rules/withdrawal.js';
export { LENIENT_POLICY, STRICT_POLICY, type RulePolicy } from './rules/rule-policy.js';
export {
  AccountFrozenError,
  AlreadyDisputedError,
  DepositNotFoundError,
  DuplicateDepositError,
  InsufficientFundsError,
  MismatchedAccountError,
  MissingAmountError,
  TransactionNotDisputedError,
  type GuardError,
  type RuleError,
} from './rules/rule.errors.js';

export { Ledger, type LedgerOptions, type LedgerSummary } from './ledger/ledger.js';
