import { LedgerError } from '../errors/ledger-error.js';

export class InvalidAmountError extends LedgerError {
  readonly code = 'INVALID_AMOUNT';

  constructor(value: string, reason: string) {
    super(`Invalid amount "${value}": ${reason}`, { value, reason });
  }
}
