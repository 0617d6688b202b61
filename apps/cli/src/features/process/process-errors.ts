import { LedgerError } from '@txledger/core';

/**
 * A CSV row that could not be turned into a transaction. Reported and skipped.
 */
export class MalformedRecordError extends LedgerError {
  readonly code = 'MALFORMED_RECORD';

  constructor(
    public readonly row: number,
    public readonly reason: string
  ) {
    super(`Row ${row}: ${reason}`, { row, reason });
  }
}

/**
 * The input path does not name a readable regular file.
 */
export class InputFileError extends LedgerError {
  readonly code = 'INPUT_NOT_FOUND';

  constructor(public readonly path: string) {
    super(`'${path}' is not a valid file`, { path });
  }
}

/**
 * The input source failed while it was being read.
 */
export class InvalidCsvError extends LedgerError {
  readonly code = 'INVALID_CSV';

  constructor(reason: string) {
    super(`Unable to read transactions: ${reason}`, { reason });
  }
}
