/**
 * Base class for every failure the transaction engine reports.
 *
 * The engine never throws these: rule functions and parsers return them
 * inside neverthrow `Result` values and the ledger decides how to report them.
 */
export abstract class LedgerError extends Error {
  abstract readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      details: this.details,
      message: this.message,
      name: this.name,
    };
  }
}
