import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { Readable } from 'node:stream';

import { type AccountSnapshot, Ledger, type LedgerSummary, type RulePolicy, STRICT_POLICY } from '@txledger/core';
import { getLogger } from '@txledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { InputFileError, InvalidCsvError } from './process-errors.js';
import { readTransactions } from './transaction-reader.js';

const logger = getLogger('ProcessHandler');

/**
 * Result of the process operation.
 */
export interface ProcessResult {
  /** Final account states in ascending client id order */
  accounts: AccountSnapshot[];

  /** Counts of applied, rejected and malformed records */
  summary: LedgerSummary;
}

/**
 * Process handler parameters
 */
export interface ProcessHandlerParams {
  /** Path to the transactions CSV file */
  inputPath: string;

  /** Rule policy; strict when omitted */
  policy?: RulePolicy | undefined;
}

export type ProcessError = InputFileError | InvalidCsvError;

/**
 * Process handler - reads the input file and folds every record into a ledger.
 * Reusable by both CLI command and tests.
 */
export class ProcessHandler {
  constructor(private readonly openInput: (inputPath: string) => Readable = (inputPath) => createReadStream(inputPath)) {}

  /**
   * Execute the process operation.
   */
  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, ProcessError>> {
    const { inputPath, policy = STRICT_POLICY } = params;

    const fileCheck = await this.checkInputFile(inputPath);
    if (fileCheck.isErr()) {
      return err(fileCheck.error);
    }

    const ledger = new Ledger({ policy });
    logger.debug({ inputPath, policy }, 'Processing transactions');

    try {
      for await (const record of readTransactions(this.openInput(inputPath))) {
        if (record.isErr()) {
          ledger.rejectInput(record.error);
          continue;
        }
        ledger.apply(record.value);
      }
    } catch (error) {
      return err(new InvalidCsvError(error instanceof Error ? error.message : String(error)));
    }

    const summary = ledger.summary();
    logger.info({ ...summary }, 'Processing complete');

    return ok({ accounts: ledger.snapshot(), summary });
  }

  private async checkInputFile(inputPath: string): Promise<Result<void, InputFileError>> {
    try {
      const stats = await stat(inputPath);
      return stats.isFile() ? ok() : err(new InputFileError(inputPath));
    } catch (error) {
      logger.debug({ inputPath, error }, 'Input file is not accessible');
      return err(new InputFileError(inputPath));
    }
  }
}
