import type { Readable } from 'node:stream';

import {
  AMOUNT_BEARING_KINDS,
  Amount,
  MAX_CLIENT_ID,
  MAX_TX_ID,
  TRANSACTION_KINDS,
  type Transaction,
  createTransaction,
} from '@txledger/core';
import { parse } from 'csv-parse';
import { type Result, err } from 'neverthrow';
import { z } from 'zod';

import { MalformedRecordError } from './process-errors.js';

const UNSIGNED_INTEGER = /^\d+$/;

function identifierSchema(max: number) {
  return z
    .string()
    .regex(UNSIGNED_INTEGER, 'must be an unsigned integer')
    .transform(Number)
    .pipe(z.number().int().max(max, `must not exceed ${max}`));
}

/**
 * One data row of the input file. Headers are `type,client,tx,amount`; the
 * amount column may be absent on dispute, resolve and chargeback rows.
 */
export const TransactionRowSchema = z.object({
  type: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(TRANSACTION_KINDS)),
  client: identifierSchema(MAX_CLIENT_ID),
  tx: identifierSchema(MAX_TX_ID),
  amount: z.string().optional(),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

/**
 * Validate one parsed CSV record and build the transaction it describes.
 *
 * @param row 1-based data row number, used in error messages
 */
export function parseTransactionRow(record: unknown, row: number): Result<Transaction, MalformedRecordError> {
  const validation = TransactionRowSchema.safeParse(record);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    const reason = issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record';
    return err(new MalformedRecordError(row, reason));
  }

  const { type, client, tx } = validation.data;
  let amount: Amount | undefined;

  // Disputes, resolves and chargebacks use the referenced deposit's amount
  const amountText = validation.data.amount?.trim() ?? '';
  if (AMOUNT_BEARING_KINDS.includes(type) && amountText !== '') {
    const parsed = Amount.parse(amountText);
    if (parsed.isErr()) {
      return err(new MalformedRecordError(row, `amount: ${parsed.error.message}`));
    }
    if (parsed.value.isNegative()) {
      return err(new MalformedRecordError(row, `amount: must not be negative, received: ${amountText}`));
    }
    amount = parsed.value;
  }

  return createTransaction({ kind: type, clientId: client, txId: tx, amount }).mapErr(
    (error) => new MalformedRecordError(row, error.message)
  );
}

interface SkippedRecord {
  /** Records parsed before the skipped one */
  after: number;
  reason: string;
}

/**
 * Stream transactions out of CSV text, one `Result` per data row, in file order.
 *
 * Malformed rows, including rows csv-parse cannot tokenize (a stray quote),
 * are yielded as errors and reading continues. Only a failing source rejects
 * the iteration. The source is destroyed once iteration stops.
 */
export async function* readTransactions(
  input: Readable
): AsyncGenerator<Result<Transaction, MalformedRecordError>, void, undefined> {
  let parsed = 0;
  const skipped: SkippedRecord[] = [];

  const parser = parse({
    bom: true,
    columns: (header: string[]) => header.map((column) => column.toLowerCase()),
    relax_column_count: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
    trim: true,
    on_record: (record) => {
      parsed++;
      return record;
    },
    on_skip: (error) => {
      skipped.push({ after: parsed, reason: error?.message ?? 'unreadable record' });
      return undefined;
    },
  });

  // pipe() does not forward source errors
  input.once('error', (error) => parser.destroy(error));
  input.pipe(parser);

  let row = 0;
  let consumed = 0;
  try {
    for await (const record of parser) {
      consumed++;
      // Skips fire while parsing, ahead of the records still buffered in the parser
      for (let next = skipped[0]; next && next.after < consumed; next = skipped[0]) {
        skipped.shift();
        yield err(new MalformedRecordError(++row, next.reason));
      }
      yield parseTransactionRow(record, ++row);
    }
    for (const next of skipped) {
      yield err(new MalformedRecordError(++row, next.reason));
    }
  } finally {
    input.unpipe(parser);
    input.destroy();
  }
}
