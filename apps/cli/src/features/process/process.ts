import { LENIENT_POLICY, STRICT_POLICY } from '@txledger/core';
import { type ValidatedEnv, getEnv } from '@txledger/env';
import { flushLoggers } from '@txledger/logger';
import type { Command } from 'commander';
import type { z } from 'zod';

import { setupLogging } from '../../logging-setup.js';
import { displayCliError } from '../shared/cli-error.js';
import { type ExitCode, ExitCodes } from '../shared/exit-codes.js';
import { InputPathSchema, ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { formatAccountsCsv } from './account-writer.js';
import { InputFileError } from './process-errors.js';
import { type ProcessError, ProcessHandler } from './process-handler.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Streams the command writes to; the CLI passes the process streams.
 */
export interface ProcessCommandIO {
  stdout: Pick<NodeJS.WritableStream, 'write'>;
  stderr: Pick<NodeJS.WritableStream, 'write'>;
  env?: ValidatedEnv | undefined;
}

/**
 * Register the transaction processing command on the program root.
 */
export function registerProcessCommand(program: Command): void {
  program
    .argument('<input>', 'CSV file of transactions (type,client,tx,amount)')
    .option('--lenient', 'Accept duplicate deposit ids and repeated disputes')
    .option('--log-level <level>', 'Minimum diagnostic level written to stderr (overrides TXLEDGER_LOG_LEVEL)')
    .action(async (input: unknown, rawOptions: unknown) => {
      process.exitCode = await executeProcessCommand(input, rawOptions, {
        stdout: process.stdout,
        stderr: process.stderr,
      });
    });
}

/**
 * Execute the process command and return its exit code.
 */
export async function executeProcessCommand(
  rawInput: unknown,
  rawOptions: unknown,
  io: ProcessCommandIO
): Promise<ExitCode> {
  const inputResult = InputPathSchema.safeParse(rawInput);
  const optionsResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!inputResult.success || !optionsResult.success) {
    const issue = inputResult.error?.issues[0] ?? optionsResult.error?.issues[0];
    return fail(new Error(issue?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS, io);
  }

  const options = optionsResult.data;
  let env: ValidatedEnv;
  try {
    env = io.env ?? getEnv();
    setupLogging(env, options.logLevel);
  } catch (error) {
    return fail(error instanceof Error ? error : new Error(String(error)), ExitCodes.CONFIG_ERROR, io);
  }

  const handler = new ProcessHandler();
  const result = await handler.execute({
    inputPath: inputResult.data,
    policy: options.lenient ? LENIENT_POLICY : STRICT_POLICY,
  });

  if (result.isErr()) {
    flushLoggers();
    return fail(result.error, processErrorExitCode(result.error), io, env.NODE_ENV === 'development');
  }

  io.stdout.write(formatAccountsCsv(result.value.accounts));
  flushLoggers();
  return ExitCodes.SUCCESS;
}

function processErrorExitCode(error: ProcessError): ExitCode {
  return error instanceof InputFileError ? ExitCodes.NOT_FOUND : ExitCodes.VALIDATION_ERROR;
}

function fail(error: Error, exitCode: ExitCode, io: ProcessCommandIO, showStack = false): ExitCode {
  displayCliError(error, exitCode, { stderr: io.stderr, showStack });
  return exitCode;
}
