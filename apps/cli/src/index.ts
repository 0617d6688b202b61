#!/usr/bin/env node
import { flushLoggers, getLogger } from '@txledger/logger';
import { Command } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('txledger')
    .description('Apply a CSV stream of client transactions and print the resulting account balances')
    .version('1.0.0')
    .exitOverride((error) => {
      // commander reports usage errors itself; only the exit code is remapped
      process.exit(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    });

  registerProcessCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  flushLoggers();
  displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  process.exitCode = ExitCodes.GENERAL_ERROR;
});
