import pc from 'picocolors';

import { type ExitCode, exitCodeToErrorCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'Pass the path of an existing CSV file with the header type,client,tx,amount.',
  CONFIG_ERROR: 'Check the TXLEDGER_* environment variables.',
};

export interface CliErrorOptions {
  stderr?: Pick<NodeJS.WritableStream, 'write'> | undefined;
  color?: boolean | undefined;
  showStack?: boolean | undefined;
}

/**
 * Format a CLI error for stderr: the message line, then a contextual tip and,
 * when requested, the stack trace.
 */
export function formatCliError(error: Error, exitCode: ExitCode, options: CliErrorOptions = {}): string {
  const colors = pc.createColors(options.color ?? pc.isColorSupported);
  const code = exitCodeToErrorCode(exitCode);
  let text = `${colors.red('Error:')} ${error.message}\n`;

  const tip = ERROR_TIPS[code];
  if (tip) {
    text += `${colors.dim(tip)}\n`;
  }

  if (options.showStack && error.stack) {
    text += `\n${colors.dim(error.stack)}\n`;
  }

  return text;
}

/**
 * Display a CLI error on stderr. stdout is left untouched so a partial
 * snapshot never reaches it.
 */
export function displayCliError(error: Error, exitCode: ExitCode, options: CliErrorOptions = {}): void {
  const stderr = options.stderr ?? process.stderr;
  stderr.write(formatCliError(error, exitCode, options));
}
