import { describe, expect, it, vi } from 'vitest';

import { displayCliError, formatCliError } from '../cli-error.js';
import { ExitCodes } from '../exit-codes.js';

describe('formatCliError', () => {
  it('should print the message followed by the tip for its code', () => {
    const text = formatCliError(new Error("'missing.csv' is not a valid file"), ExitCodes.NOT_FOUND, { color: false });

    expect(text).toBe(
      "Error: 'missing.csv' is not a valid file\n" +
        'Pass the path of an existing CSV file with the header type,client,tx,amount.\n'
    );
  });

  it('should omit the tip for codes without one', () => {
    const text = formatCliError(new Error('Unable to read transactions: bad quote'), ExitCodes.VALIDATION_ERROR, {
      color: false,
    });

    expect(text).toBe('Error: Unable to read transactions: bad quote\n');
  });

  it('should append the stack trace on request', () => {
    const error = new Error('boom');
    error.stack = 'Error: boom\n    at test';

    const text = formatCliError(error, ExitCodes.GENERAL_ERROR, { color: false, showStack: true });

    expect(text).toBe('Error: boom\n\nError: boom\n    at test\n');
  });

  it('should colour the label when enabled', () => {
    const text = formatCliError(new Error('boom'), ExitCodes.GENERAL_ERROR, { color: true });

    expect(text).toBe('\x1b[31mError:\x1b[39m boom\n');
  });
});

describe('displayCliError', () => {
  it('should write to the given stderr stream only', () => {
    const stderr = { write: vi.fn() };

    displayCliError(new Error('Invalid options'), ExitCodes.INVALID_ARGS, { stderr, color: false });

    expect(stderr.write).toHaveBeenCalledOnce();
    expect(stderr.write).toHaveBeenCalledWith(
      'Error: Invalid options\nCheck your command arguments and try again. Run with --help for usage information.\n'
    );
  });
});
