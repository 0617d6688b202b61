import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions {
  path: string;
}

/**
 * JSON-lines sink behind `TXLEDGER_LOG_FILE`. Each batch is one append.
 * Exposed through the `@txledger/logger/file` subpath.
 */
export class FileSink extends BufferedSink {
  private readonly path: string;

  constructor(options: FileSinkOptions) {
    super();
    mkdirSync(dirname(options.path), { recursive: true });
    this.path = options.path;
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    appendFileSync(this.path, entries.map(toJsonLine).join(''), 'utf8');
  }
}

function toJsonLine(entry: LogEntry): string {
  const { timestamp, level, category, msg, context } = entry;
  return `${JSON.stringify({ timestamp: timestamp.toISOString(), level, category, msg, ...(context ? { context } : {}) })}\n`;
}
