import { BufferedSink } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean;
  stream?: Pick<NodeJS.WritableStream, 'write'>;
}

/**
 * Human-readable diagnostics sink. Every level goes to stderr: stdout carries
 * the account snapshot and must stay machine-readable.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {context}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly stream: Pick<NodeJS.WritableStream, 'write'>;

  constructor(options?: ConsoleSinkOptions) {
    super();
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  protected writeBatch(entries: readonly LogEntry[]): void {
    this.stream.write(entries.map((entry) => this.formatEntry(entry)).join(''));
  }

  private formatEntry(entry: LogEntry): string {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const category = `[${entry.category}]`;
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';

    return `${time} ${level} ${category} ${entry.msg}${context}\n`;
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: string): string {
    const upper = level.toUpperCase().padEnd(5);
    if (!this.color) return upper;

    switch (level) {
      case 'trace':
        return `\x1b[90m${upper}\x1b[0m`; // gray
      case 'debug':
        return `\x1b[36m${upper}\x1b[0m`; // cyan
      case 'info':
        return `\x1b[32m${upper}\x1b[0m`; // green
      case 'warn':
        return `\x1b[33m${upper}\x1b[0m`; // yellow
      case 'error':
        return `\x1b[31m${upper}\x1b[0m`; // red
      default:
        return upper;
    }
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs: string[] = [];
    for (const [key, value] of Object.entries(context)) {
      pairs.push(`${key}=${JSON.stringify(value)}`);
    }
    return `{${pairs.join(', ')}}`;
  }
}
