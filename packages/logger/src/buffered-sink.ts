import type { LogEntry, Sink } from './logger.js';

/**
 * Base class for sinks that collect the entries logged during one tick and
 * write them as a single batch on the next tick, or on `flush()`.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private scheduled = false;

  protected abstract writeBatch(entries: readonly LogEntry[]): void;

  write(entry: LogEntry): void {
    this.pending.push(entry);
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Write pending entries now. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    this.scheduled = false;
    if (this.pending.length === 0) return;

    const entries = this.pending;
    this.pending = [];
    this.writeBatch(entries);
  }
}
