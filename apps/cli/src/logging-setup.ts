import type { ValidatedEnv } from '@txledger/env';
import { ConsoleSink, type LogLevel, type Sink, initLogger } from '@txledger/logger';
import { FileSink } from '@txledger/logger/file';

/**
 * Install the CLI's log sinks: human-readable lines on stderr, plus JSON lines
 * in TXLEDGER_LOG_FILE when it is set. stdout is reserved for the snapshot.
 */
export function setupLogging(env: ValidatedEnv, levelOverride?: LogLevel): void {
  const sinks: Sink[] = [new ConsoleSink({ color: env.TXLEDGER_LOG_COLOR })];

  if (env.TXLEDGER_LOG_FILE) {
    sinks.push(new FileSink({ path: env.TXLEDGER_LOG_FILE }));
  }

  initLogger({ level: levelOverride ?? env.TXLEDGER_LOG_LEVEL, sinks });
}
