export {
  LOG_LEVELS,
  initLogger,
  getLogger,
  flushLoggers,
  isLogLevel,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { BufferedSink } from './buffered-sink.js';
