export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogContext,
} from './logging.js';
