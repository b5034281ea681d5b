/**
 * Logging for the exporter.
 *
 * The exporter never logs through process-wide state; a `Logger` is injected
 * and defaults to `NoopLogger`.
 */

/**
 * Log level names accepted by configuration.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'off';

/**
 * Numeric log level values for comparison.
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  off: 4,
};

export type LogContext = Record<string, unknown>;

/**
 * Log entry recorded by the in-memory logger.
 */
export interface LogEntry {
  level: Exclude<LogLevel, 'off'>;
  message: string;
  timestamp: Date;
  context: LogContext;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Console logger writing one JSON object per line.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly context: LogContext;

  constructor(options: { level?: LogLevel; context?: LogContext } = {}) {
    this.threshold = LOG_LEVEL_VALUES[options.level ?? 'info'];
    this.context = options.context ?? {};
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: Exclude<LogLevel, 'off'>, message: string, context?: LogContext): void {
    if (LOG_LEVEL_VALUES[level] < this.threshold) return;

    const merged = { ...this.context, ...context };
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

/**
 * No-op logger.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[] = [];

  debug(message: string, context?: LogContext): void {
    this.addEntry('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.addEntry('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.addEntry('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.addEntry('error', message, context);
  }

  private addEntry(level: LogEntry['level'], message: string, context?: LogContext): void {
    this.entries.push({ level, message, timestamp: new Date(), context: { ...context } });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogEntry['level']): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Builds the logger for a configured level.
 */
export function createLogger(level: LogLevel, context?: LogContext): Logger {
  if (level === 'off') {
    return new NoopLogger();
  }
  return new ConsoleLogger(context !== undefined ? { level, context } : { level });
}
