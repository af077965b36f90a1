/**
 * Logging Service
 *
 * Structured, level-filtered logging for the bridge.
 * Entries are kept in a bounded in-memory ring and written to stderr.
 */

/**
 * Log level type (RFC 5424 severities)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
];

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  /** Component that produced the entry */
  logger: string;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Logging Service
 *
 * Centralized logging with a configurable threshold.
 * Component loggers from createLogger() all write through the global instance.
 */
export class LoggingService {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;

  // Log level hierarchy matching RFC 5424 severity levels
  private static readonly LOG_LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    notice: 2,
    warning: 3,
    error: 4,
    critical: 5,
    alert: 6,
    emergency: 7,
  };

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000) {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
  }

  /**
   * Set minimum log level
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Get current minimum log level
   */
  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Record an entry if it passes the threshold.
   */
  log(
    level: LogLevel,
    logger: string,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      logger,
      message,
      timestamp: Date.now(),
      context,
      error,
    };

    this.logEntries.push(entry);

    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    this.outputToConsole(entry);
  }

  /**
   * Get recent log entries
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minRank = LoggingService.LOG_LEVEL_RANK[minLevel];
      logs = logs.filter((entry) => LoggingService.LOG_LEVEL_RANK[entry.level] >= minRank);
    }

    return logs.slice(-count);
  }

  /**
   * Clear all log entries
   */
  clearLogs(): void {
    this.logEntries = [];
  }

  private shouldLog(level: LogLevel): boolean {
    return LoggingService.LOG_LEVEL_RANK[level] >= LoggingService.LOG_LEVEL_RANK[this.minLevel];
  }

  /**
   * Output log entry to stderr
   */
  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(8);

    let output = `[${timestamp}] ${levelStr} [${entry.logger}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }
}

let globalLogger: LoggingService | null = null;

/**
 * Get or create the global logging service.
 * The threshold comes from LOG_LEVEL when set to a known level.
 */
export function getLogger(): LoggingService {
  if (!globalLogger) {
    const envLevel = process.env.LOG_LEVEL;
    globalLogger = new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}

/**
 * Create a component logger.
 *
 * The returned logger resolves the global service on every call, so
 * setLogger() and setMinLevel() apply to loggers created at module load.
 */
export function createLogger(name: string): Logger {
  const forward =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void =>
      getLogger().log(level, name, message, context);
  const forwardError =
    (level: LogLevel) =>
    (message: string, error?: Error, context?: Record<string, unknown>): void =>
      getLogger().log(level, name, message, context, error);

  return {
    debug: forward('debug'),
    info: forward('info'),
    notice: forward('notice'),
    warning: forward('warning'),
    error: forwardError('error'),
    critical: forwardError('critical'),
  };
}
