export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

/**
 * Sink for formatted log lines. Defaults to stderr because stdout carries
 * the MCP protocol when running as a stdio server.
 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Centralized logging service
 */
export class LoggingService {
  private readonly name: string;
  private logLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(name: string = 'docfill', logLevel: LogLevel = LogLevel.INFO, sink: LogSink = stderrSink) {
    this.name = name;
    this.logLevel = logLevel;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      this.log('DEBUG', message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.log('INFO', message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      this.log('WARN', message, ...args);
    }
  }

  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      const detail = error instanceof Error ? error.message : error;
      this.log('ERROR', message, ...(detail === undefined ? args : [detail, ...args]));
      if (error instanceof Error && error.stack) {
        this.sink(`  Stack: ${error.stack}`);
      }
    }
  }

  private log(level: string, message: string, ...args: unknown[]): void {
    const timestamp = new Date().toISOString();
    this.sink(`[${timestamp}] [${level}] [${this.name}] ${message}`);

    args.forEach(arg => {
      if (typeof arg === 'object' && arg !== null) {
        this.sink(`  ${JSON.stringify(arg, null, 2)}`);
      } else {
        this.sink(`  ${String(arg)}`);
      }
    });
  }
}

/**
 * Parse a LOG_LEVEL string, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || '').trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

// Global logger instance
let globalLogger: LoggingService | undefined;

export function initializeLogger(name?: string, logLevel?: LogLevel, sink?: LogSink): LoggingService {
  globalLogger = new LoggingService(name, logLevel, sink);
  return globalLogger;
}

export function getLogger(): LoggingService {
  if (!globalLogger) {
    globalLogger = new LoggingService();
  }
  return globalLogger;
}
