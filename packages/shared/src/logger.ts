export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: LogContext;
}

const DEFAULT_MAX_ENTRIES = 2000;

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel = LogLevel.INFO;
  private logs: LogEntry[] = [];
  private maxEntries = DEFAULT_MAX_ENTRIES;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Bounds the in-memory history kept for `getLogs()`.
   * Oldest entries are dropped first.
   */
  setMaxEntries(maxEntries: number): void {
    this.maxEntries = Math.max(1, Math.floor(maxEntries));
    this.trim();
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.logLevel) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context,
    };

    this.logs.push(entry);
    this.trim();

    const levelName = LogLevel[level];
    const timestamp = new Date(entry.timestamp).toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';

    console.log(`[${timestamp}] ${levelName}: ${message}${contextStr}`);
  }

  private trim(): void {
    if (this.logs.length > this.maxEntries) {
      this.logs.splice(0, this.logs.length - this.maxEntries);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  clearLogs(): void {
    this.logs = [];
  }
}

/**
 * Parses a level name such as "debug" or "WARN". Unknown names fall back to INFO.
 */
export function parseLogLevel(name: string | undefined): LogLevel {
  switch (name?.trim().toUpperCase()) {
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
