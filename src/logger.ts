/**
 * Structured logging for rewrite attempts.
 *
 * Entries are kept in memory so callers (and tests) can inspect why a
 * location produced no rewrite; console output is opt-in. Only the newest
 * `maxEntries` entries are kept.
 */

import { reportInvalidOption } from './report';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Which rewrite is being attempted (`logicalAnd` or `guard`). */
  phase?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export const DEFAULT_MAX_ENTRIES = 1000;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private context: LogContext = {};
  private readonly shouldLog: boolean;
  private readonly maxEntries: number;

  constructor(level: LogLevel = 'info', shouldLog = false, maxEntries = DEFAULT_MAX_ENTRIES) {
    this.level = Logger.checkLevel(level);
    this.shouldLog = shouldLog;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      reportInvalidOption('maxEntries', 'expected a positive integer');
    }
    this.maxEntries = maxEntries;
  }

  private static checkLevel(level: LogLevel): LogLevel {
    if (!isLogLevel(level)) {
      return reportInvalidOption('level', `expected one of ${LOG_LEVELS.join(', ')}`);
    }
    return level;
  }

  setLevel(level: LogLevel): void {
    this.level = Logger.checkLevel(level);
  }

  /**
   * Runs `task` with `context` merged into the context of its entries, then
   * restores the previous context.
   */
  withContext<T>(context: Partial<LogContext>, task: () => T): T {
    const previous = this.context;
    this.context = { ...previous, ...context };
    try {
      return task();
    } finally {
      this.context = previous;
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(this.context).length > 0 && { context: { ...this.context } }),
      ...(data && Object.keys(data).length > 0 && { data })
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    if (this.shouldLog) {
      this.consoleLog(level, this.format(entry));
    }
  }

  private format(entry: LogEntry): string {
    const prefix = entry.context?.phase ? `[${entry.context.phase}] ` : '';

    if (!entry.data) return prefix + entry.message;

    const details = Object.entries(entry.data)
      .map(([key, value]) =>
        typeof value === 'object' && value !== null
          ? `${key}: ${JSON.stringify(value)}`
          : `${key}: ${String(value)}`
      )
      .join(', ');
    return `${prefix}${entry.message}\n  ${details}`;
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        console.debug(message);
        break;
      case 'info':
        console.log(message);
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'error':
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Entries at or above `level`.
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LOG_LEVELS.indexOf(level);
    return this.entries.filter(entry => LOG_LEVELS.indexOf(entry.level) >= index);
  }

  clear(): void {
    this.entries = [];
  }
}
