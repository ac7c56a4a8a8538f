/**
 * @fileoverview Centralized Logging Utility
 *
 * Provides consistent logging for the route handlers with:
 * - A configurable minimum level (see lib/service-config)
 * - Log levels (debug, info, warn, error)
 * - A short in-memory history for debugging and tests
 *
 * @module lib/logger
 */

import { getServiceConfig, LOG_LEVELS, type LogLevel } from '@/lib/service-config';

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
  timestamp: string;
}

class Logger {
  private minLevel: LogLevel;
  private logHistory: LogEntry[] = [];
  private maxHistorySize = 100;

  constructor(minLevel: LogLevel) {
    this.minLevel = minLevel;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    };

    this.logHistory.push(entry);
    if (this.logHistory.length > this.maxHistorySize) {
      this.logHistory.shift();
    }

    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }

    const logMessage = `[${level.toUpperCase()}] ${message}`;
    const payload = data === undefined ? '' : data;

    switch (level) {
      case 'debug':
        console.debug(logMessage, payload);
        break;
      case 'info':
        console.log(logMessage, payload);
        break;
      case 'warn':
        console.warn(logMessage, payload);
        break;
      case 'error':
        console.error(logMessage, payload);
        break;
    }
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    const errorData = error instanceof Error
      ? { message: error.message, stack: error.stack }
      : error;
    this.log('error', message, errorData);
  }

  /**
   * Get recent log history, recorded regardless of the minimum level.
   */
  getHistory(level?: LogLevel): LogEntry[] {
    if (level) {
      return this.logHistory.filter(entry => entry.level === level);
    }
    return [...this.logHistory];
  }

  clearHistory(): void {
    this.logHistory = [];
  }
}

// Export singleton instance
export const logger = new Logger(getServiceConfig().logLevel);
