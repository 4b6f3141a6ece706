/**
 * Logging utility with levels and colors
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Settings shared by the root logger and every child
 */
interface LoggerSettings {
  level: LogLevel;
  quiet: boolean;
}

/**
 * Logger class with configurable levels.
 *
 * Everything is written to stderr; stdout belongs to the event stream.
 */
export class Logger {
  private readonly settings: LoggerSettings;
  private readonly scope?: string;

  constructor(scope?: string, settings: LoggerSettings = { level: 'info', quiet: false }) {
    this.scope = scope;
    this.settings = settings;
  }

  /**
   * Create a prefixed logger that follows this logger's level and quiet mode
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope, this.settings);
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel) {
    this.settings.level = level;
  }

  /**
   * Set quiet mode
   */
  setQuiet(quiet: boolean) {
    this.settings.quiet = quiet;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.settings.quiet) {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.settings.level];
  }

  private format(tag: string, message: string): string {
    return this.scope ? `[${tag}] [${this.scope}] ${message}` : `[${tag}] ${message}`;
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      console.error(chalk.gray(this.format('DEBUG', message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.error(chalk.blue(this.format('INFO', message)), ...args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      console.error(chalk.yellow(this.format('WARN', message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      console.error(chalk.red(this.format('ERROR', message)), ...args);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
