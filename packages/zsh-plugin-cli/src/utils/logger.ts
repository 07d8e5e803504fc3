/**
 * Logger for zsh-plugin
 *
 * Leveled console logging with color support and configurable verbosity.
 */

import chalk from 'chalk';
import type { Logger } from '../types/output.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  verbose?: boolean;
  quiet?: boolean;
  colors?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_BADGES: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray.bold,
  info: chalk.blue.bold,
  warn: chalk.yellow.bold,
  error: chalk.red.bold,
};

export class CliLogger implements Logger {
  private level: LogLevel = 'info';
  private quiet: boolean = false;
  private colors: boolean = true;

  constructor(options: LoggerOptions = {}) {
    if (options.level) {
      this.level = options.level;
    }
    if (options.colors !== undefined) {
      this.colors = options.colors;
    }
    if (options.verbose) {
      this.setVerbose(true);
    }
    if (options.quiet) {
      this.setQuiet(true);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(message: string, args: unknown[]): string {
    let formatted = message;

    if (args.length > 0) {
      const argsStr = args
        .map((arg) => (typeof arg === 'object' ? JSON.stringify(arg) : String(arg)))
        .join(' ');
      formatted = `${formatted} ${argsStr}`;
    }

    return formatted;
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    const badge = `[${level.toUpperCase()}]`;
    const output = `${this.colors ? LEVEL_BADGES[level](badge) : badge} ${this.formatMessage(message, args)}`;

    if (level === 'error' || level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('info')) return;

    const badge = '[SUCCESS]';
    console.log(`${this.colors ? chalk.green.bold(badge) : badge} ${this.formatMessage(message, args)}`);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setVerbose(verbose: boolean): void {
    if (verbose && !this.quiet) {
      this.level = 'debug';
    }
  }

  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
    if (quiet) {
      this.level = 'error';
    }
  }

  setColors(colors: boolean): void {
    this.colors = colors;
  }
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): CliLogger {
  return new CliLogger(options);
}

/**
 * Default logger instance for use throughout the CLI
 */
export const logger = createLogger();
