/**
 * Error Handler for zsh-plugin
 *
 * Custom error types, error formatting, and exit codes.
 */

import chalk from 'chalk';
import { logger } from './logger.js';
import { getErrorMessage } from '../types/errors.js';
import type { NameErrorKind } from '../types/plugin.js';

export type ScaffoldErrorCode =
  | 'CONFIG_ERROR'
  | 'INVALID_NAME'
  | 'PATH_EXISTS'
  | 'IO_ERROR'
  | 'TEMPLATE_ERROR'
  | 'SUBPROCESS_FAILED';

/**
 * Map error codes to process exit codes
 */
export const EXIT_CODE_MAP: Record<ScaffoldErrorCode | 'UNKNOWN_ERROR', number> = {
  CONFIG_ERROR: 1,
  INVALID_NAME: 2,
  PATH_EXISTS: 3,
  IO_ERROR: 4,
  TEMPLATE_ERROR: 5,
  SUBPROCESS_FAILED: 6,
  UNKNOWN_ERROR: 1,
};

/**
 * Base error class for all CLI errors
 */
export class ScaffoldError extends Error {
  public readonly exitCode: number;

  constructor(
    message: string,
    public readonly code: ScaffoldErrorCode,
    public readonly help?: string,
    public readonly context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ScaffoldError';
    this.exitCode = EXIT_CODE_MAP[code];
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ScaffoldError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(
      message,
      'CONFIG_ERROR',
      'Fix or remove the configuration file, or point ZSH_PLUGIN_CONFIG at a valid one.',
      context,
      options
    );
    this.name = 'ConfigurationError';
  }
}

const NAME_ERROR_MESSAGES: Record<NameErrorKind, string> = {
  empty: 'Name cannot be empty',
  'invalid-initial-char': 'Initial character must be an ASCII alphabetic character',
  'invalid-char': "Characters must be ASCII alphanumeric, '-', or '_'",
};

/**
 * Plugin name rejected by the validator
 */
export class InvalidNameError extends ScaffoldError {
  constructor(
    public readonly kind: NameErrorKind,
    name: string
  ) {
    super(
      NAME_ERROR_MESSAGES[kind],
      'INVALID_NAME',
      'Plugin names must start with a letter and can only contain letters, digits, hyphens and underscores.',
      { name }
    );
    this.name = 'InvalidNameError';
  }
}

/**
 * Scaffold target already present on disk
 */
export class PathExistsError extends ScaffoldError {
  constructor(public readonly path: string) {
    super(
      `Target path already exists: ${path}`,
      'PATH_EXISTS',
      'Choose another plugin name or output directory, or remove the existing directory.',
      { path }
    );
    this.name = 'PathExistsError';
  }
}

/**
 * Filesystem read/write failure
 */
export class IoError extends ScaffoldError {
  constructor(message: string, path: string, cause: unknown) {
    super(
      `${message}: ${getErrorMessage(cause)}`,
      'IO_ERROR',
      'Check that the output directory is writable and has free space.',
      { path },
      { cause }
    );
    this.name = 'IoError';
  }
}

/**
 * Malformed embedded template or missing context key
 */
export class TemplateError extends ScaffoldError {
  constructor(message: string, template: string, line?: number) {
    super(
      message,
      'TEMPLATE_ERROR',
      'This is a defect in the bundled templates; please report it.',
      line === undefined ? { template } : { template, line }
    );
    this.name = 'TemplateError';
  }
}

/**
 * External command exited non-zero or could not be launched
 */
export class SubprocessFailedError extends ScaffoldError {
  constructor(
    public readonly command: string,
    message: string,
    public readonly commandExitCode?: number,
    cause?: unknown
  ) {
    super(
      message,
      'SUBPROCESS_FAILED',
      "Ensure that Git is installed and accessible, or use the '--no-git-init' option to skip Git initialization.",
      commandExitCode === undefined ? { command } : { command, exitCode: commandExitCode },
      cause === undefined ? undefined : { cause }
    );
    this.name = 'SubprocessFailedError';
  }
}

/**
 * Get exit code for an error
 */
export function getExitCode(error: unknown): number {
  if (error instanceof ScaffoldError) {
    return error.exitCode;
  }

  return EXIT_CODE_MAP.UNKNOWN_ERROR;
}

/**
 * Format error for display
 */
export function formatError(error: unknown, verbose: boolean = false): string {
  const lines: string[] = [];

  if (error instanceof ScaffoldError) {
    lines.push(chalk.red.bold(`${error.name}: ${error.message}`));

    const details = Object.entries(error.context ?? {});
    for (const [key, value] of details) {
      lines.push(`├─ ${chalk.gray(key)}: ${JSON.stringify(value)}`);
    }
    if (error.help) {
      lines.push(`└─ ${chalk.yellow('Help')}: ${error.help}`);
    }
  } else {
    lines.push(chalk.red.bold(`Error: ${getErrorMessage(error)}`));
  }

  if (verbose && error instanceof Error && error.stack) {
    lines.push('');
    lines.push(chalk.gray('Stack Trace:'));
    lines.push(chalk.gray(error.stack));
  }

  return lines.join('\n');
}

/**
 * Handle error and exit
 */
export function handleError(error: unknown, verbose: boolean = false): never {
  console.error(formatError(error, verbose));

  const exitCode = getExitCode(error);
  logger.debug(`Exiting with code ${exitCode}: ${getErrorMessage(error)}`);

  process.exit(exitCode);
}

/**
 * Global error handler for uncaught exceptions
 */
export function setupGlobalErrorHandlers(verbose: boolean = false): void {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', error.message);
    handleError(error, verbose);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection:', getErrorMessage(reason));
    handleError(reason, verbose);
  });

  process.on('SIGINT', () => {
    console.log('\n' + chalk.yellow('Interrupted by user'));
    process.exit(130);
  });

  process.on('SIGTERM', () => {
    console.log('\n' + chalk.yellow('Terminated'));
    process.exit(143);
  });
}
