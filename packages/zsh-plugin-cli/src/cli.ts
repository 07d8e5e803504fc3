/**
 * CLI Setup and Command Registration for zsh-plugin
 *
 * Sets up Commander.js with the init command and global options.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from './utils/logger.js';
import { setupGlobalErrorHandlers } from './utils/error-handler.js';
import { createInitCommand } from './commands/init.js';

export const CLI_VERSION = '0.1.0';

export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
  /** false when `--no-color` is given */
  color?: boolean;
};

/**
 * Create and configure the CLI program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('zsh-plugin')
    .description('Scaffold new Zsh plugins')
    .version(CLI_VERSION, '-V, --version', 'Output the current version');

  program
    .option('-v, --verbose', 'Verbose output (debug level)', false)
    .option('-q, --quiet', 'Minimal output (errors only)', false)
    .option('--no-color', 'Disable colors');

  return program;
}

/**
 * Apply global options before any command runs
 */
export function setupCLI(): Command {
  const program = createCLI();

  program.hook('preAction', (thisCommand: Command) => {
    const opts = thisCommand.opts<GlobalOptions>();

    if (opts.color === false) {
      chalk.level = 0;
      logger.setColors(false);
    }
    if (opts.quiet) {
      logger.setQuiet(true);
    }
    if (opts.verbose) {
      logger.setVerbose(true);
    }

    setupGlobalErrorHandlers(opts.verbose || false);

    logger.debug('Global options:', opts);
  });

  return program;
}

/**
 * Register all commands (called from index.ts)
 */
export function registerCommands(program: Command): void {
  program.addCommand(createInitCommand());
}

/**
 * Parse CLI arguments and execute
 */
export async function runCLI(argv?: string[]): Promise<void> {
  const program = setupCLI();
  registerCommands(program);

  await program.parseAsync(argv || process.argv);
}
