#!/usr/bin/env node

/**
 * zsh-plugin - Main Entry Point
 */

import { runCLI } from './cli.js';
import { handleError } from './utils/error-handler.js';

export { parsePluginName, validatePluginName, isValidationError } from './utils/validation.js';
export {
  PRESETS,
  DEFAULT_PRESET,
  DEFAULT_GITHUB_USER,
  isPresetName,
  resolveOptions,
  hasShellTooling,
} from './core/options.js';
export { buildTemplateContext, toDisplayName } from './core/context.js';
export { TemplateRenderer, templateRenderer } from './core/renderer/index.js';
export {
  PluginEmitter,
  GitRepositoryInitializer,
  planOutputTree,
  pluginDirectoryName,
  type EmitResult,
  type PluginEmitterOptions,
  type RepositoryInitializer,
  type RepositoryOutcome,
} from './core/emitter/index.js';
export { TEMPLATES } from './templates/index.js';
export { getConfigPath, loadConfig, resolveGithubUser, type CliConfig } from './utils/config.js';
export {
  ScaffoldError,
  ConfigurationError,
  InvalidNameError,
  PathExistsError,
  IoError,
  TemplateError,
  SubprocessFailedError,
  getExitCode,
  formatError,
} from './utils/error-handler.js';
export { CliLogger, createLogger, logger } from './utils/logger.js';
export type * from './types/plugin.js';
export type * from './types/template.js';
export type * from './types/output.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  try {
    await runCLI();
  } catch (error) {
    handleError(error);
  }
}

if (require.main === module) {
  void main();
}
