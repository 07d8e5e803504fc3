/**
 * Configuration management for zsh-plugin
 *
 * Optional per-user defaults read from a JSON file.
 */

import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigurationError } from './error-handler.js';
import { PRESET_NAMES } from '../types/plugin.js';
import { DEFAULT_GITHUB_USER } from '../core/options.js';

const configSchema = z
  .object({
    githubUser: z.string().min(1).optional(),
    preset: z.enum(PRESET_NAMES).optional(),
    outputDir: z.string().min(1).optional(),
    useZplugins: z.boolean().optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof configSchema>;

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Config file location
 * Priority order:
 * 1. ZSH_PLUGIN_CONFIG
 * 2. $XDG_CONFIG_HOME/zsh-plugin/config.json
 * 3. ~/.config/zsh-plugin/config.json
 */
export function getConfigPath(env: Environment = process.env): string {
  if (env.ZSH_PLUGIN_CONFIG) {
    return env.ZSH_PLUGIN_CONFIG;
  }

  const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, 'zsh-plugin', 'config.json');
}

/**
 * Load and validate the config file; a missing file yields an empty config
 *
 * @throws ConfigurationError if the file is unreadable, not JSON or fails validation
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<CliConfig> {
  if (!(await fs.pathExists(configPath))) {
    return {};
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigurationError('Failed to read configuration file', { path: configPath }, {
      cause: error,
    });
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid configuration file: ${issues.join('; ')}`, {
      path: configPath,
    });
  }

  return parsed.data;
}

/**
 * GitHub user for generated URLs
 * Priority order: command line, ZSH_PLUGIN_GITHUB_USER, config file, USER, fallback
 */
export function resolveGithubUser(
  cliValue: string | undefined,
  config: CliConfig,
  env: Environment = process.env
): string {
  return (
    cliValue ||
    env.ZSH_PLUGIN_GITHUB_USER ||
    config.githubUser ||
    env.USER ||
    DEFAULT_GITHUB_USER
  );
}
