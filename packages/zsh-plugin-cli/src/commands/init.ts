/**
 * Init Command
 *
 * Scaffold a new Zsh plugin directory
 */

import { Command, Option } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import path from 'path';
import { PluginEmitter, type EmitResult } from '../core/emitter/index.js';
import { isPresetName, resolveOptions } from '../core/options.js';
import { parsePluginName } from '../utils/validation.js';
import { getConfigPath, loadConfig, resolveGithubUser } from '../utils/config.js';
import { formatError, handleError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';
import { PRESET_NAMES, type OptionOverrides, type PresetName } from '../types/plugin.js';

export interface InitArguments {
  preset?: PresetName;
  overrides: OptionOverrides;
  output?: string;
}

export interface InitDependencies {
  emitter?: PluginEmitter;
  configPath?: string;
  cwd?: string;
}

export type InitHandler = (name: string, command: Command) => Promise<void>;

type BooleanField =
  | 'addBinDir'
  | 'addBashWrapper'
  | 'noAliases'
  | 'noFunctionsDir'
  | 'noGitInit'
  | 'noGithubDir'
  | 'noShellCheck'
  | 'noShellSpec'
  | 'useZplugins';

// `--no-x` options are stored by commander under the positive attribute name.
const BOOLEAN_OPTIONS: ReadonlyArray<{ attribute: string; field: BooleanField; negated: boolean }> =
  [
    { attribute: 'addBinDir', field: 'addBinDir', negated: false },
    { attribute: 'addBashWrapper', field: 'addBashWrapper', negated: false },
    { attribute: 'aliases', field: 'noAliases', negated: true },
    { attribute: 'functionsDir', field: 'noFunctionsDir', negated: true },
    { attribute: 'gitInit', field: 'noGitInit', negated: true },
    { attribute: 'githubDir', field: 'noGithubDir', negated: true },
    { attribute: 'shellCheck', field: 'noShellCheck', negated: true },
    { attribute: 'shellSpec', field: 'noShellSpec', negated: true },
    { attribute: 'useZplugins', field: 'useZplugins', negated: false },
  ];

function fromCommandLine(command: Command, attribute: string): boolean {
  return command.getOptionValueSource(attribute) === 'cli';
}

function stringOption(command: Command, attribute: string): string | undefined {
  const value: unknown = command.getOptionValue(attribute);
  return fromCommandLine(command, attribute) && typeof value === 'string' ? value : undefined;
}

/**
 * Read the options the user actually typed; defaults never count as overrides
 */
export function collectInitArguments(command: Command): InitArguments {
  const overrides: OptionOverrides = {};

  for (const option of BOOLEAN_OPTIONS) {
    const value: unknown = command.getOptionValue(option.attribute);
    if (fromCommandLine(command, option.attribute) && typeof value === 'boolean') {
      overrides[option.field] = option.negated ? !value : value;
    }
  }

  const description = stringOption(command, 'description');
  if (description !== undefined) {
    overrides.shortDescription = description;
  }

  const githubUser = stringOption(command, 'githubUser');
  if (githubUser !== undefined) {
    overrides.githubUser = githubUser;
  }

  const template = stringOption(command, 'template');

  return {
    preset: isPresetName(template) ? template : undefined,
    overrides,
    output: stringOption(command, 'output'),
  };
}

/**
 * Combine command line arguments with the config file and scaffold the plugin
 */
export async function executeInit(
  name: string,
  args: InitArguments,
  deps: InitDependencies = {}
): Promise<EmitResult> {
  const pluginName = parsePluginName(name);
  const config = await loadConfig(deps.configPath ?? getConfigPath());

  const options = resolveOptions(args.preset ?? config.preset, {
    ...args.overrides,
    useZplugins: args.overrides.useZplugins ?? config.useZplugins,
    githubUser: resolveGithubUser(args.overrides.githubUser, config),
  });
  logger.debug('Resolved options:', options);

  const parent = path.resolve(deps.cwd ?? process.cwd(), args.output ?? config.outputDir ?? '.');
  const emitter = deps.emitter ?? new PluginEmitter();

  return emitter.emit(parent, pluginName, options);
}

/**
 * Default action: scaffold with a spinner and report the outcome
 */
export async function runInit(
  name: string,
  command: Command,
  deps: InitDependencies = {}
): Promise<void> {
  const verbose = logger.getLevel() === 'debug';
  const spinner = ora({ text: `Creating zsh-${name}-plugin...`, isSilent: logger.isQuiet() });

  try {
    const args = collectInitArguments(command);
    spinner.start();

    const emitter =
      deps.emitter ??
      new PluginEmitter({
        onProgress: (entry) => {
          spinner.text = `Created ${entry.path}`;
        },
      });

    const result = await executeInit(name, args, { ...deps, emitter });
    const location = path.relative(process.cwd(), result.root) || result.root;

    if (result.repository.state === 'failed') {
      spinner.warn(`Plugin scaffold created in ${location}, but Git initialization failed`);
      console.error(formatError(result.repository.error, verbose));
      process.exitCode = result.repository.error.exitCode;
      return;
    }

    spinner.succeed(`Plugin scaffold created in ${location}`);

    if (!logger.isQuiet()) {
      const script = `${name}.plugin.zsh`;
      console.log();
      console.log(chalk.bold('Next steps:'));
      console.log();
      console.log(`  1. cd ${location}`);
      console.log(`  2. Edit ${script}`);
      console.log(`  3. source ${path.join(location, script)}`);
      console.log();
    }
  } catch (error) {
    spinner.fail('Failed to create plugin scaffold');
    handleError(error, verbose);
  }
}

export function createInitCommand(handler: InitHandler = runInit): Command {
  return new Command('init')
    .description('Create a new Zsh plugin in zsh-<name>-plugin')
    .argument('<name>', 'Plugin name')
    .addOption(
      new Option('-t, --template <preset>', 'Preset to start from').choices([...PRESET_NAMES])
    )
    .option('-a, --add-bin-dir', 'Add a bin directory to the plugin')
    .option('-w, --add-bash-wrapper', 'Add a Bash wrapper script')
    .option('-A, --no-aliases', 'Do not generate alias support')
    .option('-C, --no-shell-check', 'Do not add shellcheck linting')
    .option('-F, --no-functions-dir', 'Do not add an autoload functions directory')
    .option('-G, --no-git-init', 'Do not initialize a Git repository')
    .option('-H, --no-github-dir', 'Do not add a GitHub workflow')
    .option('-S, --no-shell-spec', 'Do not add shellspec tests')
    .option('-z, --use-zplugins', 'Build the plugin on the zplugins helper functions')
    .option('-d, --description <text>', 'Short description of the plugin')
    .option('-u, --github-user <user>', 'GitHub user name used in repository URLs')
    .option('-o, --output <dir>', 'Parent directory for the plugin (default: current directory)')
    .action(async (name: string, _options: unknown, command: Command) => {
      await handler(name, command);
    });
}
