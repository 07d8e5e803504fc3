/**
 * Output tree planning
 *
 * Decides which directories and files a scaffold contains, in creation order,
 * without touching the filesystem. Paths are relative to the plugin root and
 * use `/` separators.
 */

import { hasShellTooling } from '../options.js';
import type { OutputEntry } from '../../types/output.js';
import type { GenerationOptions, PluginName } from '../../types/plugin.js';

/**
 * Directory created for a plugin, e.g. `zsh-containers-plugin`
 */
export function pluginDirectoryName(name: PluginName): string {
  return `zsh-${name.value}-plugin`;
}

export function planOutputTree(
  name: PluginName,
  options: Readonly<GenerationOptions>
): OutputEntry[] {
  const entries: OutputEntry[] = [
    {
      kind: 'file',
      path: `${name.value}.plugin.zsh`,
      template: options.useZplugins ? 'plugin-source-zplugins' : 'plugin-source',
    },
  ];

  if (options.addBashWrapper) {
    entries.push({ kind: 'file', path: `${name.value}.bash`, template: 'bash-wrapper' });
  }

  if (!options.noFunctionsDir) {
    entries.push(
      { kind: 'directory', path: 'functions' },
      { kind: 'file', path: `functions/${name.value}_example`, template: 'function-example' }
    );
  }

  if (options.addBinDir) {
    entries.push(
      { kind: 'directory', path: 'bin' },
      { kind: 'file', path: 'bin/.gitkeep', template: 'bin-keep' }
    );
  }

  const tooling = hasShellTooling(options);

  if (!options.noGithubDir && tooling) {
    entries.push(
      { kind: 'directory', path: '.github' },
      { kind: 'directory', path: '.github/workflows' },
      { kind: 'file', path: '.github/workflows/shell.yml', template: 'shell-workflow' }
    );
  }

  if (tooling) {
    entries.push(
      { kind: 'file', path: '.gitignore', template: 'gitignore' },
      { kind: 'file', path: 'Makefile', template: 'makefile' }
    );
  }

  entries.push({ kind: 'file', path: 'README.md', template: 'readme' });

  return entries;
}
