/**
 * Template context construction
 */

import type { GenerationOptions, PluginName } from '../types/plugin.js';
import type { TemplateContext } from '../types/template.js';

/**
 * Human readable plugin name used in comments, e.g. `my-plugin_x` → `My Plugin X`
 */
export function toDisplayName(value: string): string {
  return value
    .split(/[-_]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

export function buildTemplateContext(
  name: PluginName,
  options: Readonly<GenerationOptions>
): TemplateContext {
  return Object.freeze({
    plugin_name: name.value,
    plugin_display_name: toDisplayName(name.value),
    plugin_var: name.shellSafe.toUpperCase(),
    github_user: options.githubUser,
    short_description: options.shortDescription ?? '',
    include_aliases: !options.noAliases,
    include_bash_wrapper: options.addBashWrapper,
    include_bin_dir: options.addBinDir,
    include_functions_dir: !options.noFunctionsDir,
    include_git_init: !options.noGitInit,
    include_github_dir: !options.noGithubDir,
    include_shell_check: !options.noShellCheck,
    include_shell_spec: !options.noShellSpec,
    use_zplugins: options.useZplugins,
  });
}
