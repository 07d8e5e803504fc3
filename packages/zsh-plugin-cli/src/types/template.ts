/**
 * Template Type Definitions
 */

export type TemplateId =
  | 'plugin-source'
  | 'plugin-source-zplugins'
  | 'bash-wrapper'
  | 'function-example'
  | 'bin-keep'
  | 'makefile'
  | 'gitignore'
  | 'shell-workflow'
  | 'readme';

export type TemplateValue = string | boolean;

export type TemplateValues = Readonly<Record<string, TemplateValue>>;

/**
 * Values available to every embedded template
 */
export type TemplateContext = {
  readonly plugin_name: string;
  readonly plugin_display_name: string;
  readonly plugin_var: string;
  readonly github_user: string;
  readonly short_description: string;
  readonly include_aliases: boolean;
  readonly include_bash_wrapper: boolean;
  readonly include_bin_dir: boolean;
  readonly include_functions_dir: boolean;
  readonly include_git_init: boolean;
  readonly include_github_dir: boolean;
  readonly include_shell_check: boolean;
  readonly include_shell_spec: boolean;
  readonly use_zplugins: boolean;
};
