/**
 * Plugin Type Definitions
 *
 * Names, presets and generation options for a scaffolded Zsh plugin
 */

export const PRESET_NAMES = ['minimal', 'simple', 'complete'] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

/**
 * A validated plugin name.
 *
 * `value` is the name exactly as given; `shellSafe` has every hyphen replaced
 * with an underscore so it can be used inside shell variable identifiers.
 */
export interface PluginName {
  readonly value: string;
  readonly shellSafe: string;
}

export type NameErrorKind = 'empty' | 'invalid-initial-char' | 'invalid-char';

/**
 * The flags a preset assigns
 */
export interface PresetFlags {
  addBinDir: boolean;
  addBashWrapper: boolean;
  noAliases: boolean;
  noFunctionsDir: boolean;
  noGitInit: boolean;
  noGithubDir: boolean;
  noShellCheck: boolean;
  noShellSpec: boolean;
}

export interface GenerationOptions extends PresetFlags {
  /** Build the main script on the shared `zplugins` helper functions. */
  useZplugins: boolean;
  shortDescription?: string;
  githubUser: string;
}

export type OptionOverrides = Partial<GenerationOptions>;
