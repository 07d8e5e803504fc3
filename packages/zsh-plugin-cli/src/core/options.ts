/**
 * Generation option presets and resolution
 */

import {
  PRESET_NAMES,
  type GenerationOptions,
  type OptionOverrides,
  type PresetFlags,
  type PresetName,
} from '../types/plugin.js';

export const PRESETS: Readonly<Record<PresetName, Readonly<PresetFlags>>> = Object.freeze({
  minimal: Object.freeze({
    addBinDir: false,
    addBashWrapper: false,
    noAliases: true,
    noFunctionsDir: true,
    noGitInit: true,
    noGithubDir: true,
    noShellCheck: true,
    noShellSpec: true,
  }),
  simple: Object.freeze({
    addBinDir: false,
    addBashWrapper: false,
    noAliases: false,
    noFunctionsDir: true,
    noGitInit: false,
    noGithubDir: true,
    noShellCheck: false,
    noShellSpec: false,
  }),
  complete: Object.freeze({
    addBinDir: true,
    addBashWrapper: true,
    noAliases: false,
    noFunctionsDir: false,
    noGitInit: false,
    noGithubDir: false,
    noShellCheck: false,
    noShellSpec: false,
  }),
});

/** Preset applied when none is named. */
export const DEFAULT_PRESET: PresetName = 'complete';

export const DEFAULT_GITHUB_USER = 'github-user';

export function isPresetName(value: unknown): value is PresetName {
  return PRESET_NAMES.some((preset) => preset === value);
}

/**
 * Merge preset defaults with explicitly set options; an explicit value always
 * wins over the preset.
 */
export function resolveOptions(
  preset: PresetName | undefined,
  overrides: OptionOverrides = {}
): Readonly<GenerationOptions> {
  const base = PRESETS[preset ?? DEFAULT_PRESET];

  return Object.freeze({
    addBinDir: overrides.addBinDir ?? base.addBinDir,
    addBashWrapper: overrides.addBashWrapper ?? base.addBashWrapper,
    noAliases: overrides.noAliases ?? base.noAliases,
    noFunctionsDir: overrides.noFunctionsDir ?? base.noFunctionsDir,
    noGitInit: overrides.noGitInit ?? base.noGitInit,
    noGithubDir: overrides.noGithubDir ?? base.noGithubDir,
    noShellCheck: overrides.noShellCheck ?? base.noShellCheck,
    noShellSpec: overrides.noShellSpec ?? base.noShellSpec,
    useZplugins: overrides.useZplugins ?? false,
    shortDescription: overrides.shortDescription,
    githubUser: overrides.githubUser ?? DEFAULT_GITHUB_USER,
  });
}

/**
 * Whether any shell tooling (shellcheck or shellspec) is enabled
 */
export function hasShellTooling(options: PresetFlags): boolean {
  return !(options.noShellCheck && options.noShellSpec);
}
