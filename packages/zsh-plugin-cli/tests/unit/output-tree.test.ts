/**
 * Unit tests for output tree planning
 */

import { planOutputTree, pluginDirectoryName } from '../../src/core/emitter';
import { resolveOptions } from '../../src/core/options';
import { parsePluginName } from '../../src/utils/validation';
import type { OptionOverrides, PresetName } from '../../src/types/plugin';

function plannedPaths(name: string, preset: PresetName, overrides: OptionOverrides = {}): string[] {
  return planOutputTree(parsePluginName(name), resolveOptions(preset, overrides)).map(
    (entry) => entry.path
  );
}

describe('pluginDirectoryName', () => {
  it('should wrap the raw name', () => {
    expect(pluginDirectoryName(parsePluginName('my-tool'))).toBe('zsh-my-tool-plugin');
  });
});

describe('planOutputTree', () => {
  it('should plan the complete tree in creation order', () => {
    expect(plannedPaths('containers', 'complete')).toEqual([
      'containers.plugin.zsh',
      'containers.bash',
      'functions',
      'functions/containers_example',
      'bin',
      'bin/.gitkeep',
      '.github',
      '.github/workflows',
      '.github/workflows/shell.yml',
      '.gitignore',
      'Makefile',
      'README.md',
    ]);
  });

  it('should plan only the script and README for the minimal preset', () => {
    expect(plannedPaths('x', 'minimal')).toEqual(['x.plugin.zsh', 'README.md']);
  });

  it('should plan tooling files without a GitHub directory for the simple preset', () => {
    expect(plannedPaths('x', 'simple')).toEqual([
      'x.plugin.zsh',
      '.gitignore',
      'Makefile',
      'README.md',
    ]);
  });

  it('should drop the workflow, Makefile and .gitignore when no tool is enabled', () => {
    expect(plannedPaths('x', 'complete', { noShellCheck: true, noShellSpec: true })).toEqual([
      'x.plugin.zsh',
      'x.bash',
      'functions',
      'functions/x_example',
      'bin',
      'bin/.gitkeep',
      'README.md',
    ]);
  });

  it('should keep the workflow while one tool is enabled', () => {
    expect(plannedPaths('x', 'complete', { noShellSpec: true })).toContain(
      '.github/workflows/shell.yml'
    );
  });

  it('should pick the template for each file', () => {
    const entries = planOutputTree(parsePluginName('x'), resolveOptions('complete'));
    const templates = entries.flatMap((entry) =>
      entry.kind === 'file' ? [`${entry.path}=${entry.template}`] : []
    );

    expect(templates).toEqual([
      'x.plugin.zsh=plugin-source',
      'x.bash=bash-wrapper',
      'functions/x_example=function-example',
      'bin/.gitkeep=bin-keep',
      '.github/workflows/shell.yml=shell-workflow',
      '.gitignore=gitignore',
      'Makefile=makefile',
      'README.md=readme',
    ]);
  });

  it('should use the zplugins main script when requested', () => {
    const [main] = planOutputTree(
      parsePluginName('x'),
      resolveOptions('minimal', { useZplugins: true })
    );

    expect(main).toEqual({
      kind: 'file',
      path: 'x.plugin.zsh',
      template: 'plugin-source-zplugins',
    });
  });
});
