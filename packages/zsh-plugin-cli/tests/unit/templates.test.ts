/**
 * Unit tests for the bundled templates
 */

import { templateRenderer } from '../../src/core/renderer';
import { buildTemplateContext } from '../../src/core/context';
import { resolveOptions } from '../../src/core/options';
import { parsePluginName } from '../../src/utils/validation';
import { TEMPLATES } from '../../src/templates';
import { PRESET_NAMES, type OptionOverrides, type PresetName } from '../../src/types/plugin';
import type { TemplateId } from '../../src/types/template';

const TEMPLATE_IDS: TemplateId[] = [
  'plugin-source',
  'plugin-source-zplugins',
  'bash-wrapper',
  'function-example',
  'bin-keep',
  'makefile',
  'gitignore',
  'shell-workflow',
  'readme',
];

function render(
  id: TemplateId,
  preset: PresetName,
  overrides: OptionOverrides = {},
  name: string = 'containers'
): string {
  const context = buildTemplateContext(
    parsePluginName(name),
    resolveOptions(preset, { githubUser: 'octo-test', ...overrides })
  );
  return templateRenderer.render(id, context);
}

describe('Bundled templates', () => {
  it('should register every template id', () => {
    expect(Object.keys(TEMPLATES).sort()).toEqual([...TEMPLATE_IDS].sort());
  });

  describe.each(PRESET_NAMES.map((preset) => [preset]))('with the %s preset', (preset) => {
    it.each(TEMPLATE_IDS.map((id) => [id]))('should render %s without leftover tags', (id) => {
      const output = render(id, preset, { shortDescription: 'Manage containers' });
      expect(output).not.toMatch(/\{%|%\}|\{\{\s/);
    });
  });

  describe('plugin-source', () => {
    it('should declare the global associative array', () => {
      expect(render('plugin-source', 'complete')).toContain(
        'declare -gA CONTAINERS\n' +
          'CONTAINERS[_PLUGIN_DIR]="${0:h}"\n' +
          'CONTAINERS[_ALIASES]=""\n' +
          'CONTAINERS[_FUNCTIONS]=""\n'
      );
      expect(render('plugin-source', 'minimal')).toContain(
        'declare -gA CONTAINERS\n' +
          'CONTAINERS[_PLUGIN_DIR]="${0:h}"\n' +
          'CONTAINERS[_FUNCTIONS]=""\n'
      );
    });

    it('should use the shell safe upper-case name for the global variable', () => {
      const output = render('plugin-source', 'simple', {}, 'my-tool');

      expect(output).toContain('declare -gA MY_TOOL\n');
      expect(output).toContain('my-tool_plugin_unload() {\n');
      expect(output).toContain('.my-tool_remember_fn .my-tool_remember_fn\n');
    });

    it('should set up path and fpath only when the directories exist', () => {
      const complete = render('plugin-source', 'complete');
      expect(complete).toContain('containers_plugin_init() {\n');
      expect(complete).toContain(
        'CONTAINERS[_PLUGIN_FNS_DIR]="${CONTAINERS[_PLUGIN_DIR]}/functions"'
      );
      expect(complete).toContain('CONTAINERS[_PLUGIN_BIN_DIR]="${CONTAINERS[_PLUGIN_DIR]}/bin"');
      expect(complete).toMatch(/\n\ncontainers_plugin_init\n\ntrue\n$/);

      const minimal = render('plugin-source', 'minimal');
      expect(minimal).not.toContain('_plugin_init');
      expect(minimal).toMatch(/#{76}\n\ntrue\n$/);
    });

    it('should unload everything the plugin defined', () => {
      const output = render('plugin-source', 'complete');

      expect(output).toContain('IFS=\',\' read -r -A plugin_fns <<< "${CONTAINERS[_FUNCTIONS]}"\n');
      expect(output).toContain(
        'IFS=\',\' read -r -A plugin_aliases <<< "${CONTAINERS[_ALIASES]}"\n'
      );
      expect(output).toContain('fpath=( "${(@)fpath:#${CONTAINERS[_PLUGIN_FNS_DIR]}}" )\n');
      expect(output).toContain('path=( "${(@)path:#${CONTAINERS[_PLUGIN_BIN_DIR]}}" )\n');
      expect(output).toContain(
        '    unset CONTAINERS\n' +
          '\n' +
          '    # Remove this function.\n' +
          '    unfunction containers_plugin_unload\n' +
          '}\n'
      );
    });

    it('should define an inline example function without a functions directory', () => {
      const output = render('plugin-source', 'simple');

      expect(output).toContain(
        'containers_example() {\n' +
          '    builtin emulate -L zsh\n' +
          '\n' +
          "    printf 'An example function in containers, var: %s\\n' \"${CONTAINERS_EXAMPLE}\"\n" +
          '}\n' +
          '.containers_remember_fn containers_example\n'
      );
      expect(render('plugin-source', 'complete')).not.toContain('containers_example() {');
    });

    it('should only define aliases when enabled', () => {
      expect(render('plugin-source', 'simple')).toContain(
        ".containers_define_alias my_example 'containers_example'\n"
      );
      expect(render('plugin-source', 'simple', { noAliases: true })).not.toContain('alias');
    });

    it('should include the description and repository', () => {
      const output = render('plugin-source', 'minimal', { shortDescription: 'Manage containers' });

      expect(output).toContain('# Plugin Name: Containers\n');
      expect(output).toContain(
        '# Repository: https://github.com/octo-test/zsh-containers-plugin\n'
      );
      expect(output).toContain('# Description:\n#\n#   Manage containers\n#\n');
      expect(render('plugin-source', 'minimal')).not.toContain('# Description:');
    });
  });

  describe('plugin-source-zplugins', () => {
    it('should declare the plugin through the zplugins helpers', () => {
      expect(render('plugin-source-zplugins', 'complete')).toContain(
        '@zplugin_declare_global containers "${0}" \\\n    path bin \\\n    fpath functions\n'
      );
      expect(render('plugin-source-zplugins', 'minimal')).toContain(
        '@zplugin_declare_global containers "${0}"\n'
      );
    });

    it('should unregister and unset on unload', () => {
      const output = render('plugin-source-zplugins', 'simple');

      expect(output).toContain('    @zplugin_unregister containers\n');
      expect(output).toContain('    unset CONTAINERS\n');
      expect(output).toContain('@zplugin_remember_fn containers containers_example\n');
      expect(output).toContain(
        "@zplugin_define_alias containers my_example 'containers_example'\n"
      );
    });
  });

  describe('bash-wrapper', () => {
    it('should source the plugin and the functions directory', () => {
      const output = render('bash-wrapper', 'complete');

      expect(output).toContain(
        'source "$(install_path)/containers.plugin.zsh"\n' +
          '\n' +
          'if [[ -d "$(install_path)/functions" ]]; then\n'
      );
      expect(output.endsWith('fi\n\nunset -f install_path\n')).toBe(true);
    });

    it('should skip the functions directory when it is disabled', () => {
      const output = render('bash-wrapper', 'complete', { noFunctionsDir: true });

      expect(
        output.endsWith('source "$(install_path)/containers.plugin.zsh"\n\nunset -f install_path\n')
      ).toBe(true);
    });
  });

  describe('function-example', () => {
    it('should print the example variable', () => {
      expect(render('function-example', 'complete')).toContain(
        "printf 'An example function in containers, var: %s\\n' \"${CONTAINERS_EXAMPLE}\"\n"
      );
    });
  });

  describe('bin-keep', () => {
    it('should be empty', () => {
      expect(render('bin-keep', 'complete')).toBe('');
    });
  });

  describe('makefile', () => {
    it('should list the sources and both targets', () => {
      expect(render('makefile', 'complete')).toBe(
        'SHELL := /bin/bash\n' +
          '\n' +
          'SOURCES := containers.plugin.zsh containers.bash $(wildcard functions/*)\n' +
          '\n' +
          '.PHONY: all\n' +
          'all: lint test\n' +
          '\n' +
          '.PHONY: lint\n' +
          'lint:\n' +
          '\tshellcheck --shell=bash $(SOURCES)\n' +
          '\n' +
          '.PHONY: test\n' +
          'test:\n' +
          '\tshellspec --shell zsh\n'
      );
    });

    it('should leave out a disabled target', () => {
      const output = render('makefile', 'simple', { noShellSpec: true });

      expect(output).toContain('SOURCES := containers.plugin.zsh\n');
      expect(output).toContain('all: lint\n');
      expect(output).not.toContain('shellspec');
    });
  });

  describe('gitignore', () => {
    it('should ignore shellspec output only when shellspec is enabled', () => {
      expect(render('gitignore', 'simple')).toContain('# ShellSpec\n/coverage/\n');
      expect(render('gitignore', 'simple', { noShellSpec: true })).not.toContain('ShellSpec');
    });
  });

  describe('shell-workflow', () => {
    it('should add a job per enabled tool', () => {
      const output = render('shell-workflow', 'complete');

      expect(output).toContain('jobs:\n  lint:\n');
      expect(output).toContain('        run: make lint\n');
      expect(output).toContain('        run: make test\n');
      expect(render('shell-workflow', 'complete', { noShellCheck: true })).toContain(
        'jobs:\n  test:\n'
      );
    });
  });

  describe('readme', () => {
    it('should use the description when present', () => {
      expect(render('readme', 'complete', { shortDescription: 'Manage containers' })).toContain(
        '# Zsh Plugin Containers\n\nManage containers\n\n## Installation\n'
      );
    });

    it('should fall back to a placeholder description', () => {
      expect(render('readme', 'minimal')).toContain(
        '# Zsh Plugin Containers\n\nZsh plugin to do something...\n\n## Installation\n'
      );
    });

    it('should document the Bash wrapper only when it is generated', () => {
      expect(render('readme', 'complete')).toContain(
        'source zsh-containers-plugin/containers.bash\n'
      );
      expect(render('readme', 'simple')).not.toContain('### Bash');
    });
  });
});
