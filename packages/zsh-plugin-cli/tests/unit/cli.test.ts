/**
 * Unit tests for CLI setup
 */

import { CLI_VERSION, createCLI, registerCommands } from '../../src/cli';

describe('CLI', () => {
  it('should register the init command', () => {
    const program = createCLI();
    registerCommands(program);

    expect(program.name()).toBe('zsh-plugin');
    expect(program.version()).toBe(CLI_VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(['init']);
  });

  it('should declare the global options', () => {
    const flags = createCLI().options.map((option) => option.flags);

    expect(flags).toEqual(['-V, --version', '-v, --verbose', '-q, --quiet', '--no-color']);
  });

  it('should expose every init option', () => {
    const program = createCLI();
    registerCommands(program);
    const [init] = program.commands;

    expect(init.options.map((option) => option.long)).toEqual([
      '--template',
      '--add-bin-dir',
      '--add-bash-wrapper',
      '--no-aliases',
      '--no-shell-check',
      '--no-functions-dir',
      '--no-git-init',
      '--no-github-dir',
      '--no-shell-spec',
      '--use-zplugins',
      '--description',
      '--github-user',
      '--output',
    ]);
  });
});
