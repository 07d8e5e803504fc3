/**
 * Unit tests for configuration loading
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { getConfigPath, loadConfig, resolveGithubUser } from '../../src/utils/config';
import { ConfigurationError } from '../../src/utils/error-handler';

describe('Configuration', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'zsh-plugin-config-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('getConfigPath', () => {
    it('should prefer ZSH_PLUGIN_CONFIG', () => {
      expect(
        getConfigPath({ ZSH_PLUGIN_CONFIG: '/tmp/custom.json', XDG_CONFIG_HOME: '/xdg' })
      ).toBe('/tmp/custom.json');
    });

    it('should fall back to XDG_CONFIG_HOME', () => {
      expect(getConfigPath({ XDG_CONFIG_HOME: '/xdg' })).toBe(
        path.join('/xdg', 'zsh-plugin', 'config.json')
      );
    });

    it('should default to ~/.config', () => {
      expect(getConfigPath({})).toBe(
        path.join(os.homedir(), '.config', 'zsh-plugin', 'config.json')
      );
    });
  });

  describe('loadConfig', () => {
    it('should return an empty config when the file is missing', async () => {
      await expect(loadConfig(path.join(tempDir, 'missing.json'))).resolves.toEqual({});
    });

    it('should load a valid file', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeJson(configPath, {
        githubUser: 'octo-test',
        preset: 'simple',
        outputDir: 'plugins',
        useZplugins: true,
      });

      await expect(loadConfig(configPath)).resolves.toEqual({
        githubUser: 'octo-test',
        preset: 'simple',
        outputDir: 'plugins',
        useZplugins: true,
      });
    });

    it('should reject malformed JSON', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeFile(configPath, '{ "preset": ');

      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(loadConfig(configPath)).rejects.toMatchObject({
        message: 'Failed to read configuration file',
        exitCode: 1,
        context: { path: configPath },
      });
    });

    it('should reject an unknown preset', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeJson(configPath, { preset: 'everything' });

      await expect(loadConfig(configPath)).rejects.toThrow(/^Invalid configuration file: preset: /);
    });

    it('should reject unknown keys', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeJson(configPath, { theme: 'dark' });

      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject values of the wrong type', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeJson(configPath, { useZplugins: 'yes' });

      await expect(loadConfig(configPath)).rejects.toThrow(
        /^Invalid configuration file: useZplugins: /
      );
    });
  });

  describe('resolveGithubUser', () => {
    const ENV_WITH_USER = { ZSH_PLUGIN_GITHUB_USER: 'env-user', USER: 'login' };

    it('should prefer the command line value', () => {
      expect(resolveGithubUser('cli-user', { githubUser: 'config-user' }, ENV_WITH_USER)).toBe(
        'cli-user'
      );
    });

    it('should use the environment before the config file', () => {
      expect(resolveGithubUser(undefined, { githubUser: 'config-user' }, ENV_WITH_USER)).toBe(
        'env-user'
      );
    });

    it('should use the config file before USER', () => {
      expect(resolveGithubUser(undefined, { githubUser: 'config-user' }, { USER: 'login' })).toBe(
        'config-user'
      );
    });

    it('should fall back to USER, then a placeholder', () => {
      expect(resolveGithubUser(undefined, {}, { USER: 'login' })).toBe('login');
      expect(resolveGithubUser(undefined, {}, {})).toBe('github-user');
    });
  });
});
