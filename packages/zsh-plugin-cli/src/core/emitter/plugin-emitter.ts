/**
 * Plugin Emitter
 *
 * Creates the plugin directory, renders every planned template into it and
 * optionally initializes a repository. Nothing written before a failure is
 * removed.
 */

import fs from 'fs-extra';
import path from 'path';
import { templateRenderer, type TemplateRenderer } from '../renderer/index.js';
import { buildTemplateContext } from '../context.js';
import { planOutputTree, pluginDirectoryName } from './output-tree.js';
import { GitRepositoryInitializer, type RepositoryInitializer } from './repository.js';
import { IoError, PathExistsError, SubprocessFailedError } from '../../utils/error-handler.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { isNodeError } from '../../types/errors.js';
import type { Logger, OutputEntry } from '../../types/output.js';
import type { GenerationOptions, PluginName } from '../../types/plugin.js';

export type RepositoryOutcome =
  | { state: 'skipped' }
  | { state: 'initialized' }
  | { state: 'failed'; error: SubprocessFailedError };

export interface EmitResult {
  /** Absolute path of the created plugin directory */
  root: string;
  entries: OutputEntry[];
  repository: RepositoryOutcome;
}

export interface PluginEmitterOptions {
  renderer?: TemplateRenderer;
  repository?: RepositoryInitializer;
  logger?: Logger;
  /** Called after each planned entry has been written */
  onProgress?: (entry: OutputEntry) => void;
}

export class PluginEmitter {
  private readonly renderer: TemplateRenderer;
  private readonly repository: RepositoryInitializer;
  private readonly logger: Logger;
  private readonly onProgress?: (entry: OutputEntry) => void;

  constructor(options: PluginEmitterOptions = {}) {
    this.renderer = options.renderer ?? templateRenderer;
    this.repository = options.repository ?? new GitRepositoryInitializer();
    this.logger = options.logger ?? defaultLogger;
    this.onProgress = options.onProgress;
  }

  /**
   * Scaffold `<parent>/zsh-<name>-plugin`
   *
   * @throws PathExistsError if the target directory is already present
   * @throws IoError on any filesystem failure
   * @throws TemplateError if a template cannot be rendered
   */
  async emit(
    parent: string,
    name: PluginName,
    options: Readonly<GenerationOptions>
  ): Promise<EmitResult> {
    const root = path.resolve(parent, pluginDirectoryName(name));
    await this.createRoot(root);

    const context = buildTemplateContext(name, options);
    const entries = planOutputTree(name, options);

    for (const entry of entries) {
      const target = path.join(root, ...entry.path.split('/'));

      if (entry.kind === 'directory') {
        await this.io(`Failed to create directory ${target}`, target, () => fs.mkdir(target));
      } else {
        const content = this.renderer.render(entry.template, context);
        await this.io(`Failed to write ${target}`, target, () =>
          fs.writeFile(target, content, { encoding: 'utf8', flag: 'wx' })
        );
      }

      this.logger.debug(`Created ${entry.kind} ${entry.path}`);
      this.onProgress?.(entry);
    }

    return { root, entries, repository: await this.initRepository(root, options) };
  }

  private async createRoot(root: string): Promise<void> {
    if (await fs.pathExists(root)) {
      throw new PathExistsError(root);
    }

    const parent = path.dirname(root);
    await this.io(`Failed to create directory ${parent}`, parent, () => fs.ensureDir(parent));

    try {
      await fs.mkdir(root);
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') {
        throw new PathExistsError(root);
      }
      throw new IoError(`Failed to create directory ${root}`, root, error);
    }

    this.logger.debug(`Created plugin directory ${root}`);
  }

  private async initRepository(
    root: string,
    options: Readonly<GenerationOptions>
  ): Promise<RepositoryOutcome> {
    if (options.noGitInit) {
      return { state: 'skipped' };
    }

    try {
      await this.repository.init(root);
    } catch (error) {
      if (error instanceof SubprocessFailedError) {
        this.logger.debug(`Repository initialization failed: ${error.message}`);
        return { state: 'failed', error };
      }
      throw error;
    }

    this.logger.debug(`Initialized repository in ${root}`);
    return { state: 'initialized' };
  }

  private async io(
    message: string,
    target: string,
    operation: () => Promise<unknown>
  ): Promise<void> {
    try {
      await operation();
    } catch (error) {
      throw new IoError(message, target, error);
    }
  }
}
