/**
 * Version-control initialization for a freshly written scaffold
 */

import execa from 'execa';
import { SubprocessFailedError } from '../../utils/error-handler.js';
import { getErrorMessage } from '../../types/errors.js';

export interface RepositoryInitializer {
  /**
   * Create an empty repository in `directory`
   *
   * @throws SubprocessFailedError
   */
  init(directory: string): Promise<void>;
}

/**
 * Runs `git init --quiet` in the target directory
 */
export class GitRepositoryInitializer implements RepositoryInitializer {
  constructor(private readonly command: string = 'git') {}

  async init(directory: string): Promise<void> {
    const args = ['init', '--quiet'];
    const commandLine = [this.command, ...args].join(' ');

    let result: execa.ExecaReturnValue;
    try {
      result = await execa(this.command, args, { cwd: directory, reject: false });
    } catch (error) {
      throw new SubprocessFailedError(
        commandLine,
        `Failed to run '${commandLine}': ${getErrorMessage(error)}`,
        undefined,
        error
      );
    }

    if (result.failed) {
      const detail =
        result.stderr.trim() ||
        (typeof result.exitCode === 'number'
          ? `exit code ${result.exitCode}`
          : 'command could not be started');
      throw new SubprocessFailedError(
        commandLine,
        `'${commandLine}' failed: ${detail}`,
        typeof result.exitCode === 'number' ? result.exitCode : undefined
      );
    }
  }
}
