/**
 * Local git client - issues the git commands the maintenance workflow needs.
 *
 * Commands go through a CommandRunner, so platform wrapping stays in the
 * runner and tests can script exit codes.
 */

import type { CommandResult } from '../../domain/types.js';
import type { CommandRunner, Logger, RunOptions } from '../../domain/vcs.js';
import { MaintenanceError } from '../../lib/error.js';

export class LocalGit {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  /**
   * Execute a git command and log its output. Never throws on exit status.
   */
  private async exec(
    args: string[],
    label: string,
    options?: RunOptions,
  ): Promise<CommandResult> {
    const result = await this.runner.run(['git', ...args], options);
    this.logger.debug(`git ${label} output: ${result.output}`);
    return result;
  }

  // --- Working tree ---

  /** Exit status is non-zero when tracked files have unstaged changes. */
  async diffWorkingTree(options?: RunOptions): Promise<CommandResult> {
    return await this.exec(['diff', '--exit-code'], 'diff', options);
  }

  /** Exit status is non-zero when the index has staged changes. */
  async diffIndex(options?: RunOptions): Promise<CommandResult> {
    return await this.exec(['diff', '--cached', '--exit-code'], 'diff cached', options);
  }

  // --- Branches ---

  async checkoutNewBranch(
    branch: string,
    fromRef: string,
    options?: RunOptions,
  ): Promise<CommandResult> {
    return await this.exec(['checkout', '-b', branch, fromRef], 'checkout', options);
  }

  /**
   * Commit all modified tracked files.
   */
  async commitAll(message: string, options?: RunOptions): Promise<CommandResult> {
    return await this.exec(['commit', '-am', message], 'commit', options);
  }

  // --- Tags ---

  /**
   * List tag names matching a glob pattern.
   */
  async listTags(pattern: string, options?: RunOptions): Promise<string[]> {
    const result = await this.exec(['tag', '--list', pattern], 'tag', options);
    if (result.exitCode !== 0) {
      throw new MaintenanceError(
        `Git command failed: git tag --list ${pattern}\n${result.output}`,
        'GIT_ERROR',
        { exitCode: result.exitCode, output: result.output },
      );
    }

    return result.output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }
}
