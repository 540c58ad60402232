import { Inject, Injectable } from '@nestjs/common';
import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, join, resolve, sep } from 'path';
import { IOError, errorMessage } from '../../../common/errors/error-types';
import { createLogger } from '../../../common/logging/logger';
import type { GitSource } from '../dtos/git-source.dto';
import {
  AcquisitionAbortedError,
  DestinationOccupiedError,
  NetworkUnreachableError,
  SubdirectoryNotFoundError,
  toSourceError,
} from '../errors/source-errors';
import { buildAuthenticatedUrl, redactUrl } from '../utils/authenticated-url';
import { classifyGitError, gitErrorText } from '../utils/git-error-classifier';
import { GIT_COMMAND_RUNNER, GitCommandError, GitCommandRunner } from './git-command-runner';

const logger = createLogger('RepositoryAcquirerService');

const WORKDIR_PREFIX = 'plugforge-clone-';
const VCS_DIRECTORY = '.git';

export type CheckoutStrategy = 'full' | 'sparse';

export interface AcquireOptions {
  signal?: AbortSignal;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.lstat(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Materializes a repository (or one subdirectory of it) with a shallow,
 * blob-deferred clone. The target is either fully written or absent.
 */
@Injectable()
export class RepositoryAcquirerService {
  constructor(@Inject(GIT_COMMAND_RUNNER) private readonly git: GitCommandRunner) {}

  selectStrategy(source: Pick<GitSource, 'path'>): CheckoutStrategy {
    return source.path ? 'sparse' : 'full';
  }

  async acquire(source: GitSource, targetPath: string, options: AcquireOptions = {}): Promise<string> {
    const target = resolve(targetPath);
    if (await pathExists(target)) {
      throw new DestinationOccupiedError(target);
    }

    const strategy = this.selectStrategy(source);
    const workRoot = await fs.mkdtemp(join(tmpdir(), WORKDIR_PREFIX));
    const checkoutDir = join(workRoot, 'repo');

    logger.debug(
      { repoUrl: redactUrl(source.repoUrl), branch: source.branch, commit: source.commit, strategy },
      'Acquiring repository',
    );

    try {
      let treeRoot = checkoutDir;
      if (strategy === 'sparse' && source.path) {
        await this.checkoutSparse(source, source.path, checkoutDir, options.signal);
        treeRoot = this.resolveSubdirectory(checkoutDir, source.path, source.repoUrl);
        if (!(await isDirectory(treeRoot))) {
          throw new SubdirectoryNotFoundError(source.path, source.repoUrl);
        }
      } else {
        await this.checkoutFull(source, checkoutDir, options.signal);
      }

      if (options.signal?.aborted) {
        throw new AcquisitionAbortedError(source.repoUrl);
      }

      await this.materialize(treeRoot, target);
      return target;
    } finally {
      await this.cleanupDirectory(workRoot);
    }
  }

  private async checkoutFull(
    source: GitSource,
    checkoutDir: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.runGit(
      source,
      [
        'clone',
        '--depth',
        '1',
        '--filter=blob:none', // defer blob downloads
        '--branch',
        source.branch,
        ...(source.commit ? ['--no-checkout'] : []),
        '--',
        buildAuthenticatedUrl(source),
        checkoutDir,
      ],
      undefined,
      signal,
    );

    if (source.commit) {
      await this.checkoutCommit(source, source.commit, checkoutDir, signal);
    }
  }

  private async checkoutSparse(
    source: GitSource,
    subdirectory: string,
    checkoutDir: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.runGit(
      source,
      [
        'clone',
        '--depth',
        '1',
        '--filter=blob:none',
        '--no-checkout',
        '--sparse',
        '--branch',
        source.branch,
        '--',
        buildAuthenticatedUrl(source),
        checkoutDir,
      ],
      undefined,
      signal,
    );

    await this.runGit(source, ['sparse-checkout', 'init', '--cone'], checkoutDir, signal);
    await this.runGit(source, ['sparse-checkout', 'set', subdirectory], checkoutDir, signal);

    if (source.commit) {
      await this.checkoutCommit(source, source.commit, checkoutDir, signal);
    } else {
      await this.runGit(
        source,
        ['checkout', '-B', source.branch, `origin/${source.branch}`],
        checkoutDir,
        signal,
      );
    }
  }

  private async checkoutCommit(
    source: GitSource,
    commit: string,
    checkoutDir: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.runGit(
      source,
      ['fetch', '--depth', '1', '--filter=blob:none', 'origin', commit],
      checkoutDir,
      signal,
    );
    await this.runGit(source, ['checkout', '--detach', commit], checkoutDir, signal);
  }

  private async runGit(
    source: GitSource,
    args: string[],
    cwd: string | undefined,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    try {
      await this.git.run(args, { cwd, signal });
    } catch (error) {
      if (signal?.aborted || (error instanceof GitCommandError && error.reason === 'aborted')) {
        throw new AcquisitionAbortedError(source.repoUrl);
      }
      if (error instanceof GitCommandError && error.reason === 'timed_out') {
        throw new NetworkUnreachableError(source.repoUrl, `git ${args[0]} timed out`);
      }
      if (error instanceof GitCommandError) {
        const classification = classifyGitError(gitErrorText(error.stderr, error.stdout));
        logger.warn(
          {
            repoUrl: redactUrl(source.repoUrl),
            command: args[0],
            exitCode: error.exitCode,
            category: classification.category,
          },
          'Git command failed',
        );
        throw toSourceError(classification, source.repoUrl);
      }
      throw new IOError('Failed to run git', { command: args[0], cause: errorMessage(error) });
    }
  }

  private resolveSubdirectory(checkoutDir: string, subdirectory: string, repoUrl: string): string {
    const resolved = resolve(checkoutDir, subdirectory);
    if (!resolved.startsWith(`${checkoutDir}${sep}`)) {
      throw new SubdirectoryNotFoundError(subdirectory, repoUrl);
    }
    return resolved;
  }

  /**
   * Copies into a sibling staging directory and renames it into place, so the
   * target never exists half-written.
   */
  private async materialize(treeRoot: string, target: string): Promise<void> {
    await fs.mkdir(dirname(target), { recursive: true });
    const staging = `${target}.partial-${randomBytes(6).toString('hex')}`;

    try {
      await fs.cp(treeRoot, staging, {
        recursive: true,
        verbatimSymlinks: true,
        filter: (src) => basename(src) !== VCS_DIRECTORY,
      });
      if (await pathExists(target)) {
        throw new DestinationOccupiedError(target);
      }
      await fs.rename(staging, target);
    } catch (error) {
      await this.cleanupDirectory(staging);
      if (error instanceof DestinationOccupiedError) {
        throw error;
      }
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'EEXIST' || code === 'ENOTEMPTY') {
        throw new DestinationOccupiedError(target);
      }
      throw new IOError('Failed to copy checked-out tree to destination.', {
        target,
        cause: errorMessage(error),
      });
    }
  }

  private async cleanupDirectory(path: string): Promise<void> {
    try {
      await fs.rm(path, { recursive: true, force: true });
    } catch (cleanupError) {
      logger.warn(
        { path, error: errorMessage(cleanupError) },
        'Failed to cleanup temporary checkout directory',
      );
    }
  }
}
