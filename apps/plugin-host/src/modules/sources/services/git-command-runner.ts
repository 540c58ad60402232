import { Injectable } from '@nestjs/common';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { getEnvConfig } from '../../../common/config/env.config';

const execFileAsync = promisify(execFile);

// 10MB buffer for verbose clone output
const MAX_BUFFER = 10 * 1024 * 1024;

export const GIT_COMMAND_RUNNER = 'GIT_COMMAND_RUNNER';

export interface GitCommandOptions {
  cwd?: string;
  signal?: AbortSignal;
}

export interface GitCommandResult {
  stdout: string;
  stderr: string;
}

export interface GitCommandRunner {
  run(args: string[], options?: GitCommandOptions): Promise<GitCommandResult>;
}

export class GitCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly stderr: string,
    public readonly stdout: string,
    public readonly exitCode: number | string | null,
    public readonly reason: 'failed' | 'aborted' | 'timed_out' = 'failed',
  ) {
    super(`git ${args[0] ?? ''} ${reason === 'failed' ? 'failed' : reason.replace('_', ' ')}`);
    this.name = 'GitCommandError';
  }
}

interface ExecFileFailure {
  name?: string;
  code?: number | string;
  killed?: boolean;
  stdout?: string;
  stderr?: string;
}

/**
 * Runs git as a subprocess. Prompts are disabled so a missing credential
 * fails fast instead of waiting on a terminal.
 */
@Injectable()
export class ExecFileGitCommandRunner implements GitCommandRunner {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor() {
    const config = getEnvConfig();
    this.binary = config.GIT_BINARY;
    this.timeoutMs = config.GIT_TIMEOUT_MS;
  }

  async run(args: string[], options: GitCommandOptions = {}): Promise<GitCommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(this.binary, args, {
        cwd: options.cwd,
        signal: options.signal,
        timeout: this.timeoutMs,
        maxBuffer: MAX_BUFFER,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });
      return { stdout, stderr };
    } catch (error) {
      const err = error as ExecFileFailure;
      const reason =
        err.name === 'AbortError' || options.signal?.aborted
          ? 'aborted'
          : err.killed
            ? 'timed_out'
            : 'failed';
      throw new GitCommandError(args, err.stderr ?? '', err.stdout ?? '', err.code ?? null, reason);
    }
  }
}
