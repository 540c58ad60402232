import { Inject, Injectable } from '@nestjs/common';
import { errorMessage } from '../../../common/errors/error-types';
import { createLogger } from '../../../common/logging/logger';
import type {
  CheckStatus,
  HealthReadinessChecker,
} from '../../core/services/health.service';
import { GIT_COMMAND_RUNNER, type GitCommandRunner } from './git-command-runner';

const logger = createLogger('GitReadinessChecker');

/** Source resolution is ready when the git binary runs. */
@Injectable()
export class GitReadinessChecker implements HealthReadinessChecker {
  constructor(@Inject(GIT_COMMAND_RUNNER) private readonly git: GitCommandRunner) {}

  async getChecks(): Promise<Record<string, CheckStatus>> {
    try {
      await this.git.run(['--version']);
      return { git: 'ok' };
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'git is not available');
      return { git: 'fail' };
    }
  }
}
