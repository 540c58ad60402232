import { Module } from '@nestjs/common';
import { HEALTH_READINESS_CHECKER } from '../core/services/health.service';
import { SourcesController } from './controllers/sources.controller';
import { ExecFileGitCommandRunner, GIT_COMMAND_RUNNER } from './services/git-command-runner';
import { GitHubContentService } from './services/github-content.service';
import { GitReadinessChecker } from './services/git-readiness.checker';
import { GitSourceService } from './services/git-source.service';
import { RepositoryAcquirerService } from './services/repository-acquirer.service';

@Module({
  controllers: [SourcesController],
  providers: [
    { provide: GIT_COMMAND_RUNNER, useClass: ExecFileGitCommandRunner },
    GitHubContentService,
    RepositoryAcquirerService,
    GitSourceService,
    { provide: HEALTH_READINESS_CHECKER, useClass: GitReadinessChecker },
  ],
  exports: [
    GitSourceService,
    GitHubContentService,
    RepositoryAcquirerService,
    HEALTH_READINESS_CHECKER,
  ],
})
export class SourcesModule {}
