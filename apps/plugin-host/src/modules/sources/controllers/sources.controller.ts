import { Body, Controller, HttpCode, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';
import type { PluginManifest } from '@plugforge/shared';
import { createLogger } from '../../../common/logging/logger';
import { DownloadRequestSchema, ManifestRequestSchema } from '../dtos/git-source.dto';
import { GitSourceService } from '../services/git-source.service';
import { redactUrl } from '../utils/authenticated-url';

const logger = createLogger('SourcesController');

/** Aborts when the client goes away before the response is written. */
function abortOnDisconnect(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

@ApiTags('sources')
@Controller('api/sources')
export class SourcesController {
  constructor(private readonly gitSourceService: GitSourceService) {}

  @Post('manifest')
  @HttpCode(200)
  @ApiOperation({ summary: 'Resolve the manifest of a git-hosted plugin' })
  async getManifest(@Body() body: unknown): Promise<PluginManifest> {
    const { source } = ManifestRequestSchema.parse(body);
    logger.info({ repoUrl: redactUrl(source.repoUrl) }, 'POST /api/sources/manifest');
    return this.gitSourceService.getManifest(source);
  }

  @Post('download')
  @ApiOperation({ summary: 'Materialize a git-hosted plugin into a directory' })
  async download(
    @Body() body: unknown,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<{ path: string }> {
    const { source, outputDir } = DownloadRequestSchema.parse(body);
    logger.info({ repoUrl: redactUrl(source.repoUrl), outputDir }, 'POST /api/sources/download');
    const path = await this.gitSourceService.downloadPlugin(source, outputDir, {
      signal: abortOnDisconnect(reply),
    });
    return { path };
  }
}
