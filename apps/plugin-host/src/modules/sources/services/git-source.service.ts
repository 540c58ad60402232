import { Injectable } from '@nestjs/common';
import * as fs from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { PluginManifestSchema, type PluginManifest } from '@plugforge/shared';
import { ValidationError, errorMessage } from '../../../common/errors/error-types';
import { createLogger } from '../../../common/logging/logger';
import { getSourceName, type GitSource } from '../dtos/git-source.dto';
import {
  InvalidManifestError,
  MANIFEST_FILENAME,
  ManifestNotFoundError,
  SourceError,
} from '../errors/source-errors';
import { getApiToken, redactUrl } from '../utils/authenticated-url';
import { GitHubContentService } from './github-content.service';
import { AcquireOptions, RepositoryAcquirerService } from './repository-acquirer.service';

const logger = createLogger('GitSourceService');

const SCRATCH_PREFIX = 'plugforge-manifest-';

/**
 * One way of obtaining a manifest. Strategies are tried in order; a failing
 * strategy hands over to the next one, only the last one's failure surfaces.
 */
export interface ManifestStrategy {
  readonly name: string;
  supports(source: GitSource): boolean;
  fetch(source: GitSource): Promise<PluginManifest>;
}

@Injectable()
export class GitSourceService {
  private readonly manifestStrategies: readonly ManifestStrategy[];

  constructor(
    private readonly contentService: GitHubContentService,
    private readonly acquirer: RepositoryAcquirerService,
  ) {
    this.manifestStrategies = [
      {
        name: 'contents-api',
        supports: (source) => this.contentService.isGitHubRepo(source.repoUrl),
        fetch: (source) => this.getManifestViaApi(source),
      },
      {
        name: 'clone',
        supports: () => true,
        fetch: (source) => this.getManifestViaClone(source),
      },
    ];
  }

  /**
   * Manifest via the contents API when the host has one, otherwise (or when
   * that fails for any reason) via a clone.
   */
  async getManifest(source: GitSource): Promise<PluginManifest> {
    logger.debug({ repoUrl: redactUrl(source.repoUrl) }, 'Getting manifest');

    const chain = this.manifestStrategies.filter((strategy) => strategy.supports(source));
    const fallback = chain[chain.length - 1];
    if (!fallback) {
      throw new ValidationError('No manifest strategy supports this source.', {
        repoUrl: redactUrl(source.repoUrl),
      });
    }

    for (const strategy of chain.slice(0, -1)) {
      try {
        return await strategy.fetch(source);
      } catch (error) {
        logger.warn(
          {
            repoUrl: redactUrl(source.repoUrl),
            strategy: strategy.name,
            category: error instanceof SourceError ? error.category : 'unknown',
            error: errorMessage(error),
          },
          `Manifest strategy ${strategy.name} failed, falling back`,
        );
      }
    }

    return fallback.fetch(source);
  }

  /**
   * Materializes the plugin under `<outputDir>/<source name>`.
   */
  async downloadPlugin(
    source: GitSource,
    outputDir: string,
    options: AcquireOptions = {},
  ): Promise<string> {
    const startedAt = Date.now();
    const targetPath = join(resolve(outputDir), getSourceName(source));
    logger.debug({ repoUrl: redactUrl(source.repoUrl), targetPath }, 'Downloading plugin');

    const path = await this.acquirer.acquire(source, targetPath, options);

    logger.debug(
      { repoUrl: redactUrl(source.repoUrl), durationMs: Date.now() - startedAt },
      'Plugin download completed',
    );
    return path;
  }

  private async getManifestViaApi(source: GitSource): Promise<PluginManifest> {
    const manifestPath = source.path ? `${source.path}/${MANIFEST_FILENAME}` : MANIFEST_FILENAME;
    const data = await this.contentService.getJsonFile(
      source.repoUrl,
      manifestPath,
      source.commit ?? source.branch,
      getApiToken(source),
    );
    return this.parseManifest(data, source);
  }

  private async getManifestViaClone(source: GitSource): Promise<PluginManifest> {
    const startedAt = Date.now();
    logger.debug({ repoUrl: redactUrl(source.repoUrl) }, 'Getting manifest via git clone');

    const scratchDir = await fs.mkdtemp(join(tmpdir(), SCRATCH_PREFIX));
    try {
      const pluginPath = await this.downloadPlugin(source, scratchDir);
      const manifestFile = join(pluginPath, MANIFEST_FILENAME);

      let content: string;
      try {
        content = await fs.readFile(manifestFile, 'utf-8');
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
          throw error;
        }
        const availableFiles = await fs.readdir(pluginPath);
        logger.error(
          { repoUrl: redactUrl(source.repoUrl), availableFiles },
          `${MANIFEST_FILENAME} not found`,
        );
        throw new ManifestNotFoundError(source.repoUrl);
      }

      let data: unknown;
      try {
        data = JSON.parse(content);
      } catch (error) {
        throw new InvalidManifestError(source.repoUrl, [`not valid JSON: ${errorMessage(error)}`]);
      }

      const manifest = this.parseManifest(data, source);
      logger.debug(
        { repoUrl: redactUrl(source.repoUrl), durationMs: Date.now() - startedAt },
        'Manifest via clone completed',
      );
      return manifest;
    } finally {
      await fs.rm(scratchDir, { recursive: true, force: true });
    }
  }

  private parseManifest(data: unknown, source: GitSource): PluginManifest {
    const result = PluginManifestSchema.safeParse(data);
    if (!result.success) {
      throw new InvalidManifestError(
        source.repoUrl,
        result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      );
    }
    return result.data;
  }
}
