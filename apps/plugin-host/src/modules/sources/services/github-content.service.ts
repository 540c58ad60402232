import { Inject, Injectable, Optional } from '@nestjs/common';
import { getEnvConfig } from '../../../common/config/env.config';
import { ValidationError, errorMessage } from '../../../common/errors/error-types';
import { createLogger } from '../../../common/logging/logger';
import {
  NetworkUnreachableError,
  RepositoryNotFoundError,
  SourceAcquisitionError,
  SourceAuthenticationError,
  SourceError,
} from '../errors/source-errors';
import { redactUrl } from '../utils/authenticated-url';

const logger = createLogger('GitHubContentService');

const DEFAULT_USER_AGENT = 'plugforge-plugin-host';
const GITHUB_HOSTS = new Set(['github.com', 'www.github.com']);
const SSH_GITHUB_REGEX = /^(?:ssh:\/\/)?git@github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/i;

export const GITHUB_CONTENT_OPTIONS = 'GITHUB_CONTENT_OPTIONS';

export interface GitHubContentOptions {
  apiBaseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

export interface GitHubRepoRef {
  owner: string;
  repo: string;
}

/**
 * Owner and repository of a github.com URL (https or ssh form), or null for
 * any other host. Decided from the URL alone.
 */
export function parseGitHubRepo(repoUrl: string): GitHubRepoRef | null {
  const sshMatch = SSH_GITHUB_REGEX.exec(repoUrl.trim());
  if (sshMatch) {
    return { owner: sshMatch[1], repo: sshMatch[2] };
  }

  let url: URL;
  try {
    url = new URL(repoUrl.trim());
  } catch {
    return null;
  }
  if (!['http:', 'https:'].includes(url.protocol) || !GITHUB_HOSTS.has(url.hostname.toLowerCase())) {
    return null;
  }

  const [owner, repo] = url.pathname.split('/').filter(Boolean);
  if (!owner || !repo) {
    return null;
  }
  return { owner, repo: repo.replace(/\.git$/, '') };
}

export function isGitHubRepo(repoUrl: string): boolean {
  return parseGitHubRepo(repoUrl) !== null;
}

/**
 * Reads single files through the GitHub contents API. Never clones.
 */
@Injectable()
export class GitHubContentService {
  private readonly options: GitHubContentOptions;

  constructor(
    @Optional() @Inject(GITHUB_CONTENT_OPTIONS) options?: Partial<GitHubContentOptions>,
  ) {
    const config = getEnvConfig();
    this.options = {
      apiBaseUrl: (options?.apiBaseUrl ?? config.GITHUB_API_URL).replace(/\/+$/, ''),
      timeoutMs: options?.timeoutMs ?? config.SOURCE_REQUEST_TIMEOUT_MS,
      userAgent: options?.userAgent ?? DEFAULT_USER_AGENT,
    };
  }

  isGitHubRepo(repoUrl: string): boolean {
    return isGitHubRepo(repoUrl);
  }

  async getFileContent(
    repoUrl: string,
    filePath: string,
    ref: string,
    token?: string,
  ): Promise<Buffer> {
    const repoRef = parseGitHubRepo(repoUrl);
    if (!repoRef) {
      throw new ValidationError('Repository is not hosted on GitHub.', {
        repoUrl: redactUrl(repoUrl),
      });
    }

    const encodedPath = filePath
      .split('/')
      .filter(Boolean)
      .map((segment) => encodeURIComponent(segment))
      .join('/');
    const endpoint = `${this.options.apiBaseUrl}/repos/${encodeURIComponent(repoRef.owner)}/${encodeURIComponent(repoRef.repo)}/contents/${encodedPath}?ref=${encodeURIComponent(ref)}`;

    const response = await this.fetchWithTimeout(endpoint, repoUrl, token);

    if (!response.ok) {
      logger.debug(
        { owner: repoRef.owner, repo: repoRef.repo, filePath, ref, status: response.status },
        'GitHub contents request failed',
      );
      if (response.status === 401 || response.status === 403) {
        throw new SourceAuthenticationError(repoUrl);
      }
      if (response.status === 404) {
        throw new RepositoryNotFoundError(repoUrl);
      }
      throw new SourceAcquisitionError(
        repoUrl,
        `GitHub contents API returned ${response.status} ${response.statusText ?? ''}`.trim(),
      );
    }

    return Buffer.from(await response.arrayBuffer());
  }

  async getJsonFile(
    repoUrl: string,
    filePath: string,
    ref: string,
    token?: string,
  ): Promise<unknown> {
    const content = await this.getFileContent(repoUrl, filePath, ref, token);
    try {
      return JSON.parse(content.toString('utf-8'));
    } catch (error) {
      throw new ValidationError(`${filePath} is not valid JSON.`, {
        repoUrl: redactUrl(repoUrl),
        cause: errorMessage(error),
      });
    }
  }

  private buildHeaders(token?: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github.raw+json',
      'User-Agent': this.options.userAgent,
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }

  private async fetchWithTimeout(url: string, repoUrl: string, token?: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      return await fetch(url, {
        signal: controller.signal,
        headers: this.buildHeaders(token),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new NetworkUnreachableError(
          repoUrl,
          `GitHub contents request timed out after ${this.options.timeoutMs}ms`,
        );
      }
      if (error instanceof SourceError) {
        throw error;
      }
      throw new NetworkUnreachableError(repoUrl, errorMessage(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
