import { AppError } from '../../../common/errors/error-types';
import { redactUrl } from '../utils/authenticated-url';
import type { GitErrorClassification, GitFailureCategory } from '../utils/git-error-classifier';

export const MANIFEST_FILENAME = 'manifest.json';

export type SourceErrorCategory =
  | GitFailureCategory
  | 'destination_occupied'
  | 'subdirectory_not_found'
  | 'manifest_not_found'
  | 'invalid_manifest';

/**
 * Base class for failures surfaced by source resolution.
 * `category` doubles as the error code.
 */
export abstract class SourceError extends AppError {
  constructor(
    public readonly category: SourceErrorCategory,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>,
  ) {
    super(message, category, statusCode, details);
  }
}

export class SourceAuthenticationError extends SourceError {
  constructor(repoUrl: string) {
    super(
      'authentication_failure',
      `Authentication failed for ${redactUrl(repoUrl)}. This may be a private repository - please provide credentials.`,
      401,
    );
  }
}

export class RepositoryNotFoundError extends SourceError {
  constructor(repoUrl: string) {
    super(
      'repository_not_found',
      `Repository not found: ${redactUrl(repoUrl)}. Check that the URL is correct and the repository exists.`,
      404,
    );
  }
}

export class NetworkUnreachableError extends SourceError {
  constructor(repoUrl: string, reason?: string) {
    super(
      'network_unreachable',
      `Could not reach the host of ${redactUrl(repoUrl)}. Check your network connection.`,
      502,
      reason ? { reason: redactUrl(reason) } : undefined,
    );
  }
}

export class DestinationOccupiedError extends SourceError {
  constructor(targetPath: string) {
    super('destination_occupied', `Destination ${targetPath} already exists`, 409, {
      targetPath,
    });
  }
}

export class SubdirectoryNotFoundError extends SourceError {
  constructor(subdirectory: string, repoUrl: string) {
    super(
      'subdirectory_not_found',
      `Subdirectory '${subdirectory}' not found in repository ${redactUrl(repoUrl)}`,
      404,
      { subdirectory },
    );
  }
}

export class ManifestNotFoundError extends SourceError {
  constructor(repoUrl: string) {
    super(
      'manifest_not_found',
      `No ${MANIFEST_FILENAME} found in repository ${redactUrl(repoUrl)}. This does not appear to be a valid plugin.`,
      422,
    );
  }
}

export class InvalidManifestError extends SourceError {
  constructor(
    repoUrl: string,
    public readonly issues: string[],
  ) {
    super(
      'invalid_manifest',
      `Invalid ${MANIFEST_FILENAME} in repository ${redactUrl(repoUrl)}: ${issues.join('; ')}`,
      422,
      { issues },
    );
  }
}

/** Unclassified failure; keeps the (redacted) git output for diagnostics. */
export class SourceAcquisitionError extends SourceError {
  public readonly rawText: string;

  constructor(repoUrl: string, rawText: string) {
    const redacted = redactUrl(rawText);
    super('unknown', `Failed to fetch repository ${redactUrl(repoUrl)}: ${redacted}`, 502, {
      rawText: redacted,
    });
    this.rawText = redacted;
  }
}

export class AcquisitionAbortedError extends AppError {
  constructor(repoUrl: string) {
    super(`Acquisition of ${redactUrl(repoUrl)} was aborted`, 'aborted', 499);
  }
}

export function toSourceError(
  classification: GitErrorClassification,
  repoUrl: string,
): SourceError {
  switch (classification.category) {
    case 'authentication_failure':
      return new SourceAuthenticationError(repoUrl);
    case 'repository_not_found':
      return new RepositoryNotFoundError(repoUrl);
    case 'network_unreachable':
      return new NetworkUnreachableError(repoUrl, classification.rawText);
    case 'unknown':
      return new SourceAcquisitionError(repoUrl, classification.rawText);
  }
}
