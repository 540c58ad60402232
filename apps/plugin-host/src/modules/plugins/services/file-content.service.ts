import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import {
  toSourceMetadataWire,
  type FileReference,
  type SourceMetadata,
  type SourceType,
} from '@plugforge/shared';
import { getEnvConfig } from '../../../common/config/env.config';
import { BadRequestError, TimeoutError, errorMessage } from '../../../common/errors/error-types';
import { createLogger } from '../../../common/logging/logger';
import { DEFAULT_GROUP_ID } from '../context/execution-context';
import { FileTransferError } from '../errors/plugin-errors';

const logger = createLogger('FileContentService');

export interface UploadFileOptions {
  contentType?: string;
  sourceType?: SourceType;
  sourceMetadata?: SourceMetadata | null;
  groupId?: string | null;
}

export interface UploadedFile {
  id: string;
  uri: string;
}

/** Fetches and stores file bytes on behalf of a capability. */
export interface FileContentService {
  getContent(file: FileReference): Promise<Buffer>;
  uploadFile(name: string, content: Buffer, options?: UploadFileOptions): Promise<UploadedFile>;
}

export interface HttpFileContentOptions {
  baseUrl: string;
  timeoutMs: number;
}

const UploadResponseSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    uri: z.string().min(1),
  })
  .passthrough();

/**
 * FileContentService backed by the platform's plugin server:
 * `GET /files/<id>` for content, `POST /files/upload` with base64 bytes.
 */
export class HttpFileContentService implements FileContentService {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpFileContentOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async getContent(file: FileReference): Promise<Buffer> {
    if (!file.id) {
      throw new BadRequestError(`File ${file.name} has no id`);
    }

    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/files/${encodeURIComponent(file.id)}`,
      { method: 'GET' },
    );
    if (!response.ok) {
      throw new FileTransferError(`File service returned ${response.status} for file ${file.id}`, {
        fileId: file.id,
        status: response.status,
      });
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async uploadFile(
    name: string,
    content: Buffer,
    options: UploadFileOptions = {},
  ): Promise<UploadedFile> {
    const groupId = options.groupId ?? DEFAULT_GROUP_ID;
    logger.info({ fileName: name, groupId }, 'Uploading file');

    // Field names follow the plugin server's upload contract
    const payload = {
      filename: name,
      content_type: options.contentType ?? 'text/plain',
      content_base64: content.toString('base64'),
      group_id: groupId,
      source_type: options.sourceType ?? 'Document',
      source_metadata: options.sourceMetadata ? toSourceMetadataWire(options.sourceMetadata) : null,
    };

    const response = await this.fetchWithTimeout(`${this.baseUrl}/files/upload`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
    if (!response.ok) {
      throw new FileTransferError(`File service returned ${response.status} for upload of ${name}`, {
        fileName: name,
        status: response.status,
      });
    }

    const parsed = UploadResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new FileTransferError(`File service returned an invalid upload response for ${name}`);
    }
    return { id: parsed.data.id, uri: parsed.data.uri };
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError('File service request timed out.', {
          timeoutMs: this.options.timeoutMs,
          url,
        });
      }
      throw new FileTransferError('File service is unreachable.', {
        url,
        cause: errorMessage(error),
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/** One file-content service per request. */
@Injectable()
export class FileContentServiceFactory {
  create(): FileContentService {
    const config = getEnvConfig();
    return new HttpFileContentService({
      baseUrl: config.PLUGIN_SERVER_URL,
      timeoutMs: config.FILE_REQUEST_TIMEOUT_MS,
    });
  }
}
