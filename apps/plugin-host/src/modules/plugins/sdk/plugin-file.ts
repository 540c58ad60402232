import { randomBytes } from 'crypto';
import {
  FileReferenceSchema,
  SPOT_URI_PREFIX,
  spotFileId,
  toFileReferenceWire,
  type FileReference,
  type FileReferenceWire,
  type SourceMetadata,
  type SourceType,
} from '@plugforge/shared';
import { BadRequestError } from '../../../common/errors/error-types';
import type { ExecutionContext } from '../context/execution-context';

export interface PluginFileFromBytesOptions {
  name?: string;
  contentType?: string;
  sourceType?: SourceType;
  sourceMetadata?: SourceMetadata | null;
}

/**
 * A file handed to or produced by a node. Serializes back to its wire
 * reference, so a PluginFile can be returned as a node output as-is.
 */
export class PluginFile {
  private constructor(private readonly reference: FileReference) {}

  get id(): string | null {
    return this.reference.id ?? null;
  }

  get uri(): string {
    return this.reference.uri;
  }

  get name(): string {
    return this.reference.name;
  }

  get contentType(): string {
    return this.reference.contentType;
  }

  get sourceType(): SourceType {
    return this.reference.sourceType;
  }

  get sourceMetadata(): SourceMetadata | null {
    return this.reference.sourceMetadata ?? null;
  }

  /** Parses a file reference; throws the ZodError when `value` is not one. */
  static from(value: unknown): PluginFile {
    return new PluginFile(FileReferenceSchema.parse(value));
  }

  static tryFrom(value: unknown): PluginFile | null {
    const result = FileReferenceSchema.safeParse(value);
    return result.success ? new PluginFile(result.data) : null;
  }

  /** Uploads `data` through the context's file helper. */
  static async fromBytes(
    ctx: ExecutionContext,
    data: Buffer,
    options: PluginFileFromBytesOptions = {},
  ): Promise<PluginFile> {
    const name = options.name || randomBytes(16).toString('hex');
    const contentType = options.contentType ?? 'text/plain';
    const sourceType = options.sourceType ?? 'Document';

    const uploaded = await ctx.getFileHelper().uploadFile(name, data, {
      contentType,
      sourceType,
      sourceMetadata: options.sourceMetadata,
      groupId: ctx.groupId,
    });

    return PluginFile.from({
      id: uploaded.id,
      uri: uploaded.uri,
      name,
      contentType,
      sourceType,
      sourceMetadata: options.sourceMetadata,
    });
  }

  static fromSpotUri(uri: string, name?: string): PluginFile {
    const id = spotFileId(uri);
    if (!id) {
      throw new BadRequestError(`Invalid spot URI: ${uri}`);
    }
    return PluginFile.from({ id, uri, name: name || `file_${id}` });
  }

  isSpotFile(): boolean {
    return this.uri.startsWith(SPOT_URI_PREFIX);
  }

  getContent(ctx: ExecutionContext): Promise<Buffer> {
    return ctx.getFileHelper().getContent(this.reference);
  }

  toJSON(): FileReferenceWire {
    return toFileReferenceWire(this.reference);
  }
}
