import { randomBytes } from 'crypto';
import { z } from 'zod';

export const SOURCE_TYPES = [
  'Document',
  'Google Drive',
  'Notion',
  'Website',
  'OneDrive',
  'Slack',
  'Linear',
  'Github',
  'Teams',
  'Sharepoint',
  'ServiceNow',
  'Custom',
] as const;

export const SourceTypeSchema = z.enum(SOURCE_TYPES);

export type SourceType = z.infer<typeof SourceTypeSchema>;

/** Wire (snake_case) keys and the fields they fill. */
const FILE_REFERENCE_WIRE_KEYS: Record<string, string> = {
  content_type: 'contentType',
  source_type: 'sourceType',
  source_metadata: 'sourceMetadata',
};

const SOURCE_METADATA_WIRE_KEYS: Record<string, string> = {
  rel_path: 'relPath',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function renameWireKeys(value: Record<string, unknown>, keys: Record<string, string>): Record<string, unknown> {
  const renamed: Record<string, unknown> = { ...value };
  for (const [wireKey, field] of Object.entries(keys)) {
    if (!(wireKey in renamed)) {
      continue;
    }
    if (renamed[field] === undefined) {
      renamed[field] = renamed[wireKey];
    }
    delete renamed[wireKey];
  }
  return renamed;
}

export const SourceMetadataSchema = z.preprocess(
  (value) => (isRecord(value) ? renameWireKeys(value, SOURCE_METADATA_WIRE_KEYS) : value),
  z
    .object({
      relPath: z.string().nullable().optional(),
    })
    .passthrough(),
);

export type SourceMetadata = z.infer<typeof SourceMetadataSchema>;

export const SPOT_URI_PREFIX = 'spot://';

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const CONTENT_TYPES_BY_EXTENSION: Record<string, string> = {
  txt: 'text/plain',
  md: 'text/markdown',
  csv: 'text/csv',
  html: 'text/html',
  json: 'application/json',
  pdf: 'application/pdf',
  zip: 'application/zip',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

function uriPath(uri: string): string {
  try {
    const parsed = new URL(uri);
    return parsed.protocol === 'spot:' ? `${parsed.host}${parsed.pathname}` : parsed.pathname;
  } catch {
    return uri.split(/[?#]/)[0] ?? uri;
  }
}

/** Last path segment of a URI, or undefined when it has none. */
export function uriBasename(uri: string): string | undefined {
  const segments = uriPath(uri).split('/').filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : undefined;
}

export function guessContentType(uri: string): string {
  const basename = uriBasename(uri);
  const dot = basename?.lastIndexOf('.') ?? -1;
  if (!basename || dot <= 0) {
    return DEFAULT_CONTENT_TYPE;
  }
  return CONTENT_TYPES_BY_EXTENSION[basename.slice(dot + 1).toLowerCase()] ?? DEFAULT_CONTENT_TYPE;
}

/** File id encoded in a `spot://<id>/...` URI. */
export function spotFileId(uri: string): string | undefined {
  if (!uri.startsWith(SPOT_URI_PREFIX)) {
    return undefined;
  }
  const id = uri.slice(SPOT_URI_PREFIX.length).split('/')[0];
  return id ? id : undefined;
}

/**
 * Id assumed for a file reference that carries a spot URI but no id: the
 * URI's last segment.
 */
export function spotReferenceId(uri: string): string | undefined {
  if (!uri.includes(SPOT_URI_PREFIX)) {
    return undefined;
  }
  const segments = uri.split('/');
  const id = segments[segments.length - 1];
  return id ? id : undefined;
}

function fillFileReferenceDefaults(value: unknown): unknown {
  if (!isRecord(value) || typeof value.uri !== 'string') {
    return value;
  }

  const filled = renameWireKeys(value, FILE_REFERENCE_WIRE_KEYS);
  const uri = value.uri;

  if (!filled.name) {
    filled.name = uriBasename(uri) ?? `unknown_${randomBytes(16).toString('hex')}`;
  }
  if (!filled.contentType) {
    filled.contentType = guessContentType(uri);
  }
  if (filled.id === undefined || filled.id === null) {
    const id = spotReferenceId(uri);
    if (id) {
      filled.id = id;
    }
  }
  return filled;
}

const FileReferenceObjectSchema = z
  .object({
    id: z.string().nullable().optional(),
    uri: z.string().min(1),
    name: z.string().min(1),
    contentType: z.string().min(1),
    sourceType: SourceTypeSchema.default('Document'),
    sourceMetadata: SourceMetadataSchema.nullable().optional(),
  })
  .passthrough();

/**
 * FileReferenceSchema - a file handed to or produced by a node.
 * Accepts the wire's snake_case keys (`content_type`, `source_type`,
 * `source_metadata`) as well as the camelCase fields. Only `uri` is
 * mandatory; name, content type and (for spot:// URIs) id are derived from
 * it when absent.
 */
export const FileReferenceSchema = z.preprocess(fillFileReferenceDefaults, FileReferenceObjectSchema);

export type FileReference = z.infer<typeof FileReferenceObjectSchema>;

/** A file reference as it travels over the wire. */
export interface FileReferenceWire {
  [key: string]: unknown;
  id?: string | null;
  uri: string;
  name: string;
  content_type: string;
  source_type: SourceType;
  source_metadata?: Record<string, unknown> | null;
}

export function toSourceMetadataWire(metadata: SourceMetadata): Record<string, unknown> {
  const { relPath, ...rest } = metadata;
  return relPath === undefined ? { ...rest } : { ...rest, rel_path: relPath };
}

export function toFileReferenceWire(reference: FileReference): FileReferenceWire {
  const { contentType, sourceType, sourceMetadata, ...rest } = reference;
  const wire: FileReferenceWire = { ...rest, content_type: contentType, source_type: sourceType };
  if (sourceMetadata !== undefined) {
    wire.source_metadata = sourceMetadata === null ? null : toSourceMetadataWire(sourceMetadata);
  }
  return wire;
}
