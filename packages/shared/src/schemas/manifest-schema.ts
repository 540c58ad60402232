import { z } from 'zod';
import * as semver from 'semver';

/**
 * Semver string schema with validation
 */
export const semverString = z.string().refine((v) => semver.valid(v) !== null, {
  message: 'Must be a valid semantic version (e.g., "1.0.0", "0.4.0-beta.1")',
});

/** Data types a node connector can carry. Only `file` gets special handling at request time. */
export const ConnectorDataTypeSchema = z.enum(['text', 'number', 'boolean', 'json', 'file']);

export type ConnectorDataType = z.infer<typeof ConnectorDataTypeSchema>;

export const ConnectorSchema = z.object({
  name: z.string().min(1),
  dataType: ConnectorDataTypeSchema.default('text'),
  description: z.string().optional(),
  optional: z.boolean().optional(),
});

export type Connector = z.infer<typeof ConnectorSchema>;

export const NodeDefinitionSchema = z
  .object({
    name: z.string().min(1),
    displayName: z.string().optional(),
    description: z.string().optional(),
    inputs: z.array(ConnectorSchema).default([]),
    outputs: z.array(ConnectorSchema).default([]),
  })
  .passthrough();

export type NodeDefinition = z.infer<typeof NodeDefinitionSchema>;

/**
 * IntegrationDefinitionSchema - how an integration (credential type) is
 * advertised in a plugin manifest. `config` is the description of the
 * credential fields.
 */
export const IntegrationDefinitionSchema = z
  .object({
    type: z.string().min(1),
    displayName: z.string().min(1),
    image: z.string().default(''),
    visible: z.boolean().default(true),
    scopes: z.array(z.string()).default([]),
    properties: z.record(z.string()).default({}),
    config: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type IntegrationDefinition = z.infer<typeof IntegrationDefinitionSchema>;

/**
 * PluginManifestSchema - the `manifest.json` shipped at the root of a plugin.
 *
 * Fields:
 * - name: Unique plugin identifier (required)
 * - version: Semantic version (required)
 * - displayName / description / author: display metadata
 * - minSdkVersion: Oldest plugin host able to serve this plugin
 * - nodes: Declared node capabilities
 * - integrations: Declared integration capabilities
 *
 * Unknown fields are kept so the manifest can be forwarded as-is.
 */
export const PluginManifestSchema = z
  .object({
    name: z.string().min(1),
    version: semverString,
    displayName: z.string().optional(),
    description: z.string().nullable().optional(),
    author: z.string().optional(),
    minSdkVersion: semverString.optional(),
    nodes: z.array(NodeDefinitionSchema).default([]),
    integrations: z.array(IntegrationDefinitionSchema).default([]),
  })
  .passthrough();

/** Inferred TypeScript type for a parsed plugin manifest */
export type PluginManifest = z.infer<typeof PluginManifestSchema>;

/** Manifest as written by plugin authors, before defaults are applied */
export type PluginManifestInput = z.input<typeof PluginManifestSchema>;

export function parseManifest(data: unknown): PluginManifest {
  return PluginManifestSchema.parse(data);
}
