export {
  semverString,
  ConnectorDataTypeSchema,
  ConnectorSchema,
  NodeDefinitionSchema,
  IntegrationDefinitionSchema,
  PluginManifestSchema,
  parseManifest,
  type ConnectorDataType,
  type Connector,
  type NodeDefinition,
  type IntegrationDefinition,
  type PluginManifest,
  type PluginManifestInput,
} from './manifest-schema.js';
export {
  SOURCE_TYPES,
  SPOT_URI_PREFIX,
  SourceTypeSchema,
  SourceMetadataSchema,
  FileReferenceSchema,
  uriBasename,
  guessContentType,
  spotFileId,
  spotReferenceId,
  toFileReferenceWire,
  toSourceMetadataWire,
  type SourceType,
  type SourceMetadata,
  type FileReference,
  type FileReferenceWire,
} from './file-schema.js';
