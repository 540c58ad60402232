/**
 * Plugin SDK surface: what a plugin imports to declare its capabilities.
 */
export {
  definePlugin,
  defineNode,
  defineIntegration,
  syncHandler,
  asyncHandler,
} from './modules/plugins/sdk/define';
export { PluginFile, type PluginFileFromBytesOptions } from './modules/plugins/sdk/plugin-file';
export { buildManifest, describeShape, type ShapeDescription, type ShapeField } from './modules/plugins/sdk/manifest';
export { SDK_VERSION } from './modules/plugins/sdk/version';
export { ExecutionContext, DEFAULT_GROUP_ID, type PluginGroup } from './modules/plugins/context/execution-context';
export type {
  PluginDefinition,
  NodeCapability,
  IntegrationCapability,
  NodeHandler,
  NodeInputs,
  ConnectorInput,
  ValidationResult,
} from './modules/plugins/interfaces/plugin-definition.interface';
export type { FileContentService, UploadFileOptions, UploadedFile } from './modules/plugins/services/file-content.service';
export { PluginValidationError } from './modules/plugins/errors/plugin-errors';
export { BadRequestError } from './common/errors/error-types';
export {
  PluginManifestSchema,
  FileReferenceSchema,
  type PluginManifest,
  type FileReference,
  type SourceType,
} from '@plugforge/shared';
