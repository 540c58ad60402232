import type {
  AsyncNodeHandler,
  IntegrationCapability,
  NodeCapability,
  NodeInputs,
  PluginDefinition,
  SyncNodeHandler,
} from '../interfaces/plugin-definition.interface';
import type { ExecutionContext } from '../context/execution-context';

/**
 * Helpers for plugin authors. Each returns its input unchanged; they exist so
 * the config and credential types flow from the schemas into the handlers.
 */
export function definePlugin<TConfig>(definition: PluginDefinition<TConfig>): PluginDefinition<TConfig> {
  return definition;
}

export function defineNode<TConfig>(definition: NodeCapability<TConfig>): NodeCapability<TConfig> {
  return definition;
}

export function defineIntegration<TCredentials>(
  definition: IntegrationCapability<TCredentials>,
): IntegrationCapability<TCredentials> {
  return definition;
}

/** A handler that returns its outputs directly. */
export function syncHandler<TConfig>(
  run: (ctx: ExecutionContext, inputs: NodeInputs, config: TConfig) => unknown,
): SyncNodeHandler<TConfig> {
  return { kind: 'sync', run };
}

/** A handler that resolves to its outputs. */
export function asyncHandler<TConfig>(
  run: (ctx: ExecutionContext, inputs: NodeInputs, config: TConfig) => Promise<unknown>,
): AsyncNodeHandler<TConfig> {
  return { kind: 'async', run };
}
