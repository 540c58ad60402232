import type {
  IntegrationCapability,
  NodeCapability,
  PluginDefinition,
} from '../interfaces/plugin-definition.interface';
import { CapabilityNotFoundError, PluginValidationError } from '../errors/plugin-errors';

function indexByName<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  kind: string,
): ReadonlyMap<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    const key = keyOf(item);
    if (index.has(key)) {
      throw new PluginValidationError(`Duplicate ${kind} '${key}' in plugin`, { kind, name: key });
    }
    index.set(key, item);
  }
  return index;
}

/**
 * Name-indexed view of a plugin's capabilities. Built once when the plugin is
 * loaded and never modified afterwards.
 */
export class CapabilityRegistry {
  private readonly nodes: ReadonlyMap<string, NodeCapability>;
  private readonly integrations: ReadonlyMap<string, IntegrationCapability>;

  private constructor(readonly plugin: PluginDefinition) {
    this.nodes = indexByName(plugin.nodes, (node) => node.name, 'node');
    this.integrations = indexByName(
      plugin.integrations,
      (integration) => integration.type,
      'integration',
    );
    Object.freeze(this);
  }

  static fromPlugin(plugin: PluginDefinition): CapabilityRegistry {
    return new CapabilityRegistry(plugin);
  }

  getNode(name: string): NodeCapability {
    const node = this.nodes.get(name);
    if (!node) {
      throw new CapabilityNotFoundError('node', name, this.nodeNames());
    }
    return node;
  }

  getIntegration(type: string): IntegrationCapability {
    const integration = this.integrations.get(type);
    if (!integration) {
      throw new CapabilityNotFoundError('integration', type, this.integrationTypes());
    }
    return integration;
  }

  listNodes(): NodeCapability[] {
    return [...this.nodes.values()];
  }

  listIntegrations(): IntegrationCapability[] {
    return [...this.integrations.values()];
  }

  nodeNames(): string[] {
    return [...this.nodes.keys()];
  }

  integrationTypes(): string[] {
    return [...this.integrations.keys()];
  }
}
