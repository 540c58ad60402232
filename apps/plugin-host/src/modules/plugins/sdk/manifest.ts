import { z } from 'zod';
import { PluginManifestSchema, type PluginManifest } from '@plugforge/shared';
import type {
  CapabilitySchema,
  IntegrationCapability,
  NodeCapability,
  PluginDefinition,
} from '../interfaces/plugin-definition.interface';

export interface ShapeField {
  name: string;
  required: boolean;
  description?: string;
}

export interface ShapeDescription {
  fields: ShapeField[];
}

const MAX_UNWRAP_DEPTH = 8;

function unwrapObject(schema: z.ZodTypeAny): z.AnyZodObject | null {
  let current = schema;
  for (let depth = 0; depth < MAX_UNWRAP_DEPTH; depth++) {
    if (current instanceof z.ZodObject) {
      return current;
    }
    if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else {
      return null;
    }
  }
  return null;
}

/**
 * Field list of an object schema, used to describe node configs and
 * integration credentials to the platform. Non-object schemas have no fields.
 */
export function describeShape(schema: CapabilitySchema<unknown>): ShapeDescription {
  const objectSchema = unwrapObject(schema);
  if (!objectSchema) {
    return { fields: [] };
  }

  const shape: Record<string, z.ZodTypeAny> = objectSchema.shape;
  return {
    fields: Object.entries(shape).map(([name, field]) => ({
      name,
      required: !field.isOptional(),
      ...(field.description ? { description: field.description } : {}),
    })),
  };
}

function describeNode(node: NodeCapability) {
  return {
    name: node.name,
    displayName: node.displayName,
    description: node.description,
    inputs: [...node.inputs],
    outputs: [...node.outputs],
    config: describeShape(node.configSchema),
  };
}

function describeIntegration(integration: IntegrationCapability) {
  return {
    type: integration.type,
    displayName: integration.displayName,
    image: integration.image,
    visible: integration.visible ?? true,
    scopes: [...(integration.scopes ?? [])],
    properties: { ...(integration.properties ?? {}) },
    config: describeShape(integration.credentialsSchema),
  };
}

export function buildManifest(plugin: PluginDefinition): PluginManifest {
  return PluginManifestSchema.parse({
    name: plugin.name,
    version: plugin.version,
    displayName: plugin.displayName,
    description: plugin.description,
    author: plugin.author,
    minSdkVersion: plugin.minSdkVersion,
    nodes: plugin.nodes.map(describeNode),
    integrations: plugin.integrations.map(describeIntegration),
  });
}
