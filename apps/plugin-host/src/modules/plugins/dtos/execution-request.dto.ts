import { z } from 'zod';
import type { ExecutionContextInit } from '../context/execution-context';

const JsonObjectSchema = z.record(z.unknown());

/**
 * The platform sends the context in snake_case; `config` is accepted as an
 * older name for `plugin_config`.
 */
export const ExecutionContextPayloadSchema = z
  .object({
    plugin_config: JsonObjectSchema.nullable().optional(),
    config: JsonObjectSchema.nullable().optional(),
    integration_credentials: z.record(JsonObjectSchema).nullable().optional(),
    group_id: z.string().nullable().optional(),
  })
  .default({})
  .transform(
    (context): ExecutionContextInit => ({
      pluginConfig: context.plugin_config ?? context.config ?? {},
      integrationCredentials: context.integration_credentials ?? {},
      groupId: context.group_id ?? null,
    }),
  );

export const ExecuteNodeRequestSchema = z.object({
  context: ExecutionContextPayloadSchema,
  inputs: JsonObjectSchema.default({}),
  config: JsonObjectSchema.default({}),
});

export type ExecuteNodeRequest = z.infer<typeof ExecuteNodeRequestSchema>;

export const NodeConfigRequestSchema = z.object({
  context: ExecutionContextPayloadSchema,
  config: JsonObjectSchema.default({}),
});

export type NodeConfigRequest = z.infer<typeof NodeConfigRequestSchema>;

export const IntegrationReadyRequestSchema = z
  .object({
    credentials: JsonObjectSchema.nullable().default(null),
  })
  .default({});

export const SkipCacheQuerySchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

export interface ExecuteNodeResponse {
  success: true;
  outputs: Record<string, unknown>;
}
