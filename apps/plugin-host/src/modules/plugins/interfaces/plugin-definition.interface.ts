import type { z } from 'zod';
import type { ConnectorDataType } from '@plugforge/shared';
import type { ExecutionContext } from '../context/execution-context';

export type NodeInputs = Record<string, unknown>;

/** Connector as written in a node definition; `dataType` defaults to text. */
export interface ConnectorInput {
  name: string;
  dataType?: ConnectorDataType;
  description?: string;
  optional?: boolean;
}

/**
 * Schemas are typed by their output only: a capability's handler sees the
 * parsed value, callers may send anything.
 */
export type CapabilitySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// Method signatures keep handlers bivariant in their config type, so a
// NodeCapability<{ city: string }> is usable where NodeCapability is expected.
export interface SyncNodeHandler<TConfig> {
  readonly kind: 'sync';
  run(ctx: ExecutionContext, inputs: NodeInputs, config: TConfig): unknown;
}

export interface AsyncNodeHandler<TConfig> {
  readonly kind: 'async';
  run(ctx: ExecutionContext, inputs: NodeInputs, config: TConfig): Promise<unknown>;
}

export type NodeHandler<TConfig> = SyncNodeHandler<TConfig> | AsyncNodeHandler<TConfig>;

export interface NodeConfigOptions {
  skipCache: boolean;
}

export interface NodeCapability<TConfig = unknown> {
  readonly name: string;
  readonly displayName?: string;
  readonly description?: string;
  readonly inputs: readonly ConnectorInput[];
  readonly outputs: readonly ConnectorInput[];
  readonly configSchema: CapabilitySchema<TConfig>;
  readonly handler: NodeHandler<TConfig>;
  /** Dynamic configuration (e.g. options fetched with the caller's credentials). */
  getConfig?(
    ctx: ExecutionContext,
    config: Record<string, unknown>,
    options: NodeConfigOptions,
  ): unknown;
}

export interface IntegrationCapability<TCredentials = unknown> {
  readonly type: string;
  readonly displayName: string;
  readonly image: string;
  readonly visible?: boolean;
  readonly scopes?: readonly string[];
  readonly properties?: Readonly<Record<string, string>>;
  readonly credentialsSchema: CapabilitySchema<TCredentials>;
  isReady?(credentials: TCredentials): boolean | Promise<boolean>;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface PluginDefinition<TConfig = unknown> {
  readonly name: string;
  readonly version: string;
  readonly displayName?: string;
  readonly description?: string;
  readonly author?: string;
  readonly minSdkVersion?: string;
  readonly configSchema?: CapabilitySchema<TConfig>;
  validateConfig?(config: TConfig): ValidationResult | Promise<ValidationResult>;
  readonly nodes: readonly NodeCapability[];
  readonly integrations: readonly IntegrationCapability[];
}
