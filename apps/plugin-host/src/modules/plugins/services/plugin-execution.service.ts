import { Injectable } from '@nestjs/common';
import type { z, ZodError } from 'zod';
import type { PluginManifest } from '@plugforge/shared';
import { BadRequestError, errorMessage } from '../../../common/errors/error-types';
import { createLogger } from '../../../common/logging/logger';
import { ExecutionContext, type ExecutionContextInit } from '../context/execution-context';
import {
  ExecuteNodeRequestSchema,
  IntegrationReadyRequestSchema,
  NodeConfigRequestSchema,
  type ExecuteNodeResponse,
} from '../dtos/execution-request.dto';
import {
  CapabilityExecutionError,
  ConfigValidationError,
  PluginValidationError,
  type ConfigIssue,
} from '../errors/plugin-errors';
import type {
  NodeCapability,
  NodeInputs,
  ValidationResult,
} from '../interfaces/plugin-definition.interface';
import { buildManifest, describeShape, type ShapeDescription } from '../sdk/manifest';
import { coerceInputs } from '../utils/coerce-inputs';
import { CapabilityRegistry } from './capability-registry';
import { FileContentServiceFactory } from './file-content.service';

const logger = createLogger('PluginExecutionService');

export type ExecutionStage =
  | 'received'
  | 'routed'
  | 'coerced'
  | 'context_bound'
  | 'invoked'
  | 'responded'
  | 'failed';

export interface NodeSummary {
  name: string;
  displayName: string;
  description: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toConfigIssues(error: ZodError): ConfigIssue[] {
  return error.errors.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
    code: issue.code,
  }));
}

function parseEnvelope<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new BadRequestError(
      result.error.errors.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`).join(', '),
    );
  }
  return result.data;
}

/**
 * Categories a capability may raise on purpose. Anything else thrown by
 * plugin code is treated as a fault.
 */
function toInvocationError(error: unknown, details: Record<string, unknown>): Error {
  if (error instanceof BadRequestError || error instanceof PluginValidationError) {
    return error;
  }
  return new CapabilityExecutionError(error, details);
}

@Injectable()
export class PluginExecutionService {
  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly fileContentFactory: FileContentServiceFactory,
  ) {}

  get pluginName(): string {
    return this.registry.plugin.name;
  }

  getManifest(): PluginManifest {
    return buildManifest(this.registry.plugin);
  }

  listNodes(): { plugin: string; nodes: NodeSummary[] } {
    return {
      plugin: this.pluginName,
      nodes: this.registry.listNodes().map((node) => ({
        name: node.name,
        displayName: node.displayName ?? node.name,
        description: node.description ?? null,
      })),
    };
  }

  /**
   * Runs one node: received, routed, coerced, context_bound, invoked,
   * responded. A failure at any stage is logged with the stage it reached.
   */
  async executeNode(name: string, body: unknown): Promise<ExecuteNodeResponse> {
    const startedAt = Date.now();
    let stage: ExecutionStage = 'received';

    try {
      const request = parseEnvelope(ExecuteNodeRequestSchema, body);

      const node = this.registry.getNode(name);
      stage = 'routed';

      const inputs = coerceInputs(node.inputs, request.inputs);
      const config = this.parseNodeConfig(node, request.config);
      stage = 'coerced';

      const ctx = this.createContext(request.context);
      stage = 'context_bound';

      const result = await this.invoke(node, ctx, inputs, config);
      stage = 'invoked';

      const response: ExecuteNodeResponse = {
        success: true,
        outputs: isRecord(result) ? result : { output: result },
      };
      stage = 'responded';
      logger.info({ node: name, stage, durationMs: Date.now() - startedAt }, 'Node executed');
      return response;
    } catch (error) {
      logger.warn(
        {
          node: name,
          stage: 'failed',
          reachedStage: stage,
          durationMs: Date.now() - startedAt,
          error: errorMessage(error),
        },
        'Node execution failed',
      );
      throw error;
    }
  }

  /** The node's dynamic config, or its declared config fields. */
  async getNodeConfig(name: string, body: unknown, skipCache: boolean): Promise<unknown> {
    const request = parseEnvelope(NodeConfigRequestSchema, body);
    const node = this.registry.getNode(name);

    if (!node.getConfig) {
      return { config: request.config, fields: describeShape(node.configSchema).fields };
    }

    const ctx = this.createContext(request.context);
    try {
      return await node.getConfig(ctx, request.config, { skipCache });
    } catch (error) {
      throw toInvocationError(error, { node: name, operation: 'getConfig' });
    }
  }

  getIntegrationConfig(type: string): ShapeDescription {
    return describeShape(this.registry.getIntegration(type).credentialsSchema);
  }

  /**
   * Whether the given credentials satisfy the integration. Credentials stored
   * under a legacy `data` field are merged in first; credentials that do not
   * parse are simply not ready.
   */
  async checkIntegrationReady(type: string, body: unknown): Promise<boolean> {
    const integration = this.registry.getIntegration(type);
    const { credentials } = parseEnvelope(IntegrationReadyRequestSchema, body ?? {});
    if (!credentials) {
      return false;
    }

    const legacy = isRecord(credentials.data) ? credentials.data : {};
    const parsed = integration.credentialsSchema.safeParse({ ...credentials, ...legacy });
    if (!parsed.success) {
      logger.debug({ integration: type, issues: parsed.error.errors.length }, 'Credentials did not parse');
      return false;
    }

    try {
      const ready = integration.isReady ? await integration.isReady(parsed.data) : true;
      logger.info({ integration: type, ready }, 'Checked integration readiness');
      return ready;
    } catch (error) {
      throw toInvocationError(error, { integration: type, operation: 'isReady' });
    }
  }

  /** Validator faults are reported as errors, never thrown. */
  async validateConfig(config: unknown): Promise<ValidationResult> {
    const plugin = this.registry.plugin;
    if (!plugin.configSchema) {
      return isRecord(config)
        ? { valid: true, errors: [] }
        : { valid: false, errors: ['Validation error: configuration must be an object'] };
    }

    const parsed = plugin.configSchema.safeParse(config);
    if (!parsed.success) {
      const issues = toConfigIssues(parsed.error).map((issue) => `${issue.field}: ${issue.message}`);
      logger.debug({ issues }, 'Plugin configuration rejected');
      return { valid: false, errors: [`Validation error: ${issues.join('; ')}`] };
    }

    if (!plugin.validateConfig) {
      return { valid: true, errors: [] };
    }
    try {
      return await plugin.validateConfig(parsed.data);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Plugin config validator failed');
      return { valid: false, errors: [`Unexpected error: ${errorMessage(error)}`] };
    }
  }

  private parseNodeConfig(node: NodeCapability, config: Record<string, unknown>): unknown {
    const parsed = node.configSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigValidationError(toConfigIssues(parsed.error));
    }
    return parsed.data;
  }

  private createContext(init: ExecutionContextInit): ExecutionContext {
    const ctx = new ExecutionContext(init);
    ctx.bindFileHelper(this.fileContentFactory.create());
    return ctx;
  }

  private async invoke(
    node: NodeCapability,
    ctx: ExecutionContext,
    inputs: NodeInputs,
    config: unknown,
  ): Promise<unknown> {
    const { handler } = node;
    try {
      if (handler.kind === 'async') {
        return await handler.run(ctx, inputs, config);
      }
      // A sync handler can still hand back a promise
      return await handler.run(ctx, inputs, config);
    } catch (error) {
      throw toInvocationError(error, { node: node.name });
    }
  }
}
