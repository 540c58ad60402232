import { Injectable } from '@nestjs/common';
import * as fs from 'fs/promises';
import { join, resolve } from 'path';
import * as semver from 'semver';
import { z } from 'zod';
import { PluginManifestSchema, type PluginManifest } from '@plugforge/shared';
import { errorMessage } from '../../../common/errors/error-types';
import { createLogger } from '../../../common/logging/logger';
import { PluginValidationError } from '../errors/plugin-errors';
import type { PluginDefinition } from '../interfaces/plugin-definition.interface';
import { SDK_VERSION } from '../sdk/version';
import { CapabilityRegistry } from './capability-registry';

const logger = createLogger('PluginLoaderService');

const MANIFEST_FILENAME = 'manifest.json';
const PACKAGE_FILENAME = 'package.json';
const DEFAULT_ENTRY = 'index.js';

export interface LoadedPlugin {
  plugin: PluginDefinition;
  registry: CapabilityRegistry;
  manifest: PluginManifest | null;
  warnings: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const FunctionSchema = z.custom<(...args: unknown[]) => unknown>(
  (value) => typeof value === 'function',
  { message: 'Expected a function' },
);

// Schemas may come from the plugin's own copy of zod, so no instanceof check
const SchemaLikeSchema = z.custom<{ safeParse: unknown }>(
  (value) => isRecord(value) && typeof value.safeParse === 'function',
  { message: 'Expected a zod schema' },
);

const PluginShapeSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().refine((value) => semver.valid(value) !== null, {
      message: 'Must be a valid semantic version',
    }),
    nodes: z.array(
      z
        .object({
          name: z.string().min(1),
          inputs: z.array(z.object({ name: z.string().min(1) }).passthrough()),
          outputs: z.array(z.object({ name: z.string().min(1) }).passthrough()),
          configSchema: SchemaLikeSchema,
          handler: z.object({ kind: z.enum(['sync', 'async']), run: FunctionSchema }).passthrough(),
        })
        .passthrough(),
    ),
    integrations: z.array(
      z
        .object({
          type: z.string().min(1),
          displayName: z.string().min(1),
          image: z.string(),
          credentialsSchema: SchemaLikeSchema,
        })
        .passthrough(),
    ),
  })
  .passthrough();

const PackageJsonSchema = z.object({ main: z.string().min(1).optional() }).passthrough();

export function isPluginDefinition(value: unknown): value is PluginDefinition {
  return PluginShapeSchema.safeParse(value).success;
}

function pluginShapeIssues(value: unknown): string[] {
  const result = PluginShapeSchema.safeParse(value);
  return result.success
    ? []
    : result.error.errors.map((issue) => `${issue.path.join('.') || '(export)'}: ${issue.message}`);
}

async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function parseJson(content: string, filename: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new PluginValidationError(`${filename} is not valid JSON: ${errorMessage(error)}`);
  }
}

/**
 * Loads a plugin from a folder: imports its entry point, checks the export is
 * a plugin definition, cross-checks manifest.json and builds the registry.
 */
@Injectable()
export class PluginLoaderService {
  async loadFromFolder(folder: string): Promise<LoadedPlugin> {
    const root = resolve(folder);
    logger.debug({ folder: root }, 'Loading plugin');

    const entry = await this.resolveEntry(root);
    const plugin = await this.importPlugin(entry);

    const warnings: string[] = [];
    const manifest = await this.readManifest(root);
    if (manifest) {
      warnings.push(...this.compareWithManifest(plugin, manifest));
    }

    const minSdkVersion = plugin.minSdkVersion ?? manifest?.minSdkVersion;
    if (minSdkVersion && semver.valid(minSdkVersion) && semver.gt(minSdkVersion, SDK_VERSION)) {
      warnings.push(`Plugin requires SDK ${minSdkVersion} or newer; this host provides ${SDK_VERSION}`);
    }

    const registry = CapabilityRegistry.fromPlugin(plugin);
    logger.info(
      {
        plugin: plugin.name,
        version: plugin.version,
        nodes: registry.nodeNames(),
        integrations: registry.integrationTypes(),
        warnings: warnings.length,
      },
      'Plugin loaded',
    );
    return { plugin, registry, manifest, warnings };
  }

  private async resolveEntry(root: string): Promise<string> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(root)).isDirectory();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new PluginValidationError(`Plugin folder ${root} does not exist`);
      }
      throw error;
    }
    if (!isDirectory) {
      throw new PluginValidationError(`Plugin folder ${root} is not a directory`);
    }

    const packageContent = await readOptionalFile(join(root, PACKAGE_FILENAME));
    const packageJson = packageContent
      ? PackageJsonSchema.safeParse(parseJson(packageContent, PACKAGE_FILENAME))
      : null;
    const entry = resolve(
      root,
      packageJson?.success && packageJson.data.main ? packageJson.data.main : DEFAULT_ENTRY,
    );

    if ((await readOptionalFile(entry)) === null) {
      throw new PluginValidationError(`Plugin entry point ${entry} not found`);
    }
    return entry;
  }

  private async importPlugin(entry: string): Promise<PluginDefinition> {
    let moduleExports: unknown;
    try {
      moduleExports = await import(entry);
    } catch (error) {
      throw new PluginValidationError(`Failed to import plugin entry ${entry}: ${errorMessage(error)}`);
    }

    // `module.exports = plugin`, `exports.plugin = plugin` or a transpiled `export default`
    const candidates: unknown[] = isRecord(moduleExports)
      ? [
          moduleExports.default,
          moduleExports.plugin,
          isRecord(moduleExports.default) ? moduleExports.default.default : undefined,
        ]
      : [];
    const plugin = candidates.find(isPluginDefinition);
    if (plugin) {
      return plugin;
    }

    const exported = candidates.find((candidate) => candidate !== undefined);
    const issues = exported === undefined ? [] : pluginShapeIssues(exported);
    throw new PluginValidationError(
      `${entry} does not export a plugin definition (default or \`plugin\` export)`,
      { issues },
    );
  }

  private async readManifest(root: string): Promise<PluginManifest | null> {
    const content = await readOptionalFile(join(root, MANIFEST_FILENAME));
    if (content === null) {
      return null;
    }
    const result = PluginManifestSchema.safeParse(parseJson(content, MANIFEST_FILENAME));
    if (!result.success) {
      throw new PluginValidationError(`Invalid ${MANIFEST_FILENAME}`, {
        issues: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }

  private compareWithManifest(plugin: PluginDefinition, manifest: PluginManifest): string[] {
    const warnings: string[] = [];
    if (manifest.name !== plugin.name) {
      warnings.push(`${MANIFEST_FILENAME} name '${manifest.name}' differs from plugin name '${plugin.name}'`);
    }
    if (manifest.version !== plugin.version) {
      warnings.push(
        `${MANIFEST_FILENAME} version '${manifest.version}' differs from plugin version '${plugin.version}'`,
      );
    }
    const provided = new Set(plugin.nodes.map((node) => node.name));
    for (const node of manifest.nodes) {
      if (!provided.has(node.name)) {
        warnings.push(`Node '${node.name}' is declared in ${MANIFEST_FILENAME} but not provided`);
      }
    }
    return warnings;
  }
}
