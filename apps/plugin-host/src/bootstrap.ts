import type { DynamicModule, LogLevel } from '@nestjs/common';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import type { EnvConfig } from './common/config/env.config';
import { ValidationError } from './common/errors/error-types';
import { createLogger } from './common/logging/logger';
import { PluginLoaderService } from './modules/plugins/services/plugin-loader.service';

const logger = createLogger('Bootstrap');

/** Line read from stdout by the process that spawned this host. */
export function portHandshake(port: number): string {
  return `PLUGIN_PORT:${port}`;
}

/** Maps pino levels (used in env config) to NestJS log levels. */
export function nestLogLevels(level: EnvConfig['LOG_LEVEL']): LogLevel[] | false {
  switch (level) {
    case 'silent':
    case 'fatal':
      return false;
    case 'error':
      return ['error'];
    case 'warn':
      return ['error', 'warn'];
    case 'info':
      return ['error', 'warn', 'log'];
    case 'debug':
      return ['error', 'warn', 'log', 'debug'];
    case 'trace':
      return ['error', 'warn', 'log', 'debug', 'verbose'];
  }
}

/**
 * Root module for the configured mode. In serve mode the plugin is loaded
 * first; a plugin that fails to load stops the host from starting.
 */
export async function selectRootModule(
  config: Pick<EnvConfig, 'PLUGIN_HOST_MODE' | 'PLUGIN_PATH'>,
  loader: PluginLoaderService = new PluginLoaderService(),
): Promise<DynamicModule> {
  if (config.PLUGIN_HOST_MODE === 'sources') {
    logger.info('Starting in sources mode');
    return AppModule.forSources();
  }

  if (!config.PLUGIN_PATH) {
    throw new ValidationError('PLUGIN_PATH is required in serve mode');
  }

  const loaded = await loader.loadFromFolder(config.PLUGIN_PATH);
  for (const warning of loaded.warnings) {
    logger.warn({ plugin: loaded.plugin.name }, `Plugin warning: ${warning}`);
  }
  return AppModule.forPlugin(loaded.plugin);
}

export function setupSwagger(app: NestFastifyApplication, title: string): void {
  const swaggerConfig = new DocumentBuilder()
    .setTitle(title)
    .setDescription('Plugin source resolution and capability execution API')
    .setVersion('0.1.0')
    .addTag('health', 'Health check endpoints')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);
}

/** Port actually bound, which differs from the configured one when that is 0. */
export function listeningPort(app: NestFastifyApplication, fallback: number): number {
  const address = app.getHttpAdapter().getInstance().server.address();
  return address && typeof address === 'object' ? address.port : fallback;
}
