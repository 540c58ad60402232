import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import {
  listeningPort,
  nestLogLevels,
  portHandshake,
  selectRootModule,
  setupSwagger,
} from './bootstrap';
import { getEnvConfig } from './common/config/env.config';
import { AppError } from './common/errors/error-types';
import { logger, createLogger } from './common/logging/logger';

async function bootstrap() {
  const config = getEnvConfig();
  const appLogger = createLogger('Bootstrap');

  const rootModule = await selectRootModule(config);

  // Fastify logs to stderr; stdout is reserved for the port handshake
  const fastifyLogger =
    config.LOG_LEVEL === 'error' || config.LOG_LEVEL === 'fatal' || config.LOG_LEVEL === 'silent'
      ? false
      : {
          level: config.LOG_LEVEL === 'warn' ? 'warn' : config.LOG_LEVEL === 'debug' ? 'debug' : 'info',
          stream: process.stderr,
        };

  const app = await NestFactory.create<NestFastifyApplication>(
    rootModule,
    new FastifyAdapter({
      logger: fastifyLogger,
      requestIdLogLabel: 'requestId',
      disableRequestLogging: fastifyLogger === false,
    }),
    {
      logger: nestLogLevels(config.LOG_LEVEL),
    },
  );

  // Handle graceful shutdown - run OnModuleDestroy hooks before exit
  let isShuttingDown = false;
  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    appLogger.info({ signal }, 'Received shutdown signal, starting graceful shutdown...');
    try {
      await app.close();
      appLogger.info('Graceful shutdown complete');
    } catch (error) {
      appLogger.error({ error }, 'Error during graceful shutdown');
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  setupSwagger(
    app,
    config.PLUGIN_HOST_MODE === 'sources' ? 'Plugin Sources API' : 'Plugin Host API',
  );

  await app.listen(config.PORT, config.HOST);
  const port = listeningPort(app, config.PORT);

  if (config.PRINT_PORT) {
    process.stdout.write(`${portHandshake(port)}\n`);
  }

  appLogger.info(
    { port, host: config.HOST, env: config.NODE_ENV, mode: config.PLUGIN_HOST_MODE },
    `Application is running on: http://${config.HOST}:${port}`,
  );
  appLogger.info(`API Documentation: http://${config.HOST}:${port}/api/docs`);
}

bootstrap().catch((error) => {
  if (error instanceof AppError && error.details) {
    logger.fatal({ code: error.code, details: error.details }, error.message);
  } else {
    logger.fatal(error, 'Failed to start application');
  }
  process.exit(1);
});
