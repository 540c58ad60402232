import pino from 'pino';
import { getEnvConfig } from '../config/env.config';

const config = getEnvConfig();

const isTest = config.NODE_ENV === 'test' || typeof process.env.JEST_WORKER_ID === 'string';
const usePretty = config.NODE_ENV === 'development' && !isTest;

const options: pino.LoggerOptions = {
  level: isTest ? 'silent' : config.LOG_LEVEL,
  redact: ['token', 'password', '*.token', '*.password'],
};

// Logs go to stderr (fd 2): stdout carries the PLUGIN_PORT handshake read by the parent process
export const logger = usePretty
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2, // stderr
        },
      },
    })
  : pino(options, pino.destination({ dest: 2, sync: isTest }));

export function createLogger(context: string) {
  return logger.child({ context });
}

export type Logger = ReturnType<typeof createLogger>;
