import { z } from 'zod';
import * as dotenv from 'dotenv';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const milliseconds = (fallback: string) =>
  z.string().regex(/^\d+$/).default(fallback).transform(Number);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).default('8005').transform(Number),
  HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  // serve: run one plugin; sources: expose source resolution
  PLUGIN_HOST_MODE: z.enum(['serve', 'sources']).default('serve'),
  PLUGIN_PATH: z.string().min(1).optional(),
  PLUGIN_SERVER_URL: z.string().url().default('http://localhost:8500'),
  PRINT_PORT: booleanFlag,
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),
  SOURCE_REQUEST_TIMEOUT_MS: milliseconds('30000'),
  FILE_REQUEST_TIMEOUT_MS: milliseconds('60000'),
  GIT_TIMEOUT_MS: milliseconds('300000'),
  GIT_BINARY: z.string().min(1).default('git'),
});

export type EnvConfig = z.infer<typeof envSchema>;

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment configuration:', result.error.format());
    throw new Error('Environment validation failed');
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
