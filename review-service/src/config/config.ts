import type { LevelWithSilent } from 'pino';
import { z } from 'zod';

export const ENVIRONMENTS = ['dev', 'stage', 'prd'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  ENVIRONMENT: z.enum(ENVIRONMENTS).default('dev'),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export type CorsConfig = {
  origins: string[];
  credentials: boolean;
};

export type AppConfig = {
  environment: Environment;
  apiTitle: string;
  apiVersion: string;
  host: string;
  port: number;
  cors: CorsConfig;
  logLevel: LevelWithSilent;
  requestTimeoutMs: number;
  jsonBodyLimit: string;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const CORS_ORIGINS: Record<Environment, string[]> = {
  dev: ['*'],
  stage: ['https://stage.code-sentinel.com', 'http://localhost:3000', 'http://localhost:3001'],
  prd: ['https://code-sentinel.com', 'https://www.code-sentinel.com'],
};

const DEFAULT_LOG_LEVELS: Record<Environment, LevelWithSilent> = {
  dev: 'debug',
  stage: 'info',
  prd: 'warn',
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const vars = parsed.data;
  return {
    environment: vars.ENVIRONMENT,
    apiTitle: 'Code-Sentinel API',
    apiVersion: '1.0.0',
    host: vars.API_HOST,
    port: vars.API_PORT,
    cors: { origins: [...CORS_ORIGINS[vars.ENVIRONMENT]], credentials: true },
    logLevel: vars.LOG_LEVEL ?? DEFAULT_LOG_LEVELS[vars.ENVIRONMENT],
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    jsonBodyLimit: '2mb',
  };
}
