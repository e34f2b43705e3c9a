/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Redis
  REDIS_URL: Type.String({ minLength: 1, default: 'redis://localhost:6379' }),
  REDIS_KEY_PREFIX: Type.Optional(Type.String({ minLength: 1 })),
  REDIS_CONNECT_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 5000 }),
  REDIS_COMMAND_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 1000 }),
  REDIS_AUTO_PIPELINING: Type.Boolean({ default: true }),
  REDIS_TRACING: Type.Boolean({ default: true }),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (value: string | undefined, defaultValue: number): number =>
  value != null && value !== '' ? Number(value) : defaultValue;

const parseBooleanOr = (value: string | undefined, defaultValue: boolean): boolean | string => {
  if (value == null || value === '') return defaultValue;
  const normalized = value.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    REDIS_URL: env['REDIS_URL'] ?? 'redis://localhost:6379',
    ...(env['REDIS_KEY_PREFIX'] !== undefined && { REDIS_KEY_PREFIX: env['REDIS_KEY_PREFIX'] }),
    REDIS_CONNECT_TIMEOUT_MS: parseIntOr(env['REDIS_CONNECT_TIMEOUT_MS'], 5000),
    REDIS_COMMAND_TIMEOUT_MS: parseIntOr(env['REDIS_COMMAND_TIMEOUT_MS'], 1000),
    REDIS_AUTO_PIPELINING: parseBooleanOr(env['REDIS_AUTO_PIPELINING'], true),
    REDIS_TRACING: parseBooleanOr(env['REDIS_TRACING'], true),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  // Fail at startup rather than on the first command
  parseRedisEndpoints(rawEnv.REDIS_URL);

  return rawEnv;
};

// ─────────────────────────────────────────────────────────────────────────────
// Redis Endpoints
// ─────────────────────────────────────────────────────────────────────────────

export interface RedisEndpoint {
  /** Connection URL as configured */
  url: string;
  /** Database index taken from the URL path. Default: 0 */
  db: number;
  /** `host:port/db`, without credentials; used in logs and spans */
  name: string;
}

/**
 * Split a comma-separated REDIS_URL into one endpoint per partition.
 */
export const parseRedisEndpoints = (value: string): RedisEndpoint[] => {
  const urls = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '');

  if (urls.length === 0) {
    throw new Error('Invalid environment configuration: REDIS_URL lists no endpoints');
  }

  return urls.map((url) => {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (cause) {
      throw new Error('Invalid environment configuration: REDIS_URL entry is not a URL', {
        cause,
      });
    }

    if (parsed.protocol !== 'redis:' && parsed.protocol !== 'rediss:') {
      throw new Error(
        `Invalid environment configuration: unsupported Redis protocol '${parsed.protocol}'`
      );
    }

    const path = parsed.pathname.replace(/^\//, '');
    const db = path === '' ? 0 : Number(path);
    if (!Number.isInteger(db) || db < 0) {
      throw new Error(`Invalid environment configuration: invalid Redis database '${path}'`);
    }

    const port = parsed.port === '' ? '6379' : parsed.port;
    return { url, db, name: `${parsed.hostname}:${port}/${String(db)}` };
  });
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  env: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  redis: {
    endpoints: parseRedisEndpoints(env.REDIS_URL),
    keyPrefix: env.REDIS_KEY_PREFIX,
    connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
    commandTimeoutMs: env.REDIS_COMMAND_TIMEOUT_MS,
    autoPipelining: env.REDIS_AUTO_PIPELINING,
    tracing: env.REDIS_TRACING,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
export type RedisConfig = AppConfig['redis'];
