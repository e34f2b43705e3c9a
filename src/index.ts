export * from './redis/index.js';
export {
  createConfig,
  parseEnv,
  parseRedisEndpoints,
  type AppConfig,
  type Env,
  type RedisConfig,
  type RedisEndpoint,
} from './infra/config/index.js';
export {
  createLogger,
  createPartitionLogger,
  serializeLogError,
  type Logger,
  type LogLevel,
} from './infra/logger/index.js';
export { createOtelCommandTracer, noopCommandTracer } from './infra/telemetry/index.js';
