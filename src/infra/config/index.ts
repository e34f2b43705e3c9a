export {
  EnvSchema,
  createConfig,
  parseEnv,
  parseRedisEndpoints,
  type AppConfig,
  type Env,
  type RedisConfig,
  type RedisEndpoint,
} from './env.js';
