export {
  classifyRedisFailure,
  closeRedis,
  createIoredisExecutor,
  createRedisConnection,
  parseTransactionReplies,
  pingRedis,
  type IoredisExecutorOptions,
  type RedisConnectionOptions,
} from './ioredis-executor.js';
