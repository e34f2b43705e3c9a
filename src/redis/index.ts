/**
 * Redis Structures - Public API
 *
 * Typed string and set structures over Redis, with pluggable value codecs,
 * atomic clamped counters and get-or-compute.
 *
 * ```typescript
 * import { createConfig, parseEnv } from '@/infra/config/index.js';
 * import { createLogger } from '@/infra/logger/index.js';
 * import { initRedisStructures, numberCodec } from '@/redis/index.js';
 *
 * const config = createConfig(parseEnv(process.env));
 * const redis = initRedisStructures({ config: config.redis, logger: createLogger(config.logger) });
 *
 * const stock = redis.string('stock:sku-1', numberCodec);
 * const remaining = await stock.incrementClampedByMin(-1, 0);
 * ```
 */

// Errors
export {
  createCancellationError,
  createCommandError,
  createRemoteUnavailableError,
  createScriptExecutionError,
  createSerializationError,
  createValidationError,
  type CancellationError,
  type CommandError,
  type ExecutorError,
  type RedisStructureError,
  type RemoteUnavailableError,
  type ScriptExecutionError,
  type SerializationError,
  type ValidationError,
} from './errors.js';

// Types & ports
export {
  found,
  notFound,
  type CommandCategory,
  type CommandOptions,
  type Expiration,
  type Lookup,
  type StructureResult,
} from './types.js';
export type {
  AtomicScript,
  CommandSpan,
  CommandTrace,
  CommandTracer,
  ExecutorResult,
  RedisExecutor,
  RedisTransaction,
  ValueCodec,
} from './ports.js';
export { toExpirySeconds } from './expiration.js';

// Codecs
export {
  createJsonCodec,
  decimalCodec,
  deserializeJson,
  numberCodec,
  serializeJson,
  stringCodec,
} from './codecs/index.js';

// Key space
export {
  createCacheKey,
  createKeySpace,
  createPartition,
  partitionIndex,
  type CacheKey,
  type KeySpace,
  type KeySpaceOptions,
  type RedisPartition,
  type RedisPartitionOptions,
} from './key-space.js';

// Structures
export { createRedisString, type RedisString } from './redis-string.js';
export { createRedisSet, type RedisSet } from './redis-set.js';
export {
  getOrCompute,
  type CacheAsideStore,
  type GetOrComputeOptions,
  type Producer,
  type ProducerContext,
} from './cache-aside.js';
export {
  CLAMP_SCRIPTS,
  clampScriptFor,
  renderClampScript,
  type ClampBound,
  type ClampNumeric,
  type ClampScript,
} from './scripts/clamp-scripts.js';

// Adapters & client
export {
  classifyRedisFailure,
  closeRedis,
  createIoredisExecutor,
  createRedisConnection,
  pingRedis,
  type IoredisExecutorOptions,
  type RedisConnectionOptions,
} from './adapters/index.js';
export {
  initRedisStructures,
  type InitRedisStructuresOptions,
  type RedisStructures,
} from './client.js';
