/**
 * Key space: binds logical key names to partitions.
 *
 * A partition is one connection bound to one database index, together with the
 * tracer and logger used for every command sent through it. Resolution is a
 * pure function of the key name, so a key always lands on the same partition.
 */

import { createHash } from 'node:crypto';

import { createLogger, createPartitionLogger, type Logger } from '../infra/logger/index.js';
import { noopCommandTracer } from '../infra/telemetry/command-tracer.js';

import type { CommandTracer, RedisExecutor } from './ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Partitions
// ─────────────────────────────────────────────────────────────────────────────

export interface RedisPartition {
  /** Identifier used in logs and spans (e.g. `localhost:6379/0`) */
  readonly name: string;
  readonly db: number;
  readonly executor: RedisExecutor;
  readonly tracer: CommandTracer;
  readonly logger: Logger;
}

export interface RedisPartitionOptions {
  name?: string;
  executor: RedisExecutor;
  /** Defaults to a tracer that records nothing */
  tracer?: CommandTracer;
  /** Defaults to a silent logger */
  logger?: Logger;
}

export const createPartition = (options: RedisPartitionOptions): RedisPartition => {
  const name = options.name ?? `db${String(options.executor.db)}`;
  const logger = options.logger ?? createLogger({ level: 'silent', pretty: false });

  return Object.freeze({
    name,
    db: options.executor.db,
    executor: options.executor,
    tracer: options.tracer ?? noopCommandTracer,
    logger: createPartitionLogger(logger, { partition: name, db: options.executor.db }),
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Cache Keys
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A key name fixed to its partition for its whole lifetime.
 */
export interface CacheKey {
  readonly name: string;
  readonly partition: RedisPartition;
}

export const createCacheKey = (partition: RedisPartition, name: string): CacheKey =>
  Object.freeze({ name, partition });

// ─────────────────────────────────────────────────────────────────────────────
// Key Space
// ─────────────────────────────────────────────────────────────────────────────

export interface KeySpace {
  readonly partitions: readonly RedisPartition[];

  /**
   * Build the full key name.
   * Format: `{keyPrefix}:{name}`, or `{name}` without a prefix.
   */
  qualify(name: string): string;

  /** Partition that owns a full key name */
  resolve(qualifiedName: string): RedisPartition;

  /** Qualify a logical name and bind it to its partition */
  key(name: string): CacheKey;
}

export interface KeySpaceOptions {
  partitions: readonly RedisPartition[];
  keyPrefix?: string;
}

/**
 * Map a key name to a partition index with a stable hash.
 * Uses the first 32 bits of SHA-256, so placement is identical across processes.
 */
export const partitionIndex = (qualifiedName: string, partitionCount: number): number => {
  if (partitionCount <= 1) {
    return 0;
  }
  const digest = createHash('sha256').update(qualifiedName).digest();
  return digest.readUInt32BE(0) % partitionCount;
};

export const createKeySpace = (options: KeySpaceOptions): KeySpace => {
  const partitions = Object.freeze([...options.partitions]);
  const { keyPrefix } = options;

  const first = partitions[0];
  if (first === undefined) {
    throw new Error('A key space needs at least one partition');
  }

  const qualify = (name: string): string => {
    if (keyPrefix === undefined || keyPrefix === '') {
      return name;
    }
    if (name.startsWith(`${keyPrefix}:`)) {
      return name;
    }
    return `${keyPrefix}:${name}`;
  };

  const resolve = (qualifiedName: string): RedisPartition =>
    partitions[partitionIndex(qualifiedName, partitions.length)] ?? first;

  return {
    partitions,
    qualify,
    resolve,
    key(name: string): CacheKey {
      const qualifiedName = qualify(name);
      return createCacheKey(resolve(qualifiedName), qualifiedName);
    },
  };
};
