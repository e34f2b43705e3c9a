/**
 * Client factory - connects the configured partitions and hands out
 * structures bound to their keys.
 */

import { err, ok, type Result } from 'neverthrow';

import { createOtelCommandTracer, noopCommandTracer } from '../infra/telemetry/command-tracer.js';
import {
  closeRedis,
  createIoredisExecutor,
  createRedisConnection,
  pingRedis,
} from './adapters/ioredis-executor.js';
import { createKeySpace, createPartition, type KeySpace } from './key-space.js';
import { createRedisSet, type RedisSet } from './redis-set.js';
import { createRedisString, type RedisString } from './redis-string.js';

import type { ExecutorError } from './errors.js';
import type { ValueCodec } from './ports.js';
import type { RedisConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface RedisStructures {
  keySpace: KeySpace;

  /** String structure for a logical key name; JSON codec by default */
  string<T>(name: string, codec?: ValueCodec<T>): RedisString<T>;

  /** Set structure for a logical key name; JSON codec by default */
  set<T>(name: string, codec?: ValueCodec<T>): RedisSet<T>;

  /** PING every partition; the first failure is returned */
  ping(): Promise<Result<void, ExecutorError>>;

  /** Close every connection */
  disconnect(): Promise<Result<void, ExecutorError>>;
}

export interface InitRedisStructuresOptions {
  config: RedisConfig;
  logger: Logger;
}

/**
 * Initialize one ioredis connection per configured endpoint.
 * Connections open lazily on the first command.
 */
export const initRedisStructures = (options: InitRedisStructuresOptions): RedisStructures => {
  const { config, logger } = options;
  const tracer = config.tracing ? createOtelCommandTracer() : noopCommandTracer;

  const connections = config.endpoints.map((endpoint) => {
    const client = createRedisConnection({
      url: endpoint.url,
      connectTimeoutMs: config.connectTimeoutMs,
      commandTimeoutMs: config.commandTimeoutMs,
      autoPipelining: config.autoPipelining,
    });

    const partition = createPartition({
      name: endpoint.name,
      executor: createIoredisExecutor(client, { db: endpoint.db }),
      tracer,
      logger,
    });

    client.on('error', (error: Error) => {
      partition.logger.warn({ err: error }, '[Redis] Connection error');
    });

    return { client, partition };
  });

  const keySpace = createKeySpace({
    partitions: connections.map((connection) => connection.partition),
    ...(config.keyPrefix !== undefined && { keyPrefix: config.keyPrefix }),
  });

  logger.info(
    {
      partitions: connections.map((connection) => connection.partition.name),
      keyPrefix: config.keyPrefix,
      autoPipelining: config.autoPipelining,
      tracing: config.tracing,
    },
    '[Redis] Structures initialized'
  );

  const forEachClient = async (
    op: (connection: (typeof connections)[number]) => Promise<Result<void, ExecutorError>>
  ): Promise<Result<void, ExecutorError>> => {
    const results = await Promise.all(connections.map(op));
    for (const result of results) {
      if (result.isErr()) {
        return err(result.error);
      }
    }
    return ok(undefined);
  };

  return {
    keySpace,

    string<T>(name: string, codec?: ValueCodec<T>): RedisString<T> {
      const key = keySpace.key(name);
      return codec === undefined ? createRedisString<T>(key) : createRedisString(key, codec);
    },

    set<T>(name: string, codec?: ValueCodec<T>): RedisSet<T> {
      const key = keySpace.key(name);
      return codec === undefined ? createRedisSet<T>(key) : createRedisSet(key, codec);
    },

    ping() {
      return forEachClient(async ({ client, partition }) => {
        const result = await pingRedis(client);
        if (result.isErr()) {
          partition.logger.warn({ err: result.error }, '[Redis] Ping failed');
        }
        return result;
      });
    },

    async disconnect() {
      const result = await forEachClient(({ client }) => closeRedis(client));
      logger.info('[Redis] Connections closed');
      return result;
    },
  };
};
