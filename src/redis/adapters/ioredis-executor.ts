/**
 * RedisExecutor adapter using ioredis.
 */

import { Redis } from 'ioredis';
import { err, ok, type Result } from 'neverthrow';

import {
  createCommandError,
  createRemoteUnavailableError,
  type ExecutorError,
} from '../errors.js';

import type { ExecutorResult, RedisExecutor, RedisTransaction } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Connection
// ─────────────────────────────────────────────────────────────────────────────

export interface RedisConnectionOptions {
  /** Redis connection URL; the path selects the database index */
  url: string;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
  /** Batch commands issued in the same tick into one pipeline. Default: true */
  autoPipelining?: boolean;
}

/**
 * Create an ioredis client. The connection opens on the first command.
 */
export const createRedisConnection = (options: RedisConnectionOptions): Redis =>
  new Redis(options.url, {
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
    enableAutoPipelining: options.autoPipelining ?? true,
  });

// ─────────────────────────────────────────────────────────────────────────────
// Error Mapping
// ─────────────────────────────────────────────────────────────────────────────

const isReplyError = (cause: unknown): cause is Error =>
  cause instanceof Error && cause.name === 'ReplyError';

const isNoScriptError = (cause: unknown): boolean =>
  isReplyError(cause) && cause.message.startsWith('NOSCRIPT');

/**
 * Map a rejected ioredis call to an executor error.
 * Error replies from the server are command errors; everything else means the
 * store could not be reached in time.
 */
export const classifyRedisFailure = (command: string, cause: unknown): ExecutorError => {
  const message = `Redis ${command} failed`;

  if (isReplyError(cause)) {
    return createCommandError(command, `${message}: ${cause.message}`, cause);
  }

  if (cause instanceof Error) {
    const text = cause.message.toLowerCase();
    if (text.includes('etimedout') || text.includes('timeout') || text.includes('timed out')) {
      return createRemoteUnavailableError(`${message}: ${cause.message}`, 'timeout', cause);
    }
    return createRemoteUnavailableError(`${message}: ${cause.message}`, 'connection', cause);
  }

  return createRemoteUnavailableError(message, 'connection', cause);
};

/**
 * Wrap a Redis operation with error handling.
 */
const wrapRedisOp = async <T>(
  command: string,
  op: () => Promise<T>
): Promise<Result<T, ExecutorError>> => {
  try {
    return ok(await op());
  } catch (cause) {
    return err(classifyRedisFailure(command, cause));
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Transactions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Map an EXEC reply to the queued commands' replies.
 * A null reply means the server discarded the transaction. The server does not
 * roll back, so a failed command is reported after the others have run.
 */
export const parseTransactionReplies = (
  replies: [error: Error | null, reply: unknown][] | null
): Result<unknown[], ExecutorError> => {
  if (replies === null) {
    return err(createCommandError('EXEC', 'Transaction was aborted'));
  }

  const values: unknown[] = [];
  for (const [failure, reply] of replies) {
    if (failure !== null) {
      return err(classifyRedisFailure('EXEC', failure));
    }
    values.push(reply);
  }
  return ok(values);
};

type QueuedCommand =
  | { command: 'getset'; key: string; value: string }
  | { command: 'expire'; key: string; seconds: number };

const createTransaction = (client: Redis): RedisTransaction => {
  const queue: QueuedCommand[] = [];

  const transaction: RedisTransaction = {
    getSet(key, value) {
      queue.push({ command: 'getset', key, value });
      return transaction;
    },

    expire(key, seconds) {
      queue.push({ command: 'expire', key, seconds });
      return transaction;
    },

    async exec() {
      let multi = client.multi();
      for (const queued of queue) {
        multi =
          queued.command === 'getset'
            ? multi.getset(queued.key, queued.value)
            : multi.expire(queued.key, queued.seconds);
      }

      const replies = await wrapRedisOp('EXEC', () => multi.exec());
      return replies.andThen(parseTransactionReplies);
    },
  };

  return transaction;
};

// ─────────────────────────────────────────────────────────────────────────────
// Executor
// ─────────────────────────────────────────────────────────────────────────────

export interface IoredisExecutorOptions {
  /** Database index the client is bound to. Default: 0 */
  db?: number;
}

/**
 * Create an executor from an existing client.
 */
export const createIoredisExecutor = (
  client: Redis,
  options: IoredisExecutorOptions = {}
): RedisExecutor => {
  const run = <T>(command: string, op: () => Promise<T>): ExecutorResult<T> =>
    wrapRedisOp(command, op);

  return {
    db: options.db ?? 0,

    get: (key) => run('GET', () => client.get(key)),

    set: (key, value, expirySeconds) =>
      run('SET', async () => {
        if (expirySeconds === undefined) {
          await client.set(key, value);
        } else {
          await client.set(key, value, 'EX', expirySeconds);
        }
      }),

    getSet: (key, value) => run('GETSET', () => client.getset(key, value)),

    incrBy: (key, delta) => run('INCRBY', () => client.incrby(key, delta)),

    decrBy: (key, delta) => run('DECRBY', () => client.decrby(key, delta)),

    incrByFloat: (key, delta) => run('INCRBYFLOAT', () => client.incrbyfloat(key, delta)),

    del: (key) => run('DEL', () => client.del(key)),

    exists: (key) => run('EXISTS', async () => (await client.exists(key)) > 0),

    expire: (key, seconds) => run('EXPIRE', async () => (await client.expire(key, seconds)) === 1),

    sAdd: (key, members) => run('SADD', () => client.sadd(key, [...members])),

    sRem: (key, members) => run('SREM', () => client.srem(key, [...members])),

    sIsMember: (key, member) =>
      run('SISMEMBER', async () => (await client.sismember(key, member)) === 1),

    sMembers: (key) => run('SMEMBERS', () => client.smembers(key)),

    sCard: (key) => run('SCARD', () => client.scard(key)),

    sRandMember: (key) => run('SRANDMEMBER', () => client.srandmember(key)),

    sRandMemberCount: (key, count) => run('SRANDMEMBER', () => client.srandmember(key, count)),

    sPop: (key) => run('SPOP', () => client.spop(key)),

    sPopCount: (key, count) => run('SPOP', () => client.spop(key, count)),

    multi: () => createTransaction(client),

    evalScript: (script, keys, args) =>
      run(`EVALSHA ${script.name}`, async () => {
        try {
          return await client.evalsha(script.sha1, keys.length, ...keys, ...args);
        } catch (cause) {
          if (isNoScriptError(cause)) {
            return client.eval(script.lua, keys.length, ...keys, ...args);
          }
          throw cause;
        }
      }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Lifecycle
// ─────────────────────────────────────────────────────────────────────────────

/**
 * PING the server.
 */
export const pingRedis = async (client: Redis): Promise<Result<void, ExecutorError>> =>
  wrapRedisOp('PING', async () => {
    await client.ping();
  });

/**
 * Close the connection gracefully, waiting for pending replies.
 * A lazy client that never connected is closed without contacting the server.
 */
export const closeRedis = async (client: Redis): Promise<Result<void, ExecutorError>> =>
  wrapRedisOp('QUIT', async () => {
    if (client.status === 'wait') {
      client.disconnect();
      return;
    }
    await client.quit();
  });
