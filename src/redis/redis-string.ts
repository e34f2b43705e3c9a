/**
 * Typed single-value structure over a Redis string key.
 *
 * Values pass through the codec on the way in and out. Counters are the
 * exception: increment operations work on the stored decimal text directly and
 * return numbers, whatever the codec.
 */

import { err, ok, type Result } from 'neverthrow';

import { getOrCompute, type GetOrComputeOptions, type Producer } from './cache-aside.js';
import { createJsonCodec } from './codecs/json-codec.js';
import { runCommand } from './command-runner.js';
import {
  createCommandError,
  createScriptExecutionError,
  createValidationError,
  type RedisStructureError,
  type SerializationError,
} from './errors.js';
import { toExpirySeconds } from './expiration.js';
import {
  clampScriptFor,
  formatScriptNumber,
  parseClampReply,
  type ClampBound,
  type ClampNumeric,
} from './scripts/clamp-scripts.js';
import { found, notFound } from './types.js';

import type { CacheKey } from './key-space.js';
import type { ValueCodec } from './ports.js';
import type { CommandOptions, Expiration, Lookup, StructureResult } from './types.js';

const CATEGORY = 'RedisString';

// ─────────────────────────────────────────────────────────────────────────────
// Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface RedisString<T> {
  readonly key: CacheKey;
  readonly codec: ValueCodec<T>;

  /** GET: `{ exists: false }` when the key is absent */
  tryGet(options?: CommandOptions): StructureResult<Lookup<T>>;

  /** GET, falling back to `defaultValue` when the key is absent */
  getValueOrDefault(defaultValue: T, options?: CommandOptions): StructureResult<T>;

  /** SET, or SET EX when an expiration is given */
  set(value: T, expiration?: Expiration, options?: CommandOptions): StructureResult<void>;

  /**
   * Replace the value and return the previous one.
   * Without expiration this is GETSET; with one, GETSET and EXPIRE are sent as
   * one MULTI/EXEC transaction so the new value is never visible without its TTL.
   * The server does not roll back a transaction: if GETSET fails (for example
   * WRONGTYPE on a set key), EXPIRE still applies to the existing key and the
   * call returns the GETSET CommandError.
   */
  getAndReplace(
    value: T,
    expiration?: Expiration,
    options?: CommandOptions
  ): StructureResult<Lookup<T>>;

  /** Return the stored value, or produce, store and return a new one */
  getOrCompute(
    producer: Producer<T>,
    expiration?: Expiration,
    options?: GetOrComputeOptions
  ): StructureResult<T>;

  /** DEL: true if the key existed */
  remove(options?: CommandOptions): StructureResult<boolean>;

  /** INCRBY; an absent key counts as 0 */
  increment(delta?: number, options?: CommandOptions): StructureResult<number>;

  /** INCRBYFLOAT; an absent key counts as 0 */
  incrementFloat(delta: number, options?: CommandOptions): StructureResult<number>;

  /** DECRBY; an absent key counts as 0 */
  decrement(delta?: number, options?: CommandOptions): StructureResult<number>;

  /** Atomically add `delta` and cap the stored value at `max` */
  incrementClampedByMax(delta: number, max: number, options?: CommandOptions): StructureResult<number>;

  /** Atomically add `delta` and floor the stored value at `min` */
  incrementClampedByMin(delta: number, min: number, options?: CommandOptions): StructureResult<number>;

  /** Floating-point form of incrementClampedByMax */
  incrementFloatClampedByMax(
    delta: number,
    max: number,
    options?: CommandOptions
  ): StructureResult<number>;

  /** Floating-point form of incrementClampedByMin */
  incrementFloatClampedByMin(
    delta: number,
    min: number,
    options?: CommandOptions
  ): StructureResult<number>;

  /** EXPIRE: false if the key does not exist */
  setExpire(expiration: Expiration, options?: CommandOptions): StructureResult<boolean>;

  /** EXISTS */
  exists(options?: CommandOptions): StructureResult<boolean>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const decodeLookup = <T>(
  codec: ValueCodec<T>,
  raw: string | null
): Result<Lookup<T>, SerializationError> => {
  if (raw === null) {
    return ok(notFound());
  }
  return codec.deserialize(raw).map((value) => found(value));
};

const validateNumber = (
  field: string,
  value: number,
  numeric: ClampNumeric
): Result<number, RedisStructureError> => {
  if (numeric === 'integer' && !Number.isSafeInteger(value)) {
    return err(createValidationError(field, `${field} must be a safe integer`, value));
  }
  if (!Number.isFinite(value)) {
    return err(createValidationError(field, `${field} must be a finite number`, value));
  }
  return ok(value);
};

/**
 * Runs `send` only when the arguments validated, so a rejected call opens no
 * span and reaches no executor.
 */
const checked = <A, R>(
  args: Result<A, RedisStructureError>,
  send: () => StructureResult<R>
): StructureResult<R> => (args.isErr() ? Promise.resolve(err(args.error)) : send());

const parseFloatReply = (command: string, reply: string): Result<number, RedisStructureError> => {
  const parsed = Number(reply);
  if (reply.trim() === '' || !Number.isFinite(parsed)) {
    return err(createCommandError(command, `Reply is not a number: '${reply}'`));
  }
  return ok(parsed);
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a string structure bound to a key.
 *
 * @example
 * ```typescript
 * const counter = createRedisString(keySpace.key('counter'), numberCodec);
 * const result = await counter.incrementClampedByMax(5, 10);
 * ```
 */
export const createRedisString = <T>(
  key: CacheKey,
  codec: ValueCodec<T> = createJsonCodec<T>()
): RedisString<T> => {
  const { executor } = key.partition;
  const name = key.name;

  const run = <R>(
    command: string,
    options: CommandOptions | undefined,
    operation: () => Promise<Result<R, RedisStructureError>>
  ): StructureResult<R> => runCommand({ key, category: CATEGORY, command, options }, operation);

  const clamped = (
    numeric: ClampNumeric,
    bound: ClampBound,
    delta: number,
    limit: number,
    options: CommandOptions | undefined
  ): StructureResult<number> => {
    const script = clampScriptFor(numeric, bound);
    const args = validateNumber('delta', delta, numeric).andThen(() =>
      validateNumber(bound, limit, numeric)
    );

    return checked(args, () =>
      run(`EVALSHA ${script.name}`, options, async () => {
        const reply = await executor.evalScript(
          script,
          [name],
          [formatScriptNumber(delta), formatScriptNumber(limit)]
        );
        if (reply.isErr()) {
          const failure = reply.error;
          return err(
            failure.type === 'CommandError'
              ? createScriptExecutionError(script.name, failure.message, failure.cause)
              : failure
          );
        }
        return parseClampReply(script, reply.value);
      })
    );
  };

  const self: RedisString<T> = {
    key,
    codec,

    tryGet(options) {
      return run('GET', options, async () =>
        (await executor.get(name)).andThen((raw) => decodeLookup(codec, raw))
      );
    },

    async getValueOrDefault(defaultValue, options) {
      const result = await self.tryGet(options);
      return result.map((lookup) => (lookup.exists ? lookup.value : defaultValue));
    },

    set(value, expiration, options) {
      return run(expiration === undefined ? 'SET' : 'SET EX', options, async () => {
        const encoded = codec.serialize(value);
        if (encoded.isErr()) {
          return err(encoded.error);
        }
        if (expiration === undefined) {
          return executor.set(name, encoded.value);
        }
        return executor.set(name, encoded.value, toExpirySeconds(expiration));
      });
    },

    getAndReplace(value, expiration, options) {
      return run(expiration === undefined ? 'GETSET' : 'MULTI GETSET EXPIRE', options, async () => {
        const encoded = codec.serialize(value);
        if (encoded.isErr()) {
          return err(encoded.error);
        }

        if (expiration === undefined) {
          return (await executor.getSet(name, encoded.value)).andThen((raw) =>
            decodeLookup(codec, raw)
          );
        }

        const replies = await executor
          .multi()
          .getSet(name, encoded.value)
          .expire(name, toExpirySeconds(expiration))
          .exec();
        if (replies.isErr()) {
          return err(replies.error);
        }

        const previous = replies.value[0];
        if (previous !== null && typeof previous !== 'string') {
          return err(createCommandError('GETSET', 'Unexpected GETSET reply in transaction'));
        }
        return decodeLookup(codec, previous);
      });
    },

    getOrCompute(producer, expiration, options) {
      return getOrCompute(self, producer, expiration, options);
    },

    remove(options) {
      return run('DEL', options, async () => (await executor.del(name)).map((count) => count > 0));
    },

    increment(delta = 1, options) {
      return checked(validateNumber('delta', delta, 'integer'), () =>
        run('INCRBY', options, () => executor.incrBy(name, delta))
      );
    },

    incrementFloat(delta, options) {
      return checked(validateNumber('delta', delta, 'float'), () =>
        run('INCRBYFLOAT', options, async () =>
          (await executor.incrByFloat(name, delta)).andThen((reply) =>
            parseFloatReply('INCRBYFLOAT', reply)
          )
        )
      );
    },

    decrement(delta = 1, options) {
      return checked(validateNumber('delta', delta, 'integer'), () =>
        run('DECRBY', options, () => executor.decrBy(name, delta))
      );
    },

    incrementClampedByMax(delta, max, options) {
      return clamped('integer', 'max', delta, max, options);
    },

    incrementClampedByMin(delta, min, options) {
      return clamped('integer', 'min', delta, min, options);
    },

    incrementFloatClampedByMax(delta, max, options) {
      return clamped('float', 'max', delta, max, options);
    },

    incrementFloatClampedByMin(delta, min, options) {
      return clamped('float', 'min', delta, min, options);
    },

    setExpire(expiration, options) {
      return run('EXPIRE', options, () => executor.expire(name, toExpirySeconds(expiration)));
    },

    exists(options) {
      return run('EXISTS', options, () => executor.exists(name));
    },
  };

  return self;
};
