/**
 * Typed unordered collection over a Redis set key.
 *
 * Members are stored as codec text, so two values are the same member exactly
 * when the codec encodes them to the same text.
 */

import { err, ok, type Result } from 'neverthrow';

import { createJsonCodec } from './codecs/json-codec.js';
import { runCommand } from './command-runner.js';
import { createValidationError, type RedisStructureError, type SerializationError } from './errors.js';
import { toExpirySeconds } from './expiration.js';
import { found, notFound } from './types.js';

import type { CacheKey } from './key-space.js';
import type { ValueCodec } from './ports.js';
import type { CommandOptions, Expiration, Lookup, StructureResult } from './types.js';

const CATEGORY = 'RedisSet';

export interface RedisSet<T> {
  readonly key: CacheKey;
  readonly codec: ValueCodec<T>;

  /** SADD: true if the member was not already present */
  add(value: T, options?: CommandOptions): StructureResult<boolean>;

  /** SADD with several members; an empty batch sends nothing */
  addMany(values: readonly T[], options?: CommandOptions): StructureResult<number>;

  /** SREM: true if the member was present */
  remove(value: T, options?: CommandOptions): StructureResult<boolean>;

  /** SREM with several members; an empty batch sends nothing */
  removeMany(values: readonly T[], options?: CommandOptions): StructureResult<number>;

  /** SISMEMBER */
  contains(value: T, options?: CommandOptions): StructureResult<boolean>;

  /** SCARD */
  length(options?: CommandOptions): StructureResult<number>;

  /** SMEMBERS, in no particular order */
  members(options?: CommandOptions): StructureResult<T[]>;

  /** SRANDMEMBER: `{ exists: false }` for an empty set */
  random(options?: CommandOptions): StructureResult<Lookup<T>>;

  /**
   * SRANDMEMBER with a count.
   * A positive count returns up to `count` distinct members; a negative one
   * returns exactly `|count|` members, possibly repeated.
   */
  randomMany(count: number, options?: CommandOptions): StructureResult<T[]>;

  /** SPOP: `{ exists: false }` for an empty set */
  pop(options?: CommandOptions): StructureResult<Lookup<T>>;

  /** SPOP with a count: removes and returns up to `count` members */
  popMany(count: number, options?: CommandOptions): StructureResult<T[]>;

  /** EXPIRE: false if the key does not exist */
  setExpire(expiration: Expiration, options?: CommandOptions): StructureResult<boolean>;

  /** EXISTS */
  exists(options?: CommandOptions): StructureResult<boolean>;

  /** DEL: true if the key existed */
  clear(options?: CommandOptions): StructureResult<boolean>;
}

const mapAll = <A, B>(
  items: readonly A[],
  transform: (item: A) => Result<B, SerializationError>
): Result<B[], SerializationError> => {
  const output: B[] = [];
  for (const item of items) {
    const result = transform(item);
    if (result.isErr()) {
      return err(result.error);
    }
    output.push(result.value);
  }
  return ok(output);
};

const encodeAll = <T>(
  codec: ValueCodec<T>,
  values: readonly T[]
): Result<string[], SerializationError> => mapAll(values, (v) => codec.serialize(v));

const decodeAll = <T>(
  codec: ValueCodec<T>,
  texts: readonly string[]
): Result<T[], SerializationError> => mapAll(texts, (t) => codec.deserialize(t));

const decodeOptional = <T>(
  codec: ValueCodec<T>,
  text: string | null
): Result<Lookup<T>, SerializationError> =>
  text === null ? ok(notFound()) : codec.deserialize(text).map((value) => found(value));

const validateCount = (
  count: number,
  allowNegative: boolean
): Result<number, RedisStructureError> => {
  if (!Number.isSafeInteger(count)) {
    return err(createValidationError('count', 'count must be a safe integer', count));
  }
  if (!allowNegative && count < 0) {
    return err(createValidationError('count', 'count must not be negative', count));
  }
  return ok(count);
};

/**
 * Create a set structure bound to a key.
 *
 * @example
 * ```typescript
 * const tags = createRedisSet(keySpace.key('article:42:tags'), stringCodec);
 * await tags.addMany(['redis', 'cache']);
 * ```
 */
export const createRedisSet = <T>(
  key: CacheKey,
  codec: ValueCodec<T> = createJsonCodec<T>()
): RedisSet<T> => {
  const { executor } = key.partition;
  const name = key.name;

  const run = <R>(
    command: string,
    options: CommandOptions | undefined,
    operation: () => Promise<Result<R, RedisStructureError>>
  ): StructureResult<R> => runCommand({ key, category: CATEGORY, command, options }, operation);

  const batch = (
    command: 'SADD' | 'SREM',
    values: readonly T[],
    options: CommandOptions | undefined
  ): StructureResult<number> => {
    if (values.length === 0) {
      return Promise.resolve(ok(0));
    }
    return run(command, options, async () => {
      const encoded = encodeAll(codec, values);
      if (encoded.isErr()) {
        return err(encoded.error);
      }
      return command === 'SADD'
        ? executor.sAdd(name, encoded.value)
        : executor.sRem(name, encoded.value);
    });
  };

  return {
    key,
    codec,

    add(value, options) {
      return run('SADD', options, async () => {
        const encoded = codec.serialize(value);
        if (encoded.isErr()) {
          return err(encoded.error);
        }
        return (await executor.sAdd(name, [encoded.value])).map((added) => added > 0);
      });
    },

    addMany(values, options) {
      return batch('SADD', values, options);
    },

    remove(value, options) {
      return run('SREM', options, async () => {
        const encoded = codec.serialize(value);
        if (encoded.isErr()) {
          return err(encoded.error);
        }
        return (await executor.sRem(name, [encoded.value])).map((removed) => removed > 0);
      });
    },

    removeMany(values, options) {
      return batch('SREM', values, options);
    },

    contains(value, options) {
      return run('SISMEMBER', options, async () => {
        const encoded = codec.serialize(value);
        if (encoded.isErr()) {
          return err(encoded.error);
        }
        return executor.sIsMember(name, encoded.value);
      });
    },

    length(options) {
      return run('SCARD', options, () => executor.sCard(name));
    },

    members(options) {
      return run('SMEMBERS', options, async () =>
        (await executor.sMembers(name)).andThen((texts) => decodeAll(codec, texts))
      );
    },

    random(options) {
      return run('SRANDMEMBER', options, async () =>
        (await executor.sRandMember(name)).andThen((text) => decodeOptional(codec, text))
      );
    },

    randomMany(count, options) {
      const checked = validateCount(count, true);
      if (checked.isErr()) {
        return Promise.resolve(err(checked.error));
      }
      return run('SRANDMEMBER', options, async () =>
        (await executor.sRandMemberCount(name, count)).andThen((texts) => decodeAll(codec, texts))
      );
    },

    pop(options) {
      return run('SPOP', options, async () =>
        (await executor.sPop(name)).andThen((text) => decodeOptional(codec, text))
      );
    },

    popMany(count, options) {
      const checked = validateCount(count, false);
      if (checked.isErr()) {
        return Promise.resolve(err(checked.error));
      }
      return run('SPOP', options, async () =>
        (await executor.sPopCount(name, count)).andThen((texts) => decodeAll(codec, texts))
      );
    },

    setExpire(expiration, options) {
      return run('EXPIRE', options, () => executor.expire(name, toExpirySeconds(expiration)));
    },

    exists(options) {
      return run('EXISTS', options, () => executor.exists(name));
    },

    clear(options) {
      return run('DEL', options, async () => (await executor.del(name)).map((count) => count > 0));
    },
  };
};
