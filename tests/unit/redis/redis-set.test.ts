import { describe, expect, it } from 'vitest';

import { createJsonCodec, stringCodec } from '@/redis/codecs/index.js';
import { createRedisSet } from '@/redis/redis-set.js';
import { createRedisString } from '@/redis/redis-string.js';
import { found, notFound } from '@/redis/types.js';

import { createTestRedis } from '../../fixtures/fakes.js';

describe('RedisSet', () => {
  describe('add / remove', () => {
    it('reports whether a member was newly added', async () => {
      const { keySpace, redis } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);

      expect((await tags.add('redis'))._unsafeUnwrap()).toBe(true);
      expect((await tags.add('redis'))._unsafeUnwrap()).toBe(false);
      expect(redis.rawMembers('tags')).toEqual(['redis']);
    });

    it('adds a batch in one command and counts new members', async () => {
      const { keySpace, redis } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);

      expect((await tags.addMany(['a', 'b', 'a']))._unsafeUnwrap()).toBe(2);
      expect(redis.commands).toEqual(['SADD tags']);
    });

    it('sends nothing for an empty batch', async () => {
      const { keySpace, redis, spans } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);

      expect((await tags.addMany([]))._unsafeUnwrap()).toBe(0);
      expect((await tags.removeMany([]))._unsafeUnwrap()).toBe(0);
      expect(redis.commands).toEqual([]);
      expect(spans).toEqual([]);
    });

    it('aborts the whole batch when one member fails to serialize', async () => {
      const { keySpace, redis } = createTestRedis();
      const entries = createRedisSet(keySpace.key('entries'), createJsonCodec<number>());

      const error = (await entries.addMany([1, Number.NaN, 3]))._unsafeUnwrapErr();

      expect(error.type).toBe('SerializationError');
      expect(redis.commands).toEqual([]);
      expect(redis.rawMembers('entries')).toBeUndefined();
    });

    it('removes members and reports counts', async () => {
      const { keySpace, redis } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);
      await tags.addMany(['a', 'b', 'c']);

      expect((await tags.remove('a'))._unsafeUnwrap()).toBe(true);
      expect((await tags.remove('a'))._unsafeUnwrap()).toBe(false);
      expect((await tags.removeMany(['b', 'x']))._unsafeUnwrap()).toBe(1);
      expect(redis.rawMembers('tags')).toEqual(['c']);
    });
  });

  describe('queries', () => {
    it('checks membership and size', async () => {
      const { keySpace } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);
      await tags.addMany(['a', 'b']);

      expect((await tags.contains('a'))._unsafeUnwrap()).toBe(true);
      expect((await tags.contains('z'))._unsafeUnwrap()).toBe(false);
      expect((await tags.length())._unsafeUnwrap()).toBe(2);
    });

    it('decodes members through the codec', async () => {
      const { keySpace, redis } = createTestRedis();
      const items = createRedisSet<{ id: number }>(keySpace.key('items'));
      await items.addMany([{ id: 1 }, { id: 2 }]);

      expect(redis.rawMembers('items')).toEqual(['{"id":1}', '{"id":2}']);
      expect((await items.members())._unsafeUnwrap()).toEqual([{ id: 1 }, { id: 2 }]);
    });

    it('returns an empty list for an absent key', async () => {
      const { keySpace } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);

      expect((await tags.members())._unsafeUnwrap()).toEqual([]);
      expect((await tags.length())._unsafeUnwrap()).toBe(0);
    });

    it('fails to decode members written with another encoding', async () => {
      const { keySpace } = createTestRedis();
      await createRedisSet(keySpace.key('items'), stringCodec).add('{broken');

      const error = (await createRedisSet(keySpace.key('items')).members())._unsafeUnwrapErr();
      expect(error.type).toBe('SerializationError');
    });

    it('returns CommandError for a key of another type', async () => {
      const { keySpace } = createTestRedis();
      await createRedisString(keySpace.key('shared'), stringCodec).set('text');

      const error = (await createRedisSet(keySpace.key('shared'), stringCodec).add('a'))._unsafeUnwrapErr();

      expect(error).toMatchObject({
        type: 'CommandError',
        command: 'SADD',
        message: 'WRONGTYPE Operation against a key holding the wrong kind of value',
      });
    });
  });

  describe('random / pop', () => {
    it('reports an empty set as not found', async () => {
      const { keySpace } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);

      expect((await tags.random())._unsafeUnwrap()).toEqual(notFound());
      expect((await tags.pop())._unsafeUnwrap()).toEqual(notFound());
    });

    it('returns random members without removing them', async () => {
      const { keySpace, redis } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);
      await tags.addMany(['x', 'y']);

      expect((await tags.random())._unsafeUnwrap()).toEqual(found('x'));
      expect((await tags.randomMany(2))._unsafeUnwrap()).toEqual(['x', 'y']);
      expect((await tags.randomMany(-3))._unsafeUnwrap()).toEqual(['x', 'y', 'x']);
      expect(redis.rawMembers('tags')).toEqual(['x', 'y']);
    });

    it('pops members', async () => {
      const { keySpace, redis } = createTestRedis();
      const queue = createRedisSet(keySpace.key('queue'), stringCodec);
      await queue.addMany(['a', 'b', 'c', 'd']);

      expect((await queue.pop())._unsafeUnwrap()).toEqual(found('a'));
      expect((await queue.popMany(2))._unsafeUnwrap()).toEqual(['b', 'c']);
      expect(redis.rawMembers('queue')).toEqual(['d']);
    });

    it('validates counts before opening a span or sending', async () => {
      const { keySpace, redis, spans } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);

      expect((await tags.randomMany(1.5))._unsafeUnwrapErr()).toMatchObject({
        type: 'ValidationError',
        field: 'count',
      });
      expect((await tags.popMany(-1))._unsafeUnwrapErr().message).toBe('count must not be negative');
      expect(redis.commands).toEqual([]);
      expect(spans).toEqual([]);
    });
  });

  describe('key operations', () => {
    it('expires, checks and clears the set', async () => {
      const { keySpace, redis, spans } = createTestRedis();
      const tags = createRedisSet(keySpace.key('tags'), stringCodec);

      expect((await tags.setExpire(30))._unsafeUnwrap()).toBe(false);
      await tags.add('a');
      expect((await tags.setExpire(30))._unsafeUnwrap()).toBe(true);
      expect(redis.ttl('tags')).toBe(30);
      expect((await tags.exists())._unsafeUnwrap()).toBe(true);
      expect((await tags.clear())._unsafeUnwrap()).toBe(true);
      expect((await tags.exists())._unsafeUnwrap()).toBe(false);

      expect(spans.map((span) => `${span.trace.category} ${span.trace.command}`)).toEqual([
        'RedisSet EXPIRE',
        'RedisSet SADD',
        'RedisSet EXPIRE',
        'RedisSet EXISTS',
        'RedisSet DEL',
        'RedisSet EXISTS',
      ]);
    });
  });
});
