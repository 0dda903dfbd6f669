/**
 * Config Cache Tests
 *
 * Covers the two-tier lookup (memory by content hash, then the persisted
 * tier, then the source), counters, invalidation, corruption handling and
 * the file and Redis persisted stores. Redis is an in-process Map.
 */

import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigCache } from '../src/server/services/config-cache.service';
import { FileConfigSource, isValidSourceId } from '../src/server/services/config-source.service';
import { HashService } from '../src/server/services/hash.service';
import { FilePersistedStore } from '../src/server/services/persisted-store.service';
import {
  RedisPersistedStore,
  redisClientOptions,
  type RedisKeyValueClient,
} from '../src/server/services/redis-store.service';
import { brainConfigParser } from '../src/server/validation/config.validation';
import type { BrainConfig } from '../src/server/types/engine.types';
import { ConfigurationError } from '../src/server/utils/errors';
import { MemoryConfigSource, MemoryPersistedStore, brainJson } from './fixtures';

const hash = new HashService();

class MapRedis implements RedisKeyValueClient {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  failing = false;

  async get(key: string): Promise<string | null> {
    if (this.failing) {
      throw new Error('connection reset');
    }
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<string> {
    if (this.failing) {
      throw new Error('connection reset');
    }
    this.values.set(key, value);
    this.ttls.set(key, ttlSeconds);
    return 'OK';
  }
}

describe('ConfigCache', () => {
  let source: MemoryConfigSource;
  let store: MemoryPersistedStore;
  let cache: ConfigCache<BrainConfig>;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    source = new MemoryConfigSource({
      brain_peace: brainJson('Find peace'),
      brain_fire: brainJson('Feel the fire', 'fierce'),
    });
    store = new MemoryPersistedStore();
    cache = new ConfigCache(source, brainConfigParser, { name: 'brain', store });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('lookups', () => {
    it('parses on a miss and answers from memory afterwards', async () => {
      const first = await cache.resolve('brain_peace');
      const second = await cache.resolve('brain_peace');

      expect(first.tier).toBe('source');
      expect(second.tier).toBe('memory');
      expect(second.config).toEqual({ intent: 'Find peace', style: 'calm' });
      expect(second.contentHash).toBe(hash.hashContent(brainJson('Find peace')));
      expect(cache.stats()).toEqual({ hits: 1, warmHits: 0, misses: 1, corruptions: 0 });
    });

    it('writes the parsed value to the persisted tier', async () => {
      await cache.get('brain_peace');
      const contentHash = hash.hashContent(brainJson('Find peace'));

      expect(store.entries.get(contentHash)).toBe(
        JSON.stringify({ contentHash, config: { intent: 'Find peace', style: 'calm' } })
      );
    });

    it('reads the source on every lookup so edits are noticed', async () => {
      await cache.get('brain_peace');
      source.set('brain_peace', brainJson('Find inner peace'));

      const updated = await cache.resolve('brain_peace');
      expect(updated.tier).toBe('source');
      expect(updated.config.intent).toBe('Find inner peace');
      expect(cache.stats().misses).toBe(2);
      // The old entry is no longer referenced
      expect(cache.size).toBe(1);
    });

    it('shares one entry between sources with identical bytes', async () => {
      source.set('brain_copy', brainJson('Find peace'));

      await cache.get('brain_peace');
      const copy = await cache.resolve('brain_copy');

      expect(copy.tier).toBe('memory');
      expect(cache.size).toBe(1);
    });

    it('returns frozen values', async () => {
      const config = await cache.get('brain_peace');

      expect(Object.isFrozen(config)).toBe(true);
      expect(() => {
        config.intent = 'changed';
      }).toThrow(TypeError);
    });
  });

  describe('invalidate', () => {
    it('turns the next lookup of unchanged bytes into a warm hit', async () => {
      await cache.get('brain_peace');

      expect(cache.invalidate('brain_peace')).toBe(true);
      expect(cache.size).toBe(0);

      const again = await cache.resolve('brain_peace');
      expect(again.tier).toBe('persisted');
      expect(again.config).toEqual({ intent: 'Find peace', style: 'calm' });
      expect(cache.stats()).toEqual({ hits: 0, warmHits: 1, misses: 1, corruptions: 0 });
    });

    it('returns false for a source without an entry', () => {
      expect(cache.invalidate('brain_unknown')).toBe(false);
    });

    it('leaves other sources alone', async () => {
      await cache.get('brain_peace');
      await cache.get('brain_fire');

      cache.invalidate('brain_peace');
      const fire = await cache.resolve('brain_fire');

      expect(fire.tier).toBe('memory');
    });
  });

  describe('clear and stats', () => {
    it('clear drops memory entries and keeps counters', async () => {
      await cache.get('brain_peace');
      await cache.get('brain_fire');

      cache.clear();

      expect(cache.size).toBe(0);
      expect(cache.stats().misses).toBe(2);
      expect((await cache.resolve('brain_fire')).tier).toBe('persisted');
    });

    it('resetStats zeroes the counters', async () => {
      await cache.get('brain_peace');
      cache.resetStats();

      expect(cache.stats()).toEqual({ hits: 0, warmHits: 0, misses: 0, corruptions: 0 });
    });

    it('stats returns a copy', async () => {
      const stats = cache.stats();
      stats.hits = 99;

      expect(cache.stats().hits).toBe(0);
    });
  });

  describe('corruption', () => {
    it('treats an unparsable persisted entry as a miss', async () => {
      const contentHash = hash.hashContent(brainJson('Find peace'));
      store.entries.set(contentHash, '{"contentHash": ');

      const resolved = await cache.resolve('brain_peace');

      expect(resolved.tier).toBe('source');
      expect(resolved.config.intent).toBe('Find peace');
      expect(cache.stats()).toEqual({ hits: 0, warmHits: 0, misses: 1, corruptions: 1 });
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('"operation":"cacheCorruption"'));
    });

    it('rejects an entry stored under the wrong hash', async () => {
      const contentHash = hash.hashContent(brainJson('Find peace'));
      store.entries.set(
        contentHash,
        JSON.stringify({ contentHash: 'f'.repeat(64), config: { intent: 'Forged', style: '' } })
      );

      const config = await cache.get('brain_peace');

      expect(config.intent).toBe('Find peace');
      expect(cache.stats().corruptions).toBe(1);
    });

    it('rejects an entry that fails validation on revival', async () => {
      const contentHash = hash.hashContent(brainJson('Find peace'));
      store.entries.set(contentHash, JSON.stringify({ contentHash, config: { style: 'calm' } }));

      await cache.get('brain_peace');

      expect(cache.stats()).toEqual({ hits: 0, warmHits: 0, misses: 1, corruptions: 1 });
      // The fresh value replaced the bad entry
      expect(store.entries.get(contentHash)).toBe(
        JSON.stringify({ contentHash, config: { intent: 'Find peace', style: 'calm' } })
      );
    });

    it('counts an unreadable persisted tier as corruption', async () => {
      const redis = new MapRedis();
      redis.failing = true;
      const redisCache = new ConfigCache(source, brainConfigParser, {
        store: new RedisPersistedStore(redis),
      });

      const config = await redisCache.get('brain_peace');

      expect(config.intent).toBe('Find peace');
      expect(redisCache.stats()).toEqual({ hits: 0, warmHits: 0, misses: 1, corruptions: 1 });
    });

    it('ignores a failed persisted write', async () => {
      store.failWrites = true;

      const config = await cache.get('brain_peace');

      expect(config.intent).toBe('Find peace');
      expect(store.entries.size).toBe(0);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining('"operation":"configCache:persistFailed"')
      );
    });
  });

  describe('source errors', () => {
    it('raises ConfigurationError for a missing source', async () => {
      await expect(cache.get('brain_missing')).rejects.toThrow(
        'Configuration source "brain_missing" not found'
      );
    });

    it('raises ConfigurationError for malformed content and caches nothing', async () => {
      source.set('brain_broken', '{"intent": ');

      await expect(cache.get('brain_broken')).rejects.toBeInstanceOf(ConfigurationError);
      expect(cache.size).toBe(0);
      expect(store.entries.size).toBe(0);
    });
  });
});

describe('FilePersistedStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'config-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes and reads entries by hash', async () => {
    const store = new FilePersistedStore(path.join(dir, 'nested'));
    const contentHash = hash.hashContent('entry');

    expect(await store.read(contentHash)).toBeNull();

    await store.write(contentHash, '{"value":1}');
    expect(await store.read(contentHash)).toBe('{"value":1}');
    expect(await readdir(path.join(dir, 'nested'))).toEqual([`${contentHash}.json`]);
  });

  it('refuses anything but a sha-256 hex digest', () => {
    const store = new FilePersistedStore(dir);
    expect(() => store.pathFor('../escape')).toThrow('Invalid content hash "../escape"');
  });

  it('gives a new cache instance warm hits', async () => {
    const source = new MemoryConfigSource({ brain_peace: brainJson('Find peace') });
    const store = new FilePersistedStore(dir);

    const first = new ConfigCache(source, brainConfigParser, { store });
    await first.get('brain_peace');

    const second = new ConfigCache(source, brainConfigParser, { store });
    const resolved = await second.resolve('brain_peace');

    expect(resolved.tier).toBe('persisted');
    expect(second.stats()).toEqual({ hits: 0, warmHits: 1, misses: 0, corruptions: 0 });
  });
});

describe('RedisPersistedStore', () => {
  it('configures the client to reject commands while disconnected', () => {
    expect(redisClientOptions('redis://localhost:6379')).toEqual({
      url: 'redis://localhost:6379',
      disableOfflineQueue: true,
    });
  });

  it('stores entries under config:{hash} with a seven day expiry', async () => {
    const redis = new MapRedis();
    const store = new RedisPersistedStore(redis);
    const contentHash = hash.hashContent('entry');

    await store.write(contentHash, 'serialized');

    expect(store.keyFor(contentHash)).toBe(`config:${contentHash}`);
    expect(redis.values.get(`config:${contentHash}`)).toBe('serialized');
    expect(redis.ttls.get(`config:${contentHash}`)).toBe(604800);
    expect(await store.read(contentHash)).toBe('serialized');
  });

  it('wraps client errors', async () => {
    const redis = new MapRedis();
    redis.failing = true;
    const store = new RedisPersistedStore(redis);

    await expect(store.read('abc')).rejects.toThrow('Failed to get config entry abc: connection reset');
    await expect(store.write('abc', 'x')).rejects.toThrow(
      'Failed to set config entry abc: connection reset'
    );
  });

  it('shares warm entries between cache instances', async () => {
    const redis = new MapRedis();
    const source = new MemoryConfigSource({ brain_fire: brainJson('Feel the fire') });

    await new ConfigCache(source, brainConfigParser, { store: new RedisPersistedStore(redis) }).get(
      'brain_fire'
    );
    const second = new ConfigCache(source, brainConfigParser, {
      store: new RedisPersistedStore(redis, 60),
    });

    expect((await second.resolve('brain_fire')).tier).toBe('persisted');
  });
});

describe('FileConfigSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'config-source-'));
    await writeFile(path.join(dir, 'brain_b.json'), brainJson('b'));
    await writeFile(path.join(dir, 'brain_a.json'), brainJson('a'));
    await writeFile(path.join(dir, 'notes.json'), '{}');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the bytes of <dir>/<id>.json', async () => {
    const source = new FileConfigSource(dir);
    expect((await source.read('brain_a')).toString('utf8')).toBe(brainJson('a'));
  });

  it('lists brain sources in name order', async () => {
    expect(await new FileConfigSource(dir).list()).toEqual(['brain_a', 'brain_b']);
    expect(await new FileConfigSource(path.join(dir, 'missing')).list()).toEqual([]);
  });

  it('reports missing sources and unsafe ids as configuration errors', async () => {
    const source = new FileConfigSource(dir);

    await expect(source.read('brain_c')).rejects.toThrow('Configuration source "brain_c" not found');
    await expect(source.read('../brain_a')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('derives a source for a single file', () => {
    const { source, sourceId } = FileConfigSource.forFile(path.join(dir, 'engine.config.json'));

    expect(sourceId).toBe('engine.config');
    expect(source.pathFor(sourceId)).toBe(path.join(dir, 'engine.config.json'));
  });

  it('validates source ids', () => {
    expect(isValidSourceId('brain_wisdom')).toBe(true);
    expect(isValidSourceId('engine.config')).toBe(true);
    expect(isValidSourceId('a..b')).toBe(false);
    expect(isValidSourceId('/etc/passwd')).toBe(false);
    expect(isValidSourceId('')).toBe(false);
  });
});
