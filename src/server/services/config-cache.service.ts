/**
 * Config Cache - content-addressed two-tier cache of parsed configurations
 *
 * Lookup order for a source id:
 * 1. Hash the current source bytes (SHA-256)
 * 2. Memory tier: entry with that hash → hit
 * 3. Persisted tier: entry with that hash → warm hit, loaded into memory
 * 4. Parse the source, write both tiers → miss
 *
 * Because entries are keyed by content, an edited file invalidates itself: its
 * new hash has no entry. Entries are deep-frozen and replaced with a single
 * map assignment, so callers never see a half-updated configuration.
 *
 * The persisted tier is an optimization. An unreadable or corrupt entry is
 * logged as `cacheCorruption` and treated as a miss; a failed write is logged
 * and ignored. Only an unreadable or invalid source raises ConfigurationError.
 */

import type { CacheStats } from '../types/generation.types';
import type { ConfigParser } from '../validation/config.validation';
import { errorMessage } from '../utils/errors';
import { logDebug, logWarning } from '../utils/logger';
import type { ConfigSource } from './config-source.service';
import { HashService } from './hash.service';
import { NullPersistedStore, type PersistedStore } from './persisted-store.service';

export type CacheTier = 'memory' | 'persisted' | 'source';

export interface CacheEntry<T> {
  readonly contentHash: string;
  readonly config: T;
  /** Epoch milliseconds when the entry entered the memory tier */
  readonly loadedAt: number;
}

export interface ResolvedConfig<T> {
  config: T;
  contentHash: string;
  tier: CacheTier;
}

interface PersistedEnvelope {
  contentHash: string;
  config: unknown;
}

export interface ConfigCacheOptions {
  /** Name used in log events (e.g. "brain", "engine") */
  name?: string;
  store?: PersistedStore;
  hashService?: HashService;
  now?: () => number;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function emptyStats(): CacheStats {
  return { hits: 0, warmHits: 0, misses: 0, corruptions: 0 };
}

/**
 * @example
 * ```typescript
 * const brains = new ConfigCache(new FileConfigSource('brains'), brainConfigParser, {
 *   name: 'brain',
 *   store: new FilePersistedStore('.cache/configs'),
 * });
 * const brain = await brains.get('brain_wisdom');
 * brains.stats(); // { hits: 0, warmHits: 0, misses: 1, corruptions: 0 }
 * ```
 */
export class ConfigCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  /** sourceId → content hash of the entry last resolved for it */
  private readonly bySource = new Map<string, string>();
  private counters: CacheStats = emptyStats();

  private readonly name: string;
  private readonly store: PersistedStore;
  private readonly hashService: HashService;
  private readonly now: () => number;

  constructor(
    private readonly source: ConfigSource,
    private readonly parser: ConfigParser<T>,
    options: ConfigCacheOptions = {}
  ) {
    this.name = options.name ?? 'config';
    this.store = options.store ?? new NullPersistedStore();
    this.hashService = options.hashService ?? new HashService();
    this.now = options.now ?? Date.now;
  }

  /**
   * @throws {ConfigurationError} If the source cannot be read or parsed
   */
  async get(sourceId: string): Promise<T> {
    const { config } = await this.resolve(sourceId);
    return config;
  }

  /**
   * Like get, and also reports the content hash and which tier answered.
   *
   * @throws {ConfigurationError} If the source cannot be read or parsed
   */
  async resolve(sourceId: string): Promise<ResolvedConfig<T>> {
    const bytes = await this.source.read(sourceId);
    const contentHash = this.hashService.hashContent(bytes);

    const cached = this.entries.get(contentHash);
    if (cached) {
      this.counters.hits++;
      this.bind(sourceId, contentHash);
      logDebug('configCache:hit', () => ({ cache: this.name, sourceId, contentHash }));
      return { config: cached.config, contentHash, tier: 'memory' };
    }

    const revived = await this.readPersisted(sourceId, contentHash);
    if (revived !== null) {
      this.counters.warmHits++;
      const entry = this.admit(sourceId, contentHash, revived);
      logDebug('configCache:warmHit', () => ({ cache: this.name, sourceId, contentHash }));
      return { config: entry.config, contentHash, tier: 'persisted' };
    }

    this.counters.misses++;
    const parsed = this.parser.parse(bytes.toString('utf8'), sourceId);
    const entry = this.admit(sourceId, contentHash, parsed);
    await this.writePersisted(sourceId, contentHash, entry.config);
    logDebug('configCache:miss', () => ({ cache: this.name, sourceId, contentHash }));

    return { config: entry.config, contentHash, tier: 'source' };
  }

  /**
   * Drops the memory entry last resolved for a source. The persisted entry
   * stays: it is keyed by content and still valid for those bytes.
   *
   * @returns True if a memory entry was dropped
   */
  invalidate(sourceId: string): boolean {
    const contentHash = this.bySource.get(sourceId);
    if (contentHash === undefined) {
      return false;
    }

    this.bySource.delete(sourceId);
    const dropped = this.entries.delete(contentHash);
    // Other sources with identical bytes lose their binding as well
    for (const [otherId, otherHash] of this.bySource) {
      if (otherHash === contentHash) {
        this.bySource.delete(otherId);
      }
    }
    return dropped;
  }

  /**
   * Drops every memory entry. Counters are kept.
   */
  clear(): void {
    this.entries.clear();
    this.bySource.clear();
  }

  stats(): CacheStats {
    return { ...this.counters };
  }

  resetStats(): void {
    this.counters = emptyStats();
  }

  /** Number of entries in the memory tier */
  get size(): number {
    return this.entries.size;
  }

  private admit(sourceId: string, contentHash: string, config: T): CacheEntry<T> {
    const entry: CacheEntry<T> = Object.freeze({
      contentHash,
      config: deepFreeze(config),
      loadedAt: this.now(),
    });
    this.entries.set(contentHash, entry);
    this.bind(sourceId, contentHash);
    return entry;
  }

  /**
   * Points a source at a hash and evicts the entry it pointed to before, when
   * no other source still refers to it.
   */
  private bind(sourceId: string, contentHash: string): void {
    const previous = this.bySource.get(sourceId);
    this.bySource.set(sourceId, contentHash);

    if (previous === undefined || previous === contentHash) {
      return;
    }
    for (const hash of this.bySource.values()) {
      if (hash === previous) {
        return;
      }
    }
    this.entries.delete(previous);
  }

  private async readPersisted(sourceId: string, contentHash: string): Promise<T | null> {
    let serialized: string | null;
    try {
      serialized = await this.store.read(contentHash);
    } catch (error) {
      this.recordCorruption(sourceId, contentHash, `unreadable: ${errorMessage(error)}`);
      return null;
    }
    if (serialized === null) {
      return null;
    }

    try {
      const envelope: unknown = JSON.parse(serialized);
      if (!isRecord(envelope) || envelope.contentHash !== contentHash) {
        this.recordCorruption(sourceId, contentHash, 'hash mismatch');
        return null;
      }
      return this.parser.revive(envelope.config);
    } catch (error) {
      this.recordCorruption(sourceId, contentHash, errorMessage(error));
      return null;
    }
  }

  private async writePersisted(sourceId: string, contentHash: string, config: T): Promise<void> {
    const envelope: PersistedEnvelope = { contentHash, config };
    try {
      await this.store.write(contentHash, JSON.stringify(envelope));
    } catch (error) {
      logWarning('configCache:persistFailed', {
        cache: this.name,
        sourceId,
        contentHash,
        error: errorMessage(error),
      });
    }
  }

  private recordCorruption(sourceId: string, contentHash: string, reason: string): void {
    this.counters.corruptions++;
    logWarning('cacheCorruption', { cache: this.name, sourceId, contentHash, reason });
  }
}
