/**
 * Persisted Store - the second tier of ConfigCache
 *
 * Entries are keyed by content hash, so an entry is never updated in place:
 * changed content gets a new key. FilePersistedStore writes each entry to a
 * temp file and renames it over the final name, so a reader sees either no
 * file or the complete entry.
 *
 * File Layout:
 * - {dir}/{contentHash}.json → serialized configuration
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';

/**
 * Hash-addressed store of serialized configurations.
 */
export interface PersistedStore {
  /** Serialized entry, or null when no entry exists for the hash */
  read(contentHash: string): Promise<string | null>;
  write(contentHash: string, serialized: string): Promise<void>;
}

const HASH_REGEX = /^[0-9a-f]{64}$/;

function assertHash(contentHash: string): void {
  if (!HASH_REGEX.test(contentHash)) {
    throw new Error(`Invalid content hash "${contentHash}"`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * PersistedStore on the local filesystem.
 *
 * @example
 * ```typescript
 * const store = new FilePersistedStore('.cache/configs');
 * await store.write(hash, JSON.stringify(config));
 * const serialized = await store.read(hash);
 * ```
 */
export class FilePersistedStore implements PersistedStore {
  constructor(private readonly dir: string) {}

  pathFor(contentHash: string): string {
    assertHash(contentHash);
    return path.join(this.dir, `${contentHash}.json`);
  }

  async read(contentHash: string): Promise<string | null> {
    try {
      return await fs.readFile(this.pathFor(contentHash), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(contentHash: string, serialized: string): Promise<void> {
    const target = this.pathFor(contentHash);
    const temp = `${target}.${randomUUID()}.tmp`;

    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.writeFile(temp, serialized, 'utf8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }
}

/**
 * PersistedStore that keeps nothing. Used when a cache should be memory-only.
 */
export class NullPersistedStore implements PersistedStore {
  async read(): Promise<string | null> {
    return null;
  }

  async write(): Promise<void> {}
}
