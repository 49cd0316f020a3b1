import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';
import { readJsonSafeAsync, writeJsonAtomic } from './jsonStore';

/**
 * Shared key/value cache with per-entry expiry. Writers do not coordinate:
 * the last write wins.
 */
export interface CacheStore {
  get(key: string): Promise<unknown | undefined>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

interface CacheEntry {
  value: unknown;
  expiresAt: number;
}

function isCacheEntry(data: unknown): data is CacheEntry {
  return typeof data === 'object'
    && data !== null
    && 'value' in data
    && 'expiresAt' in data
    && typeof data.expiresAt === 'number';
}

export type Clock = () => number;

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: Clock = Date.now) {}

  async get(key: string): Promise<unknown | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}

/**
 * One JSON file per key under the cache directory.
 */
export class JsonFileCacheStore implements CacheStore {
  constructor(
    private readonly cacheDir: string,
    private readonly now: Clock = Date.now
  ) {}

  private pathFor(key: string): string {
    return path.join(this.cacheDir, `${key.replace(/[^A-Za-z0-9_.-]/g, '_')}.json`);
  }

  async get(key: string): Promise<unknown | undefined> {
    const entry = await readJsonSafeAsync<CacheEntry | null>(
      this.pathFor(key),
      null,
      (data): data is CacheEntry | null => data === null || isCacheEntry(data)
    );
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      logger.debug(`Cache entry ${key} expired at ${new Date(entry.expiresAt).toISOString()}`);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const entry: CacheEntry = { value, expiresAt: this.now() + ttlSeconds * 1000 };
    await writeJsonAtomic(this.pathFor(key), entry);
  }

  async delete(key: string): Promise<void> {
    await fs.remove(this.pathFor(key));
  }
}
