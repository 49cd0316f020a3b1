import { BlacklistSourceConfig } from '../config/config';
import { CacheStore } from '../storage/cacheStore';
import { logger } from '../utils/logger';
import { createBlacklistSource, SourceDependencies } from './sources';

export const BLACKLIST_CACHE_KEY = 'pageimages:blacklist';

export interface BlacklistCacheOptions {
  sources: readonly BlacklistSourceConfig[];
  expirySeconds: number;
  store: CacheStore;
  deps: SourceDependencies;
}

function isEntryList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(entry => typeof entry === 'string');
}

/**
 * Images that may never be chosen, merged from all configured sources.
 *
 * Two tiers: the set is kept for the lifetime of this object once loaded, and
 * shared with other processes through the cache store until it expires. A long-lived
 * process therefore only sees blacklist edits after reset() or a restart.
 */
export class BlacklistCache {
  private memo: ReadonlySet<string> | null = null;
  private pending: Promise<ReadonlySet<string>> | null = null;
  // Bumped by reset(); builds started before it do not populate the memo
  private generation = 0;

  constructor(private readonly options: BlacklistCacheOptions) {}

  async getBlacklist(): Promise<ReadonlySet<string>> {
    if (this.memo) {
      return this.memo;
    }
    if (!this.pending) {
      const generation = this.generation;
      this.pending = this.load()
        .then(list => {
          if (generation === this.generation) {
            this.memo = list;
          }
          return list;
        })
        .finally(() => {
          if (generation === this.generation) {
            this.pending = null;
          }
        });
    }
    return this.pending;
  }

  reset(): void {
    this.generation++;
    this.memo = null;
    this.pending = null;
  }

  private async load(): Promise<ReadonlySet<string>> {
    const cached = await this.options.store.get(BLACKLIST_CACHE_KEY);
    if (isEntryList(cached)) {
      logger.debug(`Image blacklist loaded from cache (${cached.length} entries)`);
      return new Set(cached);
    }

    logger.debug('Image blacklist cache miss, rebuilding');
    // Resolve every descriptor first so a bad one fails before any fetching
    const sources = this.options.sources.map(source => createBlacklistSource(source, this.options.deps));

    const list = new Set<string>();
    for (const source of sources) {
      for (const entry of await source.fetchEntries()) {
        list.add(entry);
      }
    }

    try {
      await this.options.store.set(BLACKLIST_CACHE_KEY, Array.from(list), this.options.expirySeconds);
    } catch (error) {
      logger.warn('Failed to store image blacklist in cache:', error instanceof Error ? error.message : error);
    }

    logger.info(`Image blacklist rebuilt with ${list.size} entries from ${sources.length} sources`);
    return list;
  }
}
