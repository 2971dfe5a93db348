import NodeCache from 'node-cache';
import { logger } from '../utils/logger';

export interface CacheOptions {
  defaultTTL?: number;
  checkPeriod?: number;
}

/**
 * Short-lived in-process cache for provider responses and job progress.
 * Everything here is lost on restart; durable data belongs in the database.
 */
export class CacheService {
  private cache: NodeCache;
  private defaultTTL: number;

  constructor(options: CacheOptions = {}) {
    this.defaultTTL = options.defaultTTL ?? 300;
    this.cache = new NodeCache({
      stdTTL: this.defaultTTL,
      checkperiod: options.checkPeriod ?? 60,
      useClones: false,
    });
  }

  get<T>(key: string): T | undefined {
    const value = this.cache.get<T>(key);
    if (value !== undefined) {
      logger.debug(`Cache HIT: ${key}`);
    } else {
      logger.debug(`Cache MISS: ${key}`);
    }
    return value;
  }

  set<T>(key: string, value: T, ttl?: number): boolean {
    const effectiveTTL = ttl ?? this.defaultTTL;
    const result = this.cache.set(key, value, effectiveTTL);
    if (result) {
      logger.debug(`Cache SET: ${key} (TTL: ${effectiveTTL}s)`);
    }
    return result;
  }

  /**
   * Returns the cached value or loads and stores it. A rejected loader is
   * not cached.
   */
  async getOrSet<T>(key: string, ttl: number, loader: () => Promise<T>): Promise<T> {
    const cached = this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await loader();
    this.set(key, value, ttl);
    return value;
  }

  del(key: string): number {
    const result = this.cache.del(key);
    if (result > 0) {
      logger.debug(`Cache DELETE: ${key}`);
    }
    return result;
  }

  flush(): void {
    this.cache.flushAll();
    logger.info('Cache flushed');
  }

  // Pattern-based deletion for cache invalidation
  delByPattern(pattern: string): void {
    const matchingKeys = this.cache.keys().filter((key) => key.includes(pattern));

    if (matchingKeys.length > 0) {
      this.cache.del(matchingKeys);
      logger.debug(
        `Cache DELETE by pattern: ${pattern} (${matchingKeys.length} keys)`
      );
    }
  }

  getStats(): NodeCache.Stats {
    return this.cache.getStats();
  }

  close(): void {
    this.cache.close();
  }
}
