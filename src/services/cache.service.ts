import { Injectable, Inject } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { AppLogger } from '../utils/app-logger.util';
import { errorMessage } from '../utils/error-handling.util';

/**
 * Thin wrapper over the cache manager shared by the tier, delegation,
 * node and reputation lookups.
 *
 * Cache failures never fail a request: a failed read is a miss and a failed
 * write is logged. TTLs are in milliseconds.
 */
@Injectable()
export class CacheService {
  constructor(@Inject(CACHE_MANAGER) private cacheManager: Cache) {}

  static readonly KEYS = {
    tier: (wallet: string) => `tier:${wallet.toLowerCase()}`,
    vaults: (wallet: string) => `vaults:${wallet.toLowerCase()}`,
    nodes: () => 'nodes:active',
    rep: (wallet: string, category: string) => `rep:${category}:${wallet.toLowerCase()}`,
  };

  async get<T>(key: string): Promise<T | null> {
    try {
      const cached = await this.cacheManager.get<T>(key);
      if (cached !== undefined && cached !== null) {
        AppLogger.debug(`Cache hit: ${key}`, CacheService.name);
        return cached;
      }
      return null;
    } catch (error) {
      AppLogger.error(`Cache get error for key ${key}: ${errorMessage(error)}`, undefined, CacheService.name);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlMs: number): Promise<void> {
    try {
      await this.cacheManager.set(key, value, ttlMs);
      AppLogger.debug(`Cache set: ${key} (TTL: ${ttlMs}ms)`, CacheService.name);
    } catch (error) {
      AppLogger.error(`Cache set error for key ${key}: ${errorMessage(error)}`, undefined, CacheService.name);
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.cacheManager.del(key);
      AppLogger.debug(`Cache deleted: ${key}`, CacheService.name);
    } catch (error) {
      AppLogger.error(`Cache delete error for key ${key}: ${errorMessage(error)}`, undefined, CacheService.name);
    }
  }

  /**
   * Get or set cached data with fallback function. Fallback errors
   * propagate and nothing is cached.
   */
  async getOrSet<T>(key: string, fallbackFn: () => Promise<T>, ttlMs: number): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== null) {
      return cached;
    }

    AppLogger.debug(`Cache miss: ${key}, executing fallback`, CacheService.name);
    const startTime = Date.now();
    const result = await fallbackFn();
    await this.set(key, result, ttlMs);
    AppLogger.logWithTiming(`Cache fallback for ${key}`, startTime, CacheService.name);
    return result;
  }
}
