import NodeCache from 'node-cache';
import { md5 } from '../utils/json';

export interface CacheService {
  get<T>(key: string): T | undefined;
  set<T>(key: string, value: T, ttlSeconds?: number): boolean;
  del(key: string): number;
  clear(): void;
  getStats(): { keys: number; hits: number; misses: number };
}

export class InMemoryCacheService implements CacheService {
  private cache: NodeCache;

  constructor(options: { defaultTtlSeconds?: number; checkPeriodSeconds?: number } = {}) {
    this.cache = new NodeCache({
      stdTTL: options.defaultTtlSeconds ?? 3600,
      // 0 disables the expiry timer, so a one-shot run can exit without close()
      checkperiod: options.checkPeriodSeconds ?? 0,
      useClones: false,
    });
  }

  get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set<T>(key: string, value: T, ttlSeconds?: number): boolean {
    if (ttlSeconds !== undefined) {
      return this.cache.set(key, value, ttlSeconds);
    }
    return this.cache.set(key, value);
  }

  del(key: string): number {
    return this.cache.del(key);
  }

  clear(): void {
    this.cache.flushAll();
  }

  getStats(): { keys: number; hits: number; misses: number } {
    const stats = this.cache.getStats();
    return {
      keys: stats.keys,
      hits: stats.hits,
      misses: stats.misses,
    };
  }

  // Specification bodies can be large; key on their digest
  static createEmbeddingKey(text: string): string {
    return `embedding:${md5(text)}`;
  }
}
