import { InMemoryCacheService } from '../services/CacheService';

describe('InMemoryCacheService', () => {
  let cache: InMemoryCacheService;

  beforeEach(() => {
    cache = new InMemoryCacheService({ defaultTtlSeconds: 1 });
  });

  afterEach(() => {
    cache.clear();
  });

  describe('basic operations', () => {
    it('should set and get values', () => {
      cache.set('key1', [0.1, 0.2]);
      expect(cache.get<number[]>('key1')).toEqual([0.1, 0.2]);
    });

    it('should return undefined for non-existent keys', () => {
      expect(cache.get('nonexistent')).toBeUndefined();
    });

    it('should delete values', () => {
      cache.set('key1', 'value1');
      expect(cache.del('key1')).toBe(1);
      expect(cache.get('key1')).toBeUndefined();
    });

    it('should clear all values', () => {
      cache.set('key1', 'value1');
      cache.set('key2', 'value2');
      cache.clear();
      expect(cache.get('key1')).toBeUndefined();
      expect(cache.get('key2')).toBeUndefined();
    });
  });

  describe('TTL (Time To Live)', () => {
    it('should expire values after TTL', async () => {
      cache.set('key1', 'value1', 0.1); // 100ms TTL
      expect(cache.get('key1')).toBe('value1');

      await new Promise(resolve => setTimeout(resolve, 150));
      expect(cache.get('key1')).toBeUndefined();
    });
  });

  describe('statistics', () => {
    it('should track hits and misses', () => {
      cache.set('key1', 'value1');

      cache.get('key1');
      cache.get('nonexistent');

      const stats = cache.getStats();
      expect(stats.hits).toBe(1);
      expect(stats.misses).toBe(1);
      expect(stats.keys).toBe(1);
    });
  });

  describe('embedding keys', () => {
    it('should key on the digest of the text', () => {
      const key1 = InMemoryCacheService.createEmbeddingKey('text1');
      const key2 = InMemoryCacheService.createEmbeddingKey('text2');

      expect(key1).toMatch(/^embedding:[0-9a-f]{32}$/);
      expect(key1).not.toBe(key2);
      expect(InMemoryCacheService.createEmbeddingKey('text1')).toBe(key1);
    });
  });
});
