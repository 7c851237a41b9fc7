/**
 * Tests for MemoryCache and withCache
 */

import { describe, it, expect, vi } from 'vitest';
import { MemoryCache, withCache } from '../cache.ts';

describe('MemoryCache', () => {
   it('stores true and false values', () => {
      const cache = new MemoryCache();

      cache.put('a', true);
      cache.put('b', false);

      expect(cache.get('a')).toBe(true);
      expect(cache.get('b')).toBe(false);
      expect(cache.get('c')).toBeUndefined();
   });

   it('expires entries after their time-to-live', () => {
      let now = 0;

      const cache = new MemoryCache({ now: () => {
         return now;
      } });

      cache.put('a', true, 10);

      now = 9999;
      expect(cache.get('a')).toBe(true);

      now = 10000;
      expect(cache.get('a')).toBeUndefined();
   });

   it('applies the default time-to-live', () => {
      let now = 0;

      const cache = new MemoryCache({ defaultTtl: 1, now: () => {
         return now;
      } });

      cache.put('a', true);
      now = 1000;

      expect(cache.get('a')).toBeUndefined();
   });

   it('evicts the oldest entry beyond maxEntries', () => {
      const cache = new MemoryCache({ maxEntries: 2 });

      cache.put('a', true);
      cache.put('b', true);
      cache.put('c', true);

      expect(cache.get('a')).toBeUndefined();
      expect(cache.get('b')).toBe(true);
      expect(cache.get('c')).toBe(true);
   });

   it('invalidates keys matching a glob', () => {
      const cache = new MemoryCache();

      cache.put('provider_support:apt:nginx:none', true);
      cache.put('provider_support:apt:redis:evidence', true);
      cache.put('provider_support:brew:nginx:none', false);

      expect(cache.invalidatePattern('provider_support:apt:*')).toBe(2);
      expect(cache.get('provider_support:brew:nginx:none')).toBe(false);
   });

   it('reports hit and miss counters', () => {
      const cache = new MemoryCache({ defaultTtl: 60 });

      cache.put('a', true);
      cache.get('a');
      cache.get('missing');

      expect(cache.getInfo()).toEqual({
         type: 'memory',
         entries: 1,
         maxEntries: 10000,
         defaultTtl: 60,
         hits: 1,
         misses: 1,
         hitRate: 0.5,
      });
   });

   it('clears every entry', () => {
      const cache = new MemoryCache();

      cache.put('a', true);
      cache.clear();

      expect(cache.get('a')).toBeUndefined();
   });
});

describe('withCache', () => {
   it('calls the wrapped function once per key', () => {
      const cache = new MemoryCache(),
            check = vi.fn((name: string): boolean => {
               return name.length > 3;
            });

      const cachedCheck = withCache(cache, (name: string) => {
         return `check:${name}`;
      }, check);

      expect(cachedCheck('nginx')).toBe(true);
      expect(cachedCheck('nginx')).toBe(true);
      expect(cachedCheck('vim')).toBe(false);
      expect(check).toHaveBeenCalledTimes(2);
      expect(cache.get('check:vim')).toBe(false);
   });

   it('returns the function unchanged without a cache', () => {
      const check = (name: string): boolean => {
         return name === 'nginx';
      };

      expect(withCache(undefined, (name: string) => {
         return name;
      }, check)).toBe(check);
   });
});
