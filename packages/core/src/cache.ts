/**
 * Support cache - in-memory key-value memoization for support decisions
 *
 * MemoryCache is the reference implementation of the SupportCache contract.
 * Persistent stores (filesystem, SQLite) live outside this package and only
 * have to provide the same four operations.
 */

import { minimatch } from 'minimatch';
import type { SupportCache } from './types.ts';

interface CacheEntry {
   value: boolean;
   expiresAt: number | null;
}

export interface MemoryCacheOptions {

   /** Default time-to-live in seconds (default: no expiry) */
   defaultTtl?: number;

   /** Maximum number of entries; the oldest entry is evicted first (default: 10000) */
   maxEntries?: number;

   /** Clock used for expiry, in milliseconds */
   now?: () => number;
}

/**
 * In-memory SupportCache with per-entry expiry and glob invalidation.
 */
export class MemoryCache implements SupportCache {

   private readonly _entries = new Map<string, CacheEntry>();
   private readonly _defaultTtl: number | undefined;
   private readonly _maxEntries: number;
   private readonly _now: () => number;

   private _hits = 0;
   private _misses = 0;

   public constructor(options: MemoryCacheOptions = {}) {
      this._defaultTtl = options.defaultTtl;
      this._maxEntries = options.maxEntries ?? 10000;
      this._now = options.now ?? Date.now;
   }

   public get(key: string): boolean | undefined {
      const entry = this._entries.get(key);

      if (!entry) {
         this._misses++;
         return undefined;
      }

      if (entry.expiresAt !== null && entry.expiresAt <= this._now()) {
         this._entries.delete(key);
         this._misses++;
         return undefined;
      }

      this._hits++;
      return entry.value;
   }

   public put(key: string, value: boolean, ttl?: number): void {
      const seconds = ttl ?? this._defaultTtl;

      this._entries.delete(key);
      this._entries.set(key, {
         value,
         expiresAt: seconds === undefined ? null : this._now() + seconds * 1000,
      });

      while (this._entries.size > this._maxEntries) {
         const oldest = this._entries.keys().next();

         if (oldest.done) {
            break;
         }
         this._entries.delete(oldest.value);
      }
   }

   public invalidatePattern(pattern: string): number {
      let removed = 0;

      for (const key of Array.from(this._entries.keys())) {
         if (minimatch(key, pattern)) {
            this._entries.delete(key);
            removed++;
         }
      }

      return removed;
   }

   public getInfo(): Record<string, unknown> {
      const lookups = this._hits + this._misses;

      return {
         type: 'memory',
         entries: this._entries.size,
         maxEntries: this._maxEntries,
         defaultTtl: this._defaultTtl ?? null,
         hits: this._hits,
         misses: this._misses,
         hitRate: lookups === 0 ? 0 : this._hits / lookups,
      };
   }

   /**
    * Remove every entry.
    */
   public clear(): void {
      this._entries.clear();
   }

}

/**
 * Wrap a boolean-returning function so its results are memoized in a cache.
 *
 * The wrapped function is unchanged; callers compose the wrapper themselves.
 * Without a cache the function is returned as-is.
 *
 * @example
 * const cachedCheck = withCache(cache, (name) => `check:${name}`, check, 60);
 */
export function withCache<A extends unknown[]>(
   cache: SupportCache | undefined,
   keyFn: (...args: A) => string,
   fn: (...args: A) => boolean,
   ttl?: number
): (...args: A) => boolean {
   if (!cache) {
      return fn;
   }

   return (...args: A): boolean => {
      const key = keyFn(...args),
            cached = cache.get(key);

      if (cached !== undefined) {
         return cached;
      }

      const value = fn(...args);

      cache.put(key, value, ttl);
      return value;
   };
}
