/**
 * Provider Support Resolver - Decides whether a provider can service a package
 *
 * Decision order:
 * 1. Repository evidence naming the package for this provider → supported
 * 2. No usable evidence → fall through to the template
 * 3. Provider template with `supported: false` → unsupported
 * 4. Provider template with content beyond a version stamp → supported
 * 5. Category heuristic: system and language package managers → supported,
 *    everything else → unsupported
 *
 * Steps 3 and 4 read the provider template with the requested version overlay
 * applied, so an overlay can declare a single release unsupported.
 *
 * Decisions are memoized in an optional SupportCache under
 * `provider_support:<provider>:<software>:<evidence|none>[:<version>]`.
 */

import { getLogger } from './logger.ts';
import type { Logger } from './logger.ts';
import type { TemplateStore } from './template-store.ts';
import type { ProviderCategories, SupportCache } from './types.ts';

export const SUPPORT_CACHE_PREFIX = 'provider_support';

export type ProviderCategory = 'system' | 'language' | 'specialized' | 'unknown';

export type SupportSource = 'cache' | 'repository' | 'template-unsupported' | 'template' | 'category';

/**
 * A support decision together with the step that produced it.
 */
export interface SupportDecision {
   supported: boolean;
   source: SupportSource;
   category: ProviderCategory;
}

export interface SupportResolverOptions {

   /** Cache for decisions; without one every call is evaluated */
   cache?: SupportCache;

   /** Time-to-live of cached decisions, in seconds */
   cacheTtl?: number;

   /** Provider category table for step 5 */
   categories: ProviderCategories;

   logger?: Logger;
}

const TEMPLATE_STAMP_KEYS = new Set([ 'version', 'supported' ]);

/**
 * Resolves provider applicability for a piece of software.
 */
export class ProviderSupportResolver {

   private readonly _store: TemplateStore;
   private readonly _cache: SupportCache | undefined;
   private readonly _cacheTtl: number | undefined;
   private readonly _categories: Map<string, ProviderCategory>;
   private readonly _logger: Logger;

   public constructor(store: TemplateStore, options: SupportResolverOptions) {
      this._store = store;
      this._cache = options.cache;
      this._cacheTtl = options.cacheTtl;
      this._categories = _indexCategories(options.categories);
      this._logger = options.logger ?? getLogger('support-resolver');
   }

   /**
    * Check whether a provider supports the software.
    *
    * @param repositoryData - Optional evidence from the provider's repository
    * @param providerVersion - Version overlay of a hierarchical provider template
    */
   public isSupported(softwareName: string, provider: string, repositoryData?: unknown, providerVersion?: string): boolean {
      return this.explain(softwareName, provider, repositoryData, providerVersion).supported;
   }

   /**
    * Resolve support and report which step decided it.
    */
   public explain(softwareName: string, provider: string, repositoryData?: unknown, providerVersion?: string): SupportDecision {
      const hasEvidence = hasRepositoryEvidence(repositoryData, softwareName, provider),
            key = supportCacheKey(provider, softwareName, hasEvidence, providerVersion),
            category = this.categorize(provider);

      const cached = this._cache?.get(key);

      if (cached !== undefined) {
         return { supported: cached, source: 'cache', category };
      }

      const decision = this._decide(provider, providerVersion, hasEvidence, category);

      this._logger.debug({ provider, providerVersion, softwareName, ...decision }, 'Resolved provider support');
      this._cache?.put(key, decision.supported, this._cacheTtl);

      return decision;
   }

   /**
    * Look up the category of a provider in the category table.
    */
   public categorize(provider: string): ProviderCategory {
      return this._categories.get(provider.toLowerCase()) ?? 'unknown';
   }

   /**
    * Drop cached decisions for a provider and/or software name.
    *
    * @returns Number of cache entries removed
    */
   public invalidate(provider?: string, softwareName?: string): number {
      if (!this._cache) {
         return 0;
      }

      const providerPart = provider ?? '*',
            softwarePart = softwareName === undefined ? '*' : encodeURIComponent(softwareName);

      return this._cache.invalidatePattern(`${SUPPORT_CACHE_PREFIX}:${providerPart}:${softwarePart}:*`);
   }

   private _decide(provider: string, version: string | undefined, hasEvidence: boolean, category: ProviderCategory): SupportDecision {
      if (hasEvidence) {
         return { supported: true, source: 'repository', category };
      }

      const template = this._store.loadProvider(provider, version);

      if (template.supported === false) {
         return { supported: false, source: 'template-unsupported', category };
      }

      const hasContent = Object.keys(template).some((key) => {
         return !TEMPLATE_STAMP_KEYS.has(key);
      });

      if (hasContent) {
         return { supported: true, source: 'template', category };
      }

      return {
         supported: category === 'system' || category === 'language',
         source: 'category',
         category,
      };
   }

}

/**
 * Build the cache key for a support decision.
 */
export function supportCacheKey(provider: string, softwareName: string, hasEvidence: boolean, providerVersion?: string): string {
   const key = `${SUPPORT_CACHE_PREFIX}:${provider}:${encodeURIComponent(softwareName)}:${hasEvidence ? 'evidence' : 'none'}`;

   return providerVersion ? `${key}:${encodeURIComponent(providerVersion)}` : key;
}

/**
 * Check whether repository data is evidence that the package exists for a provider.
 *
 * Accepted shapes:
 * - a record with a non-empty `name`
 * - a list containing such a record
 * - an aggregate whose `packages` mapping contains the software name, or a record
 *   whose `provider` is this provider
 *
 * A record naming a different `provider` is not evidence for this one.
 */
export function hasRepositoryEvidence(repositoryData: unknown, softwareName: string, provider: string): boolean {
   if (Array.isArray(repositoryData)) {
      return repositoryData.some((record) => {
         return _isEvidenceRecord(record, provider);
      });
   }

   if (!_isRecord(repositoryData)) {
      return false;
   }

   const packages = repositoryData.packages;

   if (_isRecord(packages)) {
      if (Object.prototype.hasOwnProperty.call(packages, softwareName) && _isPresent(packages[softwareName])) {
         return _matchesProvider(packages[softwareName], provider);
      }

      return Object.values(packages).some((record) => {
         return _isRecord(record) && record.provider === provider;
      });
   }

   return _isEvidenceRecord(repositoryData, provider);
}

function _isEvidenceRecord(record: unknown, provider: string): boolean {
   if (!_isRecord(record)) {
      return false;
   }

   const name = record.name;

   return typeof name === 'string' && name.trim() !== '' && _matchesProvider(record, provider);
}

function _matchesProvider(record: unknown, provider: string): boolean {
   if (!_isRecord(record) || record.provider === undefined || record.provider === null) {
      return true;
   }

   return record.provider === provider;
}

function _isPresent(value: unknown): boolean {
   if (value === null || value === undefined) {
      return false;
   }

   if (_isRecord(value)) {
      return Object.keys(value).length > 0;
   }

   if (Array.isArray(value)) {
      return value.length > 0;
   }

   return true;
}

function _isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function _indexCategories(categories: ProviderCategories): Map<string, ProviderCategory> {
   const index = new Map<string, ProviderCategory>();

   // a provider listed twice keeps the last category: system > language > specialized
   for (const category of [ 'specialized', 'language', 'system' ] as const) {
      for (const provider of categories[category]) {
         index.set(provider.toLowerCase(), category);
      }
   }

   return index;
}
