/**
 * Template Engine - Facade wiring the store, support resolver and reconciler
 *
 * @example
 * const engine = new TemplateEngine({ templatesDir: './templates' });
 *
 * const overrides = engine.computeOverrides('nginx', 'apt');
 * const merged = engine.mergeWithDefaults(engine.loadDefaults(), overrides);
 *
 * engine.validate(merged); // true
 */

import { MemoryCache } from './cache.ts';
import { resolveEngineConfig } from './config.ts';
import { getLogger } from './logger.ts';
import { OverrideReconciler } from './reconciler.ts';
import { ProviderSupportResolver } from './support-resolver.ts';
import { TemplateStore } from './template-store.ts';
import { auditOverride, configurationIssues, validateConfiguration } from './validator.ts';
import type { EngineConfig, EngineConfigInput } from './config.ts';
import type { Logger } from './logger.ts';
import type { TemplateFunction } from './directives.ts';
import type { SupportDecision } from './support-resolver.ts';
import type { OverrideAudit } from './validator.ts';
import type {
   MergedConfiguration,
   MultiProviderOptions,
   OverrideFragment,
   ReconcileOptions,
   SupportCache,
   Template,
} from './types.ts';

export interface TemplateEngineOptions extends EngineConfigInput {

   /**
    * Cache for provider support decisions. Defaults to a MemoryCache using
    * `cacheTtl`; pass null to disable caching.
    */
   cache?: SupportCache | null;

   /** Parent logger; each component logs through a scoped child */
   logger?: Logger;

   /** Functions callable from templates through `$function:` */
   functions?: Record<string, TemplateFunction>;
}

export type GenerateOptions = MultiProviderOptions;

/**
 * Overrides for a batch of providers, together with the resolved defaults.
 */
export interface GenerationResult {
   softwareName: string;

   /** Default template with directives resolved, variables substituted and nulls pruned */
   defaults: Template;

   /** Override fragment per provider, in request order */
   providers: Record<string, OverrideFragment>;

   supported: string[];
   unsupported: string[];
}

/**
 * Entry point for computing, merging and validating provider metadata.
 */
export class TemplateEngine {

   public readonly config: EngineConfig;

   private readonly _store: TemplateStore;
   private readonly _resolver: ProviderSupportResolver;
   private readonly _reconciler: OverrideReconciler;
   private readonly _cache: SupportCache | undefined;
   private readonly _logger: Logger;

   /**
    * @throws ConfigurationError when an option has the wrong shape
    */
   public constructor(options: TemplateEngineOptions = {}) {
      const { cache, logger, functions, ...configInput } = options;

      this.config = resolveEngineConfig(configInput);

      const parent = logger ?? getLogger(),
            level = this.config.logLevel;

      const scoped = (scope: string): Logger => {
         return parent.child({ scope }, { level });
      };

      this._logger = scoped('engine');
      this._cache = cache === null ? undefined : cache ?? new MemoryCache({ defaultTtl: this.config.cacheTtl });
      this._store = new TemplateStore(this.config.templatesDir, { logger: scoped('template-store') });
      this._resolver = new ProviderSupportResolver(this._store, {
         cache: this._cache,
         cacheTtl: this.config.cacheTtl,
         categories: this.config.providerCategories,
         logger: scoped('support-resolver'),
      });
      this._reconciler = new OverrideReconciler(this._store, this._resolver, { logger: scoped('reconciler'), functions });

      this._logger.debug({ templatesDir: this.config.templatesDir }, 'Template engine ready');
   }

   public get store(): TemplateStore {
      return this._store;
   }

   public get resolver(): ProviderSupportResolver {
      return this._resolver;
   }

   public get reconciler(): OverrideReconciler {
      return this._reconciler;
   }

   /**
    * The default template exactly as stored.
    */
   public loadDefaults(): Template {
      return this._store.loadDefault();
   }

   public listProviders(): string[] {
      return this._store.listProviders();
   }

   public computeOverrides(softwareName: string, provider: string, options?: ReconcileOptions): OverrideFragment {
      return this._reconciler.computeOverrides(softwareName, provider, options);
   }

   /**
    * @throws MergeInputError when either argument is not a mapping
    */
   public mergeWithDefaults(defaults: unknown, overrides: unknown): MergedConfiguration {
      return this._reconciler.mergeWithDefaults(defaults, overrides);
   }

   public isSupported(softwareName: string, provider: string, repositoryData?: unknown, providerVersion?: string): boolean {
      return this._resolver.isSupported(softwareName, provider, repositoryData, providerVersion);
   }

   public explainSupport(softwareName: string, provider: string, repositoryData?: unknown, providerVersion?: string): SupportDecision {
      return this._resolver.explain(softwareName, provider, repositoryData, providerVersion);
   }

   public registerFunction(name: string, fn: TemplateFunction): void {
      this._reconciler.registerFunction(name, fn);
   }

   public validate(config: unknown): boolean {
      return validateConfiguration(config);
   }

   public validationIssues(config: unknown): string[] {
      return configurationIssues(config);
   }

   /**
    * Audit a provider template as written against the default template.
    */
   public auditProvider(provider: string, version?: string): OverrideAudit {
      return auditOverride(provider, this._store.loadProvider(provider, version), this._store.loadDefault());
   }

   /**
    * The complete configuration of one provider, with variables substituted.
    */
   public resolveConfiguration(softwareName: string, provider: string, options?: ReconcileOptions): MergedConfiguration {
      return this._reconciler.resolveConfiguration(softwareName, provider, options);
   }

   /**
    * The configuration of several providers merged in order, with every
    * provider's tombstones applied.
    */
   public resolveMerged(softwareName: string, providers: string[], options?: MultiProviderOptions): MergedConfiguration {
      return this._reconciler.resolveMerged(softwareName, providers, options);
   }

   /**
    * Compute the overrides of several providers for one piece of software.
    */
   public generate(softwareName: string, providers: string[], options: GenerateOptions = {}): GenerationResult {
      const { providerVersions, ...reconcileOptions } = options;

      const result: GenerationResult = {
         softwareName,
         defaults: this._reconciler.resolveDefaults(softwareName, options.context),
         providers: {},
         supported: [],
         unsupported: [],
      };

      for (const provider of providers) {
         const fragment = this._reconciler.computeOverrides(softwareName, provider, {
            ...reconcileOptions,
            providerVersion: providerVersions?.[provider],
         });

         result.providers[provider] = fragment;

         if (fragment.supported === false) {
            result.unsupported.push(provider);
         } else {
            result.supported.push(provider);
         }
      }

      this._logger.info({
         softwareName,
         supported: result.supported.length,
         unsupported: result.unsupported.length,
      }, 'Generated provider overrides');

      return result;
   }

   /**
    * Drop cached support decisions.
    *
    * @returns Number of cache entries removed
    */
   public invalidateSupportCache(provider?: string, softwareName?: string): number {
      return this._resolver.invalidate(provider, softwareName);
   }

   /**
    * Describe the support cache, or null when caching is disabled.
    */
   public getCacheInfo(): Record<string, unknown> | null {
      return this._cache ? this._cache.getInfo() : null;
   }

}
