/**
 * Override Reconciler - Computes provider overrides and merges them back
 *
 * A provider fragment keeps only what differs from the defaults once both sides
 * have had their directives resolved and their variables substituted:
 *
 *   defaults.yaml           providers/apt.yaml          override fragment
 *   services:               services:                   version: '0.1'
 *     default:                default:                  services:
 *       name: $software_name    name: nginx        →      default:
 *       enabled: false          enabled: true               enabled: true
 *
 * Explicit nulls in a provider template are tombstones. They never appear in a
 * fragment, so merging fragments cannot apply them; `resolveConfiguration` and
 * `resolveMerged` merge the resolved provider templates themselves and remove
 * the nulled paths.
 */

import { MergeInputError, describeType } from './errors.ts';
import { processDirectives } from './directives.ts';
import type { TemplateFunction } from './directives.ts';
import { deepClone, enhancedMerge, isTemplate, removeNullValues, valuesEqual } from './merge.ts';
import { substitute } from './substitution.ts';
import { FALLBACK_DEFAULT_TEMPLATE } from './template-store.ts';
import { getLogger } from './logger.ts';
import type { Logger } from './logger.ts';
import type { ProviderSupportResolver } from './support-resolver.ts';
import type { TemplateStore } from './template-store.ts';
import type {
   MergedConfiguration,
   MultiProviderOptions,
   OverrideFragment,
   ReconcileOptions,
   Template,
   TemplateValue,
   UnsupportedFragment,
   VariableContext,
} from './types.ts';

/** Top-level keys of a provider template that are never part of the delta */
const STAMP_KEYS = new Set([ 'version', 'supported' ]);

export interface OverrideReconcilerOptions {
   logger?: Logger;

   /** Functions callable from templates through `$function:` */
   functions?: Record<string, TemplateFunction>;
}

/**
 * Computes minimal provider overrides relative to the default template.
 */
export class OverrideReconciler {

   private readonly _store: TemplateStore;
   private readonly _resolver: ProviderSupportResolver;
   private readonly _logger: Logger;
   private readonly _functions = new Map<string, TemplateFunction>();

   public constructor(store: TemplateStore, resolver: ProviderSupportResolver, options: OverrideReconcilerOptions = {}) {
      this._store = store;
      this._resolver = resolver;
      this._logger = options.logger ?? getLogger('reconciler');

      for (const [ name, fn ] of Object.entries(options.functions ?? {})) {
         this.registerFunction(name, fn);
      }
   }

   /**
    * Make a function callable from templates as `$function: <name>(...)`.
    * Registering a name again replaces the earlier function.
    */
   public registerFunction(name: string, fn: TemplateFunction): void {
      this._functions.set(name, fn);
   }

   /**
    * Compute the override fragment of a provider for a piece of software.
    *
    * @returns `{ version, supported: false }` when the provider cannot service the
    *   software, otherwise `version` plus every provider value that differs from
    *   the defaults
    */
   public computeOverrides(softwareName: string, provider: string, options: ReconcileOptions = {}): OverrideFragment {
      const defaults = this._store.loadDefault(),
            version = _templateVersion(defaults);

      if (!this._resolver.isSupported(softwareName, provider, options.repositoryData, options.providerVersion)) {
         this._logger.debug({ softwareName, provider, providerVersion: options.providerVersion }, 'Provider does not support software');
         return unsupportedFragment(version);
      }

      const providerTemplate = this._store.loadProvider(provider, options.providerVersion);

      if (Object.keys(providerTemplate).length === 0) {
         return { version };
      }

      const context = buildContext(softwareName, provider, options.context),
            resolvedDefaults = this._resolve(defaults, context),
            resolvedProvider = _withoutStamps(this._resolve(providerTemplate, context));

      return { version, ...diffTemplates(resolvedProvider, resolvedDefaults) };
   }

   /**
    * Merge an override fragment onto a default template.
    *
    * Nulls left in the result, from either side, are pruned. The defaults are
    * used as given; no variables are substituted. Use `resolveConfiguration`
    * when provider tombstones must take effect.
    *
    * @throws MergeInputError when either argument is not a mapping
    */
   public mergeWithDefaults(defaults: unknown, overrides: unknown): MergedConfiguration {
      return mergeWithDefaults(defaults, overrides);
   }

   /**
    * Merge several provider fragments onto the defaults in order, later fragments
    * winning. Unsupported fragments are skipped.
    *
    * @throws MergeInputError when the defaults or any fragment is not a mapping
    */
   public mergeProviders(defaults: unknown, fragments: unknown[]): MergedConfiguration {
      if (!isTemplate(defaults)) {
         throw new MergeInputError('defaults', describeType(defaults));
      }

      let merged: Template = defaults;

      for (const fragment of fragments) {
         if (!isTemplate(fragment)) {
            throw new MergeInputError('overrides', describeType(fragment));
         }

         if (fragment.supported === false) {
            continue;
         }

         merged = enhancedMerge(merged, fragment);
      }

      return removeNullValues(merged);
   }

   /**
    * Resolve the complete configuration of a provider: substituted defaults with
    * the substituted provider template merged on top, tombstones applied.
    */
   public resolveConfiguration(softwareName: string, provider: string, options: ReconcileOptions = {}): MergedConfiguration {
      const { providerVersion, ...rest } = options;

      return this.resolveMerged(softwareName, [ provider ], {
         ...rest,
         providerVersions: providerVersion ? { [provider]: providerVersion } : undefined,
      });
   }

   /**
    * Resolve the configuration of several providers merged in order, later
    * providers winning. Each supported provider's resolved template is merged
    * onto the result with its tombstones; unsupported providers are skipped.
    *
    * @returns The unsupported sentinel when no provider supports the software
    */
   public resolveMerged(softwareName: string, providers: string[], options: MultiProviderOptions = {}): MergedConfiguration {
      const defaults = this._store.loadDefault(),
            version = _templateVersion(defaults);

      let merged: Template | null = null;

      for (const provider of providers) {
         const providerVersion = options.providerVersions?.[provider];

         if (!this._resolver.isSupported(softwareName, provider, options.repositoryData, providerVersion)) {
            this._logger.debug({ softwareName, provider, providerVersion }, 'Skipping unsupported provider');
            continue;
         }

         const context = buildContext(softwareName, provider, options.context),
               resolvedProvider = _withoutStamps(this._resolve(this._store.loadProvider(provider, providerVersion), context));

         merged = enhancedMerge(merged ?? this._resolve(defaults, context), resolvedProvider);
      }

      if (merged === null) {
         return unsupportedFragment(version);
      }

      return { ...removeNullValues(merged), version };
   }

   /**
    * The default template with directives resolved and variables substituted.
    */
   public resolveDefaults(softwareName: string, context?: VariableContext): Template {
      const variables: VariableContext = { ...context, software_name: softwareName };

      return removeNullValues(this._resolve(this._store.loadDefault(), variables));
   }

   private _resolve(template: Template, context: VariableContext): Template {
      const processed = processDirectives(template, context, {
         logger: this._logger,
         functions: this._functions,
         loadInclude: (name) => {
            return this._store.loadInclude(name);
         },
      });

      return substitute(processed, context);
   }

}

/**
 * Merge an override fragment onto a default template.
 *
 * @throws MergeInputError when either argument is not a mapping
 */
export function mergeWithDefaults(defaults: unknown, overrides: unknown): MergedConfiguration {
   if (!isTemplate(defaults)) {
      throw new MergeInputError('defaults', describeType(defaults));
   }

   if (!isTemplate(overrides)) {
      throw new MergeInputError('overrides', describeType(overrides));
   }

   if (overrides.supported === false) {
      const version = overrides.version ?? defaults.version;

      return version === undefined || version === null
         ? { supported: false }
         : { version: deepClone(version), supported: false };
   }

   return removeNullValues(enhancedMerge(defaults, overrides));
}

/**
 * Build the variable context for a provider: caller variables, plus the provider
 * and software names, which always win.
 */
export function buildContext(softwareName: string, provider: string, context?: VariableContext): VariableContext {
   return { ...context, provider, software_name: softwareName };
}

/**
 * Build the fragment returned for an unsupported provider.
 */
export function unsupportedFragment(version: TemplateValue): UnsupportedFragment {
   return { version, supported: false };
}

/**
 * Keep the parts of `template` that differ from `base`.
 *
 * Nulls are skipped. A mapping is recursed into and dropped when nothing inside
 * it differs; an empty mapping is kept only where `base` has no mapping.
 */
export function diffTemplates(template: Template, base: Template | undefined): Template {
   const result: Template = {};

   for (const [ key, value ] of Object.entries(template)) {
      if (value === null) {
         continue;
      }

      const baseValue = base && Object.prototype.hasOwnProperty.call(base, key) ? base[key] : undefined;

      if (isTemplate(value)) {
         if (Object.keys(value).length === 0) {
            if (!isTemplate(baseValue)) {
               result[key] = {};
            }
            continue;
         }

         const child = diffTemplates(value, isTemplate(baseValue) ? baseValue : undefined);

         if (Object.keys(child).length > 0) {
            result[key] = child;
         }
         continue;
      }

      if (!valuesEqual(value, baseValue)) {
         result[key] = deepClone(value);
      }
   }

   return result;
}

function _templateVersion(defaults: Template): TemplateValue {
   const version = defaults.version;

   return version === undefined || version === null ? FALLBACK_DEFAULT_TEMPLATE.version : version;
}

function _withoutStamps(template: Template): Template {
   const result: Template = {};

   for (const [ key, value ] of Object.entries(template)) {
      if (!STAMP_KEYS.has(key)) {
         result[key] = value;
      }
   }

   return result;
}
