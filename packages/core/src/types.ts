/**
 * Shared types for templates, fragments and the collaborators the engine consumes.
 */

/**
 * A scalar value that can appear in a template.
 */
export type TemplateScalar = string | number | boolean | null;

/**
 * Any value that can appear in a template: scalars, sequences or nested templates.
 */
export type TemplateValue = TemplateScalar | TemplateValue[] | Template;

/**
 * A template is a mapping from string keys to template values. Key order is irrelevant.
 */
export interface Template {
   [key: string]: TemplateValue;
}

/**
 * Variables available for `$name` and `${path | fallback}` substitution and for
 * condition evaluation. `software_name` is always present during reconciliation.
 */
export interface VariableContext {
   [name: string]: unknown;
}

/**
 * The provider-specific delta relative to the default template.
 *
 * Always carries `version`. Carries `supported: false` (and nothing else besides
 * `version`) when the provider cannot service the software. Never contains nulls.
 */
export interface OverrideFragment extends Template {
   version: TemplateValue;
}

/**
 * Sentinel returned for providers that cannot service the software.
 */
export interface UnsupportedFragment extends OverrideFragment {
   supported: false;
}

/**
 * The defaults merged with one or more override fragments.
 */
export type MergedConfiguration = Template;

/**
 * A single repository record as returned by the fetchers.
 */
export interface RepositoryRecord {

   /** Package name in the repository */
   name?: unknown;

   /** Provider the record was fetched from, when known */
   provider?: unknown;

   [key: string]: unknown;
}

/**
 * Repository evidence consumed by the support resolver: a single record, a list of
 * records, or an aggregate exposing a `packages` mapping keyed by software name.
 */
export type RepositoryEvidence =
   | RepositoryRecord
   | RepositoryRecord[]
   | { packages: Record<string, unknown>; [key: string]: unknown };

/**
 * Options shared by the reconciliation entry points.
 */
export interface ReconcileOptions {

   /** Evidence that the package exists in the provider's repository */
   repositoryData?: unknown;

   /** Extra variables merged over `{ software_name, provider }` */
   context?: VariableContext;

   /** Version overlay to apply for hierarchical provider templates */
   providerVersion?: string;
}

/**
 * Options for operations that cover several providers at once.
 */
export interface MultiProviderOptions extends Omit<ReconcileOptions, 'providerVersion'> {

   /** Version overlay per provider name */
   providerVersions?: Record<string, string>;
}

/**
 * Key-value memoization service used to remember provider support decisions.
 *
 * Any store with these four operations satisfies the contract.
 */
export interface SupportCache {

   /** Return the cached value, or undefined on a miss or expired entry */
   get(key: string): boolean | undefined;

   /** Store a value, optionally with a time-to-live in seconds */
   put(key: string, value: boolean, ttl?: number): void;

   /** Remove every key matching the glob pattern and return how many were removed */
   invalidatePattern(pattern: string): number;

   /** Describe the cache (size, hit counters, ...) */
   getInfo(): Record<string, unknown>;
}

/**
 * Provider category table used by the support heuristic.
 */
export interface ProviderCategories {

   /** OS-level package managers (apt, brew, winget, ...) */
   system: string[];

   /** Language package managers that carry general-purpose software (npm, pypi, ...) */
   language: string[];

   /** Niche ecosystems that only carry software written for them (cargo, gem, ...) */
   specialized: string[];
}
