/**
 * @pkgmeta/core - Override-only template reconciliation
 *
 * This package loads a default template and per-provider override templates,
 * computes minimal provider overrides, merges them back onto the defaults and
 * decides which package managers can ship a piece of software.
 */

export const VERSION = '0.1.0';

// ============================================================================
// Engine
// ============================================================================

export { TemplateEngine } from './engine.ts';
export type { TemplateEngineOptions, GenerateOptions, GenerationResult } from './engine.ts';

// ============================================================================
// Templates
// ============================================================================

export { TemplateStore, FALLBACK_DEFAULT_TEMPLATE } from './template-store.ts';
export type { TemplateStoreOptions } from './template-store.ts';

export { substitute, substituteString, lookupPath } from './substitution.ts';

export { processDirectives, isDirectiveKey } from './directives.ts';
export type { DirectiveOptions, TemplateFunction } from './directives.ts';

export { parseCondition, evaluateCondition, checkCondition, tokenize } from './conditions.ts';
export type { ConditionExpression, Operand, Token } from './conditions.ts';

// ============================================================================
// Reconciliation
// ============================================================================

export {
   OverrideReconciler,
   mergeWithDefaults,
   buildContext,
   diffTemplates,
   unsupportedFragment,
} from './reconciler.ts';
export type { OverrideReconcilerOptions } from './reconciler.ts';

export {
   deepMerge,
   enhancedMerge,
   removeNullValues,
   valuesEqual,
   deepClone,
   deepFreeze,
   isTemplate,
   getPath,
   leafPaths,
} from './merge.ts';

// ============================================================================
// Provider Support
// ============================================================================

export {
   ProviderSupportResolver,
   hasRepositoryEvidence,
   supportCacheKey,
   SUPPORT_CACHE_PREFIX,
} from './support-resolver.ts';
export type {
   ProviderCategory,
   SupportDecision,
   SupportResolverOptions,
   SupportSource,
} from './support-resolver.ts';

export { MemoryCache, withCache } from './cache.ts';
export type { MemoryCacheOptions } from './cache.ts';

// ============================================================================
// Validation
// ============================================================================

export { validateConfiguration, configurationIssues, configurationSchema, auditOverride } from './validator.ts';
export type { OverrideAudit, OverrideSuggestion } from './validator.ts';

// ============================================================================
// Configuration
// ============================================================================

export {
   getPkgmetaHome,
   getDefaultTemplatesDir,
   resolveEngineConfig,
   loadProviderCategories,
   engineConfigSchema,
   providerCategoriesSchema,
   DEFAULT_CACHE_TTL,
} from './config.ts';
export type { EngineConfig, EngineConfigInput } from './config.ts';

export { getLogger, getDefaultLogLevel, setLogLevel, resetLogger, isLogLevel, LOG_LEVELS } from './logger.ts';
export type { Logger } from './logger.ts';

// ============================================================================
// Errors
// ============================================================================

export { PkgmetaError, MergeInputError, ConditionSyntaxError, ConfigurationError } from './errors.ts';

// ============================================================================
// Types
// ============================================================================

export type {
   Template,
   TemplateScalar,
   TemplateValue,
   VariableContext,
   OverrideFragment,
   UnsupportedFragment,
   MergedConfiguration,
   RepositoryRecord,
   RepositoryEvidence,
   ReconcileOptions,
   MultiProviderOptions,
   SupportCache,
   ProviderCategories,
} from './types.ts';
