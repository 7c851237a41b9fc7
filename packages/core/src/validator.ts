/**
 * Configuration Validator - Shape checks for merged configurations and audits
 * of provider override fragments.
 */

import { z } from 'zod';
import { getPath, isTemplate, leafPaths, valuesEqual } from './merge.ts';
import type { Template, TemplateValue } from './types.ts';

const VERSION_PATTERN = /^\d+\.\d+$/;

// YAML reads `version: 0.1` as a number; it is checked by its decimal text
const versionSchema = z.union([
   z.string().regex(VERSION_PATTERN, 'Expected a major.minor version'),
   z.number().refine((value) => {
      return VERSION_PATTERN.test(String(value));
   }, 'Expected a major.minor version'),
]);

const packageSchema = z.object({
   name: z.string().min(1),
}).passthrough();

const directoryEntrySchema = z.unknown().refine((entry) => {
   return !isTemplate(entry) || !Object.prototype.hasOwnProperty.call(entry, 'path') || typeof entry.path === 'string';
}, 'Directory path must be a string');

/**
 * Shape of a merged configuration. Unknown sections pass through.
 */
export const configurationSchema = z.object({
   version: versionSchema,
   packages: z.record(packageSchema).optional(),
   services: z.record(z.unknown()).optional(),
   directories: z.record(directoryEntrySchema).optional(),
   urls: z.record(z.string().nullable()).optional(),
   platforms: z.array(z.string()).optional(),
}).passthrough();

/**
 * Check that a merged configuration is well-formed. Never throws.
 */
export function validateConfiguration(config: unknown): boolean {
   return configurationSchema.safeParse(config).success;
}

/**
 * List what is wrong with a configuration, as `path: message` lines.
 *
 * @returns An empty list when the configuration is well-formed
 */
export function configurationIssues(config: unknown): string[] {
   const parsed = configurationSchema.safeParse(config);

   if (parsed.success) {
      return [];
   }

   return parsed.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';

      return `${where}: ${issue.message}`;
   });
}

/**
 * A proposed change to an override fragment.
 */
export interface OverrideSuggestion {
   type: 'remove';

   /** Dotted path of the key to remove */
   path: string;

   currentValue: TemplateValue;
   reason: string;

   /** 0.0 to 1.0 */
   confidence: number;
}

/**
 * Result of auditing an override fragment against the defaults.
 */
export interface OverrideAudit {
   provider: string;

   /** False when an unsupported fragment carries anything besides version/supported */
   valid: boolean;

   /** The fragment with redundant entries removed */
   necessary: Template;

   /** Dotted paths whose value equals the default */
   redundantPaths: string[];

   suggestions: OverrideSuggestion[];

   /** 0.0 to 1.0; share of the fragment's leaves that are necessary */
   qualityScore: number;

   /** 0.0 to 1.0; share of the fragment's leaves that could be removed */
   optimizationPotential: number;
}

const UNSUPPORTED_KEYS = new Set([ 'version', 'supported' ]);

/**
 * Audit an override fragment: find entries that repeat the defaults and score how
 * close the fragment is to minimal.
 */
export function auditOverride(provider: string, fragment: Template, defaults: Template): OverrideAudit {
   if (fragment.supported === false) {
      return _auditUnsupported(provider, fragment);
   }

   const necessary: Template = {},
         redundantPaths: string[] = [],
         suggestions: OverrideSuggestion[] = [];

   if (fragment.version !== undefined) {
      necessary.version = fragment.version;
   }

   const paths = leafPaths(fragment).filter((keyPath) => {
      return keyPath.length > 1 || !UNSUPPORTED_KEYS.has(keyPath[0]);
   });

   for (const keyPath of paths) {
      const value = getPath(fragment, keyPath),
            defaultValue = getPath(defaults, keyPath);

      if (value === undefined) {
         continue;
      }

      if (defaultValue !== undefined && valuesEqual(value, defaultValue)) {
         const dotted = keyPath.join('.');

         redundantPaths.push(dotted);
         suggestions.push({
            type: 'remove',
            path: dotted,
            currentValue: value,
            reason: 'Value matches default configuration',
            confidence: 0.8,
         });
      } else {
         _setPath(necessary, keyPath, value);
      }
   }

   const necessaryCount = paths.length - redundantPaths.length;

   return {
      provider,
      valid: true,
      necessary,
      redundantPaths,
      suggestions,
      qualityScore: paths.length === 0 ? 0.5 : necessaryCount / paths.length,
      optimizationPotential: redundantPaths.length / Math.max(1, paths.length),
   };
}

function _auditUnsupported(provider: string, fragment: Template): OverrideAudit {
   const extraKeys = Object.keys(fragment).filter((key) => {
      return !UNSUPPORTED_KEYS.has(key);
   });

   const necessary: Template = { supported: false };

   if (fragment.version !== undefined) {
      necessary.version = fragment.version;
   }

   return {
      provider,
      valid: extraKeys.length === 0,
      necessary,
      redundantPaths: extraKeys,
      suggestions: extraKeys.map((key): OverrideSuggestion => {
         return {
            type: 'remove',
            path: key,
            currentValue: fragment[key],
            reason: 'Unnecessary key for unsupported provider',
            confidence: 0.9,
         };
      }),
      qualityScore: extraKeys.length === 0 ? 0.8 : 0.5,
      optimizationPotential: extraKeys.length / Math.max(1, Object.keys(fragment).length),
   };
}

function _setPath(target: Template, keyPath: string[], value: TemplateValue): void {
   let current = target;

   for (const segment of keyPath.slice(0, -1)) {
      const next = current[segment];

      if (isTemplate(next)) {
         current = next;
      } else {
         const created: Template = {};

         current[segment] = created;
         current = created;
      }
   }

   current[keyPath[keyPath.length - 1]] = value;
}
