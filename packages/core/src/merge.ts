/**
 * Structural Merge - Recursive merging of templates
 *
 * Two merge modes:
 * - deepMerge: mappings recurse, sequences and scalars are replaced wholesale
 * - enhancedMerge: as deepMerge, but an explicit null in the overlay deletes the
 *   key, and mappings emptied by such deletions are dropped bottom-up
 *
 * Every function returns new structures; inputs are never mutated.
 */

import type { Template, TemplateValue } from './types.ts';

/**
 * Check if a value is a template mapping (a plain object, not a sequence or null).
 */
export function isTemplate(value: unknown): value is Template {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep copy a template value.
 */
export function deepClone<T extends TemplateValue>(value: T): T;
export function deepClone(value: TemplateValue): TemplateValue {
   if (Array.isArray(value)) {
      return value.map((item) => {
         return deepClone(item);
      });
   }

   if (isTemplate(value)) {
      const result: Template = {};

      for (const [ key, child ] of Object.entries(value)) {
         result[key] = deepClone(child);
      }

      return result;
   }

   return value;
}

/**
 * Recursively freeze a template value so stored templates cannot be mutated.
 */
export function deepFreeze<T extends TemplateValue>(value: T): T {
   if (Array.isArray(value)) {
      for (const item of value) {
         deepFreeze(item);
      }
      Object.freeze(value);
   } else if (isTemplate(value)) {
      for (const child of Object.values(value)) {
         deepFreeze(child);
      }
      Object.freeze(value);
   }

   return value;
}

/**
 * Deep merge two templates.
 *
 * For each key in `overlay`: when both sides are mappings, recurse; otherwise the
 * overlay value replaces the base value (sequences are never concatenated). Keys
 * present only in `base` are preserved.
 */
export function deepMerge(base: Template, overlay: Template): Template {
   const result = deepClone(base);

   for (const [ key, overlayValue ] of Object.entries(overlay)) {
      const baseValue = result[key];

      if (isTemplate(baseValue) && isTemplate(overlayValue)) {
         result[key] = deepMerge(baseValue, overlayValue);
      } else {
         result[key] = deepClone(overlayValue);
      }
   }

   return result;
}

/**
 * Null-aware deep merge.
 *
 * An explicit null in the overlay removes the key from the result, even when the
 * base defines it. Mappings emptied by such removals are removed from their parent.
 * An overlay value of `{}` is not a deletion and is kept.
 */
export function enhancedMerge(base: Template, overlay: Template): Template {
   const result = deepClone(base);

   for (const [ key, overlayValue ] of Object.entries(overlay)) {
      if (overlayValue === null) {
         delete result[key];
         continue;
      }

      const baseValue = result[key];

      if (isTemplate(baseValue) && isTemplate(overlayValue)) {
         const merged = enhancedMerge(baseValue, overlayValue);

         if (Object.keys(merged).length === 0 && _hasTombstone(overlayValue)) {
            delete result[key];
         } else {
            result[key] = merged;
         }
      } else {
         const cleaned = _stripTombstones(overlayValue);

         if (cleaned === undefined) {
            delete result[key];
         } else {
            result[key] = cleaned;
         }
      }
   }

   return result;
}

/**
 * Remove null values recursively.
 *
 * Null leaves are dropped, and so are mappings left empty by that removal.
 * Mappings that were already empty are kept, as are sequences and any nulls
 * inside sequences.
 */
export function removeNullValues(template: Template): Template {
   const cleaned = _stripTombstones(template);

   return isTemplate(cleaned) ? cleaned : {};
}

/**
 * Structural equality of two template values.
 *
 * Mappings must have the same key set with equal values, sequences must be
 * equal element-wise, and scalars must be strictly equal.
 */
export function valuesEqual(a: TemplateValue | undefined, b: TemplateValue | undefined): boolean {
   if (a === b) {
      return true;
   }

   if (Array.isArray(a) || Array.isArray(b)) {
      if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
         return false;
      }

      return a.every((item, i) => {
         return valuesEqual(item, b[i]);
      });
   }

   if (isTemplate(a) && isTemplate(b)) {
      const keysA = Object.keys(a),
            keysB = Object.keys(b);

      if (keysA.length !== keysB.length) {
         return false;
      }

      return keysA.every((key) => {
         return Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key]);
      });
   }

   return false;
}

/**
 * Read the value at a dotted key path, or undefined when any segment is missing.
 */
export function getPath(template: Template, keyPath: string[]): TemplateValue | undefined {
   let current: TemplateValue | undefined = template;

   for (const segment of keyPath) {
      if (!isTemplate(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
         return undefined;
      }
      current = current[segment];
   }

   return current;
}

/**
 * List the dotted paths of every leaf (non-mapping value, or empty mapping).
 */
export function leafPaths(template: Template, prefix: string[] = []): string[][] {
   const paths: string[][] = [];

   for (const [ key, value ] of Object.entries(template)) {
      const keyPath = [ ...prefix, key ];

      if (isTemplate(value) && Object.keys(value).length > 0) {
         paths.push(...leafPaths(value, keyPath));
      } else {
         paths.push(keyPath);
      }
   }

   return paths;
}

function _hasTombstone(template: Template): boolean {
   return Object.values(template).some((value) => {
      return value === null || (isTemplate(value) && _hasTombstone(value));
   });
}

/**
 * Apply tombstones inside an overlay value that has no mapping to merge into.
 * Returns undefined when the value is a mapping emptied entirely by tombstones.
 */
function _stripTombstones(value: TemplateValue): TemplateValue | undefined {
   if (!isTemplate(value)) {
      return deepClone(value);
   }

   const result: Template = {};

   for (const [ key, child ] of Object.entries(value)) {
      if (child === null) {
         continue;
      }

      const cleaned = _stripTombstones(child);

      if (cleaned !== undefined) {
         result[key] = cleaned;
      }
   }

   if (Object.keys(result).length === 0 && _hasTombstone(value)) {
      return undefined;
   }

   return result;
}
