/**
 * Variable substitution inside nested templates.
 *
 * Two placeholder forms are recognised in strings:
 *   $name                 - replaced by variables[name]
 *   ${path}               - dotted/indexed lookup, e.g. ${meta.urls[0]}
 *   ${path | fallback}    - as above, with fallback text when the lookup is empty
 *
 * Unknown variables are left as literal text.
 */

import { isTemplate } from './merge.ts';
import type { Template, TemplateValue, VariableContext } from './types.ts';

const EXPRESSION_PATTERN = /\$\{([^}]+)\}/g;

const PATH_SEGMENT_PATTERN = /^([^[\]]+)((?:\[\d+\])*)$/;

/**
 * Substitute variables throughout a template value.
 *
 * Mappings and sequences are rebuilt with every element substituted; scalars
 * other than strings pass through unchanged.
 */
export function substitute<T extends TemplateValue>(node: T, variables: VariableContext): T;
export function substitute(node: TemplateValue, variables: VariableContext): TemplateValue {
   const simple = _simpleVariables(variables);

   return _substituteNode(node, variables, simple);
}

/**
 * Substitute variables in a single string.
 */
export function substituteString(value: string, variables: VariableContext): string {
   return _substituteString(value, variables, _simpleVariables(variables));
}

/**
 * Look up a dotted path such as `a.b[0].c` in the variable context.
 *
 * @returns The value at the path, or undefined when any segment is missing
 */
export function lookupPath(variables: VariableContext, path: string): unknown {
   const trimmed = path.trim();

   if (trimmed === '') {
      return undefined;
   }

   let current: unknown = variables;

   for (const segment of trimmed.split('.')) {
      const match = PATH_SEGMENT_PATTERN.exec(segment.trim());

      if (!match) {
         return undefined;
      }

      const [ , name, indexes ] = match;

      if (!_isRecord(current) || !Object.prototype.hasOwnProperty.call(current, name)) {
         return undefined;
      }
      current = current[name];

      for (const index of indexes.matchAll(/\[(\d+)\]/g)) {
         const position = Number(index[1]);

         if (!Array.isArray(current) || position >= current.length) {
            return undefined;
         }
         current = current[position];
      }
   }

   return current;
}

function _substituteNode(
   node: TemplateValue,
   variables: VariableContext,
   simple: Array<[ string, string ]>
): TemplateValue {
   if (typeof node === 'string') {
      return _substituteString(node, variables, simple);
   }

   if (Array.isArray(node)) {
      return node.map((item) => {
         return _substituteNode(item, variables, simple);
      });
   }

   if (isTemplate(node)) {
      const result: Template = {};

      for (const [ key, value ] of Object.entries(node)) {
         result[key] = _substituteNode(value, variables, simple);
      }

      return result;
   }

   return node;
}

function _substituteString(
   value: string,
   variables: VariableContext,
   simple: Array<[ string, string ]>
): string {
   if (!value.includes('$')) {
      return value;
   }

   let result = value.replace(EXPRESSION_PATTERN, (whole, expression: string) => {
      const separator = expression.indexOf('|'),
            path = separator === -1 ? expression : expression.slice(0, separator),
            fallback = separator === -1 ? undefined : expression.slice(separator + 1).trim();

      const resolved = _formatScalar(lookupPath(variables, path));

      if (resolved !== undefined) {
         return resolved;
      }

      return fallback ?? whole;
   });

   for (const [ name, replacement ] of simple) {
      result = result.split(`$${name}`).join(replacement);
   }

   return result;
}

/**
 * Collect the variables usable as `$name` tokens, longest names first so that
 * `$name_suffix` is replaced before `$name`.
 */
function _simpleVariables(variables: VariableContext): Array<[ string, string ]> {
   const entries: Array<[ string, string ]> = [];

   for (const [ name, value ] of Object.entries(variables)) {
      const formatted = _formatScalar(value);

      if (formatted !== undefined) {
         entries.push([ name, formatted ]);
      }
   }

   return entries.sort((a, b) => {
      return b[0].length - a[0].length;
   });
}

function _formatScalar(value: unknown): string | undefined {
   if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
   }

   return undefined;
}

function _isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}
