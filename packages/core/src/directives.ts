/**
 * Template directives - conditional, repeated and composed sections inside templates
 *
 * Inside any mapping, keys are processed in order:
 *
 *   $if: <condition>         start a chain; its mapping is merged in when true
 *   $elif: <condition>       continue the chain when no earlier branch matched
 *   $else                    close the chain when no earlier branch matched
 *   $endif                   close the chain explicitly (value ignored)
 *   $platform: <name>        merged in when `platforms` lists the name
 *   $for: <var> in <path>    merged in once per item of a sequence or mapping
 *   $endfor                  marker only (value ignored)
 *   $include: <name>         merged in from another template, value on top
 *   $function: <name>(args)  merged in from a registered function's result
 *
 * A regular key, or any directive other than $elif/$else, closes the chain.
 * Conditions follow the grammar in conditions.ts; a condition that fails to
 * parse is logged and counts as false.
 */

import { parseCondition, evaluateCondition } from './conditions.ts';
import { ConditionSyntaxError } from './errors.ts';
import { deepMerge, isTemplate } from './merge.ts';
import { lookupPath, substitute, substituteString } from './substitution.ts';
import { getLogger } from './logger.ts';
import type { Logger } from './logger.ts';
import type { Template, TemplateValue, VariableContext } from './types.ts';

const IF_PREFIX = '$if:',
      ELIF_PREFIX = '$elif:',
      ELSE_KEY = '$else',
      ENDIF_KEY = '$endif',
      PLATFORM_PREFIX = '$platform:',
      FOR_PREFIX = '$for:',
      ENDFOR_KEY = '$endfor',
      INCLUDE_PREFIX = '$include:',
      FUNCTION_PREFIX = '$function:';

const DIRECTIVE_STEMS = [ '$if', '$elif', '$else', '$endif', '$platform', '$for', '$endfor', '$include', '$function' ];

const LOOP_PATTERN = /^([A-Za-z_]\w*)\s+in\s+(.+)$/,
      CALL_PATTERN = /^([A-Za-z_]\w*)\s*(?:\((.*)\))?$/;

/**
 * A function callable from templates through `$function:`.
 *
 * @param args - Positional arguments from the call and from a sequence value
 * @param named - Named arguments from a mapping value
 * @returns A mapping to merge into the parent; anything else is ignored
 */
export type TemplateFunction = (args: TemplateValue[], named: Template) => TemplateValue;

export interface DirectiveOptions {
   logger?: Logger;

   /** Functions callable through `$function:` */
   functions?: ReadonlyMap<string, TemplateFunction>;

   /** Resolves `$include:` names; without it every include is skipped */
   loadInclude?: (name: string) => Template | null;
}

interface DirectiveState {
   context: VariableContext;
   logger: Logger;
   functions: ReadonlyMap<string, TemplateFunction>;
   loadInclude: ((name: string) => Template | null) | undefined;

   /** Names of the includes being expanded, outermost first */
   includeStack: string[];
}

type ChainState = 'closed' | 'pending' | 'matched';

/**
 * Check whether a key is a directive key.
 */
export function isDirectiveKey(key: string): boolean {
   return DIRECTIVE_STEMS.some((stem) => {
      return key.startsWith(stem);
   });
}

/**
 * Resolve every directive in a template value.
 */
export function processDirectives<T extends TemplateValue>(node: T, context: VariableContext, options?: DirectiveOptions): T;
export function processDirectives(node: TemplateValue, context: VariableContext, options: DirectiveOptions = {}): TemplateValue {
   return _process(node, {
      context,
      logger: options.logger ?? getLogger('directives'),
      functions: options.functions ?? new Map(),
      loadInclude: options.loadInclude,
      includeStack: [],
   });
}

function _process(node: TemplateValue, state: DirectiveState): TemplateValue {
   if (Array.isArray(node)) {
      return node.map((item) => {
         return _process(item, state);
      });
   }

   if (!isTemplate(node)) {
      return node;
   }

   const { logger } = state;

   let result: Template = {},
       chain: ChainState = 'closed';

   const mergeBody = (key: string, body: TemplateValue): void => {
      if (!isTemplate(body)) {
         logger.warn({ directive: key }, 'Directive body must be a mapping; ignoring it');
         return;
      }
      result = deepMerge(result, _processMapping(body, state));
   };

   for (const [ key, value ] of Object.entries(node)) {
      if (!isDirectiveKey(key)) {
         chain = 'closed';
         result[key] = _process(value, state);
         continue;
      }

      if (key.startsWith(IF_PREFIX)) {
         const selected = _evaluate(key.slice(IF_PREFIX.length), state);

         chain = selected ? 'matched' : 'pending';
         if (selected) {
            mergeBody(key, value);
         }
         continue;
      }

      if (key.startsWith(ELIF_PREFIX)) {
         if (chain === 'closed') {
            logger.warn({ directive: key }, 'Ignoring $elif without a preceding $if');
         } else if (chain === 'pending' && _evaluate(key.slice(ELIF_PREFIX.length), state)) {
            chain = 'matched';
            mergeBody(key, value);
         }
         continue;
      }

      if (key === ELSE_KEY) {
         if (chain === 'closed') {
            logger.warn({ directive: key }, 'Ignoring $else without a preceding $if');
         } else if (chain === 'pending') {
            mergeBody(key, value);
         }
         chain = 'closed';
         continue;
      }

      chain = 'closed';

      if (key === ENDIF_KEY || key === ENDFOR_KEY) {
         continue;
      }

      if (key.startsWith(PLATFORM_PREFIX)) {
         if (_platforms(state.context).includes(key.slice(PLATFORM_PREFIX.length).trim())) {
            mergeBody(key, value);
         }
      } else if (key.startsWith(FOR_PREFIX)) {
         result = deepMerge(result, _expandLoop(key, value, state));
      } else if (key.startsWith(INCLUDE_PREFIX)) {
         result = deepMerge(result, _expandInclude(key, value, state));
      } else if (key.startsWith(FUNCTION_PREFIX)) {
         result = deepMerge(result, _callFunction(key, value, state));
      } else {
         logger.warn({ directive: key }, 'Unknown directive');
      }
   }

   return result;
}

function _processMapping(template: Template, state: DirectiveState): Template {
   const processed = _process(template, state);

   return isTemplate(processed) ? processed : {};
}

function _evaluate(condition: string, state: DirectiveState): boolean {
   try {
      return evaluateCondition(parseCondition(condition), state.context);
   } catch(error) {
      if (error instanceof ConditionSyntaxError) {
         state.logger.warn({ condition: condition.trim(), err: error }, 'Invalid condition; treating it as false');
         return false;
      }
      throw error;
   }
}

function _platforms(context: VariableContext): string[] {
   const platforms = context.platforms;

   if (Array.isArray(platforms)) {
      return platforms.filter((platform): platform is string => {
         return typeof platform === 'string';
      });
   }

   return typeof context.platform === 'string' ? [ context.platform ] : [];
}

/**
 * Expand a `$for` body once per item. A mapping iterates as `{ key, value }`
 * items. Loop variables are substituted into the body's keys and values right
 * away, since they are out of scope once the loop ends.
 */
function _expandLoop(key: string, body: TemplateValue, state: DirectiveState): Template {
   const definition = key.slice(FOR_PREFIX.length).trim(),
         match = LOOP_PATTERN.exec(definition);

   if (!match) {
      state.logger.warn({ directive: key }, 'Invalid loop; expected "$for: <name> in <path>"');
      return {};
   }

   if (!isTemplate(body)) {
      state.logger.warn({ directive: key }, 'Directive body must be a mapping; ignoring it');
      return {};
   }

   const [ , variable, path ] = match,
         iterable = lookupPath(state.context, path);

   let items: unknown[];

   if (Array.isArray(iterable)) {
      items = iterable;
   } else if (isTemplate(iterable)) {
      items = Object.entries(iterable).map(([ entryKey, entryValue ]) => {
         return { key: entryKey, value: entryValue };
      });
   } else {
      state.logger.debug({ directive: key }, 'Loop source is not a sequence or mapping; skipping it');
      return {};
   }

   let result: Template = {};

   for (const item of items) {
      const context: VariableContext = { ...state.context, [variable]: item },
            expanded = _processMapping(body, { ...state, context });

      result = deepMerge(result, _substituteKeys(substitute(expanded, context), context));
   }

   return result;
}

function _substituteKeys(template: Template, context: VariableContext): Template {
   const result: Template = {};

   for (const [ key, value ] of Object.entries(template)) {
      result[substituteString(key, context)] = isTemplate(value) ? _substituteKeys(value, context) : value;
   }

   return result;
}

function _expandInclude(key: string, overrides: TemplateValue, state: DirectiveState): Template {
   const name = key.slice(INCLUDE_PREFIX.length).trim();

   if (state.includeStack.includes(name)) {
      state.logger.warn({ include: name, chain: state.includeStack }, 'Circular include detected; skipping it');
      return {};
   }

   const included = state.loadInclude ? state.loadInclude(name) : null;

   if (!included) {
      state.logger.warn({ include: name }, 'Included template not found');
      return {};
   }

   const nested = { ...state, includeStack: [ ...state.includeStack, name ] },
         expanded = _processMapping(included, nested);

   return isTemplate(overrides) ? deepMerge(expanded, _processMapping(overrides, state)) : expanded;
}

function _callFunction(key: string, value: TemplateValue, state: DirectiveState): Template {
   const match = CALL_PATTERN.exec(key.slice(FUNCTION_PREFIX.length).trim());

   if (!match) {
      state.logger.warn({ directive: key }, 'Invalid function call');
      return {};
   }

   const [ , name, argList ] = match,
         fn = state.functions.get(name);

   if (!fn) {
      state.logger.warn({ function: name }, 'Unknown template function');
      return {};
   }

   const args: TemplateValue[] = [],
         named: Template = {};

   for (const raw of _splitArguments(argList ?? '')) {
      const separator = raw.indexOf('=');

      if (separator > 0 && /^\w+$/.test(raw.slice(0, separator).trim())) {
         named[raw.slice(0, separator).trim()] = _parseArgument(raw.slice(separator + 1).trim(), state.context);
      } else {
         args.push(_parseArgument(raw, state.context));
      }
   }

   if (isTemplate(value)) {
      for (const [ argName, argValue ] of Object.entries(value)) {
         named[argName] = typeof argValue === 'string' ? _parseArgument(argValue, state.context) : argValue;
      }
   } else if (Array.isArray(value)) {
      for (const item of value) {
         args.push(typeof item === 'string' ? _parseArgument(item, state.context) : item);
      }
   } else if (value !== null) {
      args.push(typeof value === 'string' ? _parseArgument(value, state.context) : value);
   }

   let output: TemplateValue;

   try {
      output = fn(args, named);
   } catch(error) {
      state.logger.error({ function: name, err: error }, 'Template function failed; skipping it');
      return {};
   }

   if (!isTemplate(output)) {
      state.logger.warn({ function: name }, 'Template function did not return a mapping; ignoring it');
      return {};
   }

   return output;
}

function _splitArguments(argList: string): string[] {
   const args: string[] = [];

   let current = '',
       quote: string | null = null;

   for (const char of argList) {
      if (quote) {
         if (char === quote) {
            quote = null;
         }
         current += char;
      } else if (char === '\'' || char === '"') {
         quote = char;
         current += char;
      } else if (char === ',') {
         args.push(current.trim());
         current = '';
      } else {
         current += char;
      }
   }

   if (current.trim() !== '' || args.length > 0) {
      args.push(current.trim());
   }

   return args;
}

/**
 * Read a function argument: `$name` variables, quoted strings, numbers,
 * booleans and null. Anything else is taken as text.
 */
function _parseArgument(raw: string, context: VariableContext): TemplateValue {
   if (raw.startsWith('$') && Object.prototype.hasOwnProperty.call(context, raw.slice(1))) {
      return _toTemplateValue(context[raw.slice(1)]);
   }

   if (raw.length >= 2 && (raw[0] === '\'' || raw[0] === '"') && raw[raw.length - 1] === raw[0]) {
      return raw.slice(1, -1);
   }

   if (/^-?\d+(\.\d+)?$/.test(raw)) {
      return Number(raw);
   }

   const lower = raw.toLowerCase();

   if (lower === 'true' || lower === 'false') {
      return lower === 'true';
   }

   return lower === 'null' ? null : raw;
}

function _toTemplateValue(value: unknown): TemplateValue {
   if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return value;
   }

   if (Array.isArray(value)) {
      return value.map(_toTemplateValue);
   }

   if (typeof value === 'object') {
      const result: Template = {};

      for (const [ key, child ] of Object.entries(value)) {
         result[key] = _toTemplateValue(child);
      }

      return result;
   }

   return null;
}
