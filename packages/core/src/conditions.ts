/**
 * Condition grammar for template directives
 *
 * Conditions are parsed into a tagged expression tree and evaluated against the
 * variable context. Nothing is ever handed to a general-purpose interpreter.
 *
 *   expr       := or
 *   or         := and ( "or" and )*
 *   and        := not ( "and" not )*
 *   not        := "not" not | primary
 *   primary    := "(" expr ")" | "exists" path | comparison
 *   comparison := operand ( ("==" | "!=") operand | ["not"] "in" operand )?
 *   operand    := string | number | true | false | null | list | path
 *   list       := "[" ( operand ( "," operand )* )? "]"
 */

import { ConditionSyntaxError } from './errors.ts';
import { lookupPath } from './substitution.ts';
import type { VariableContext } from './types.ts';

export type Operand =
   | { kind: 'literal'; value: string | number | boolean | null }
   | { kind: 'list'; items: Operand[] }
   | { kind: 'path'; path: string };

export type ConditionExpression =
   | { kind: 'and'; left: ConditionExpression; right: ConditionExpression }
   | { kind: 'or'; left: ConditionExpression; right: ConditionExpression }
   | { kind: 'not'; operand: ConditionExpression }
   | { kind: 'exists'; path: string }
   | { kind: 'compare'; operator: '==' | '!='; left: Operand; right: Operand }
   | { kind: 'in'; negated: boolean; needle: Operand; haystack: Operand }
   | { kind: 'truthy'; operand: Operand };

type TokenType = 'string' | 'number' | 'word' | 'op' | 'punct' | 'end';

export interface Token {
   type: TokenType;
   text: string;
   position: number;
}

const KEYWORDS = new Set([ 'and', 'or', 'not', 'in', 'exists', 'true', 'false', 'null', 'none' ]);

/**
 * Parse a condition string into an expression tree.
 *
 * @throws ConditionSyntaxError when the condition does not follow the grammar
 */
export function parseCondition(source: string): ConditionExpression {
   const parser = new ConditionParser(source, tokenize(source));

   return parser.parse();
}

/**
 * Evaluate a parsed condition against the variable context.
 */
export function evaluateCondition(expression: ConditionExpression, context: VariableContext): boolean {
   switch (expression.kind) {
      case 'and':
         return evaluateCondition(expression.left, context) && evaluateCondition(expression.right, context);
      case 'or':
         return evaluateCondition(expression.left, context) || evaluateCondition(expression.right, context);
      case 'not':
         return !evaluateCondition(expression.operand, context);
      case 'exists': {
         const value = lookupPath(context, expression.path);

         return value !== undefined && value !== null;
      }
      case 'compare': {
         const equal = _textOf(_resolve(expression.left, context)) === _textOf(_resolve(expression.right, context));

         return expression.operator === '==' ? equal : !equal;
      }
      case 'in': {
         const found = _contains(_resolve(expression.haystack, context), _resolve(expression.needle, context));

         return expression.negated ? !found : found;
      }
      case 'truthy':
         return _isTruthy(_resolve(expression.operand, context));
      default:
         return _assertNever(expression);
   }
}

/**
 * Parse and evaluate a condition in one step.
 *
 * @throws ConditionSyntaxError when the condition does not follow the grammar
 */
export function checkCondition(source: string, context: VariableContext): boolean {
   return evaluateCondition(parseCondition(source), context);
}

/**
 * Split a condition into tokens.
 */
export function tokenize(source: string): Token[] {
   const tokens: Token[] = [];

   let i = 0;

   while (i < source.length) {
      const char = source[i];

      if (/\s/.test(char)) {
         i++;
         continue;
      }

      if (char === '"' || char === '\'') {
         const end = source.indexOf(char, i + 1);

         if (end === -1) {
            throw new ConditionSyntaxError('Unterminated string literal', source, i);
         }
         tokens.push({ type: 'string', text: source.slice(i + 1, end), position: i });
         i = end + 1;
         continue;
      }

      const twoChars = source.slice(i, i + 2);

      if (twoChars === '==' || twoChars === '!=') {
         tokens.push({ type: 'op', text: twoChars, position: i });
         i += 2;
         continue;
      }

      if ('()[],'.includes(char)) {
         tokens.push({ type: 'punct', text: char, position: i });
         i++;
         continue;
      }

      const numberMatch = /^-?\d+(?:\.\d+)?(?![\w.])/.exec(source.slice(i));

      if (numberMatch) {
         tokens.push({ type: 'number', text: numberMatch[0], position: i });
         i += numberMatch[0].length;
         continue;
      }

      const wordMatch = /^[A-Za-z_][\w.-]*(?:\[\d+\][\w.-]*)*/.exec(source.slice(i));

      if (wordMatch) {
         tokens.push({ type: 'word', text: wordMatch[0], position: i });
         i += wordMatch[0].length;
         continue;
      }

      throw new ConditionSyntaxError(`Unexpected character '${char}'`, source, i);
   }

   tokens.push({ type: 'end', text: '', position: source.length });

   return tokens;
}

class ConditionParser {

   private _index = 0;

   public constructor(
      private readonly _source: string,
      private readonly _tokens: Token[]
   ) {}

   public parse(): ConditionExpression {
      if (this._peek().type === 'end') {
         throw this._error('Empty condition');
      }

      const expression = this._parseOr();

      if (this._peek().type !== 'end') {
         throw this._error(`Unexpected '${this._peek().text}'`);
      }

      return expression;
   }

   private _parseOr(): ConditionExpression {
      let left = this._parseAnd();

      while (this._isKeyword('or')) {
         this._index++;
         left = { kind: 'or', left, right: this._parseAnd() };
      }

      return left;
   }

   private _parseAnd(): ConditionExpression {
      let left = this._parseNot();

      while (this._isKeyword('and')) {
         this._index++;
         left = { kind: 'and', left, right: this._parseNot() };
      }

      return left;
   }

   private _parseNot(): ConditionExpression {
      if (this._isKeyword('not')) {
         this._index++;
         return { kind: 'not', operand: this._parseNot() };
      }

      return this._parsePrimary();
   }

   private _parsePrimary(): ConditionExpression {
      const token = this._peek();

      if (token.type === 'punct' && token.text === '(') {
         this._index++;

         const inner = this._parseOr();

         this._expectPunct(')');
         return inner;
      }

      if (this._isKeyword('exists')) {
         this._index++;

         const target = this._next();

         if (target.type !== 'word' || KEYWORDS.has(target.text.toLowerCase())) {
            throw this._error('Expected a variable path after "exists"', target);
         }

         return { kind: 'exists', path: target.text };
      }

      return this._parseComparison();
   }

   private _parseComparison(): ConditionExpression {
      const left = this._parseOperand(),
            token = this._peek();

      if (token.type === 'op') {
         this._index++;

         const operator = token.text === '==' ? '==' : '!=';

         return { kind: 'compare', operator, left, right: this._parseOperand() };
      }

      if (this._isKeyword('in')) {
         this._index++;
         return { kind: 'in', negated: false, needle: left, haystack: this._parseOperand() };
      }

      if (this._isKeyword('not') && this._isKeyword('in', 1)) {
         this._index += 2;
         return { kind: 'in', negated: true, needle: left, haystack: this._parseOperand() };
      }

      return { kind: 'truthy', operand: left };
   }

   private _parseOperand(): Operand {
      const token = this._next();

      switch (token.type) {
         case 'string':
            return { kind: 'literal', value: token.text };
         case 'number':
            return { kind: 'literal', value: Number(token.text) };
         case 'punct':
            if (token.text === '[') {
               return this._parseList();
            }
            throw this._error(`Unexpected '${token.text}'`, token);
         case 'word': {
            const lower = token.text.toLowerCase();

            if (lower === 'true' || lower === 'false') {
               return { kind: 'literal', value: lower === 'true' };
            }

            if (lower === 'null' || lower === 'none') {
               return { kind: 'literal', value: null };
            }

            if (KEYWORDS.has(lower)) {
               throw this._error(`Unexpected keyword '${token.text}'`, token);
            }

            return { kind: 'path', path: token.text };
         }
         default:
            throw this._error(token.type === 'end' ? 'Unexpected end of condition' : `Unexpected '${token.text}'`, token);
      }
   }

   private _parseList(): Operand {
      const items: Operand[] = [];

      if (this._peek().type === 'punct' && this._peek().text === ']') {
         this._index++;
         return { kind: 'list', items };
      }

      for (;;) {
         items.push(this._parseOperand());

         const token = this._next();

         if (token.type === 'punct' && token.text === ']') {
            return { kind: 'list', items };
         }

         if (token.type !== 'punct' || token.text !== ',') {
            throw this._error('Expected "," or "]" in list', token);
         }
      }
   }

   private _expectPunct(text: string): void {
      const token = this._next();

      if (token.type !== 'punct' || token.text !== text) {
         throw this._error(`Expected '${text}'`, token);
      }
   }

   private _isKeyword(keyword: string, offset = 0): boolean {
      const token = this._tokens[Math.min(this._index + offset, this._tokens.length - 1)];

      return token.type === 'word' && token.text.toLowerCase() === keyword;
   }

   private _peek(): Token {
      return this._tokens[this._index];
   }

   private _next(): Token {
      const token = this._tokens[this._index];

      if (token.type !== 'end') {
         this._index++;
      }

      return token;
   }

   private _error(message: string, token: Token = this._peek()): ConditionSyntaxError {
      return new ConditionSyntaxError(message, this._source, token.position);
   }

}

function _resolve(operand: Operand, context: VariableContext): unknown {
   switch (operand.kind) {
      case 'literal':
         return operand.value;
      case 'list':
         return operand.items.map((item) => {
            return _resolve(item, context);
         });
      case 'path':
         return lookupPath(context, operand.path);
      default:
         return _assertNever(operand);
   }
}

function _textOf(value: unknown): string {
   if (value === undefined || value === null) {
      return 'null';
   }

   if (typeof value === 'object') {
      return JSON.stringify(value);
   }

   return String(value);
}

function _contains(haystack: unknown, needle: unknown): boolean {
   if (Array.isArray(haystack)) {
      const text = _textOf(needle);

      return haystack.some((item) => {
         return _textOf(item) === text;
      });
   }

   if (typeof haystack === 'string' && needle !== undefined && needle !== null) {
      return haystack.includes(String(needle));
   }

   return false;
}

function _isTruthy(value: unknown): boolean {
   if (typeof value === 'string') {
      return value.toLowerCase() === 'true';
   }

   if (Array.isArray(value)) {
      return value.length > 0;
   }

   if (typeof value === 'object' && value !== null) {
      return Object.keys(value).length > 0;
   }

   return Boolean(value);
}

function _assertNever(value: never): never {
   throw new Error(`Unhandled condition node: ${JSON.stringify(value)}`);
}
