/**
 * Error types raised by the engine.
 *
 * Template file problems are never raised: the store logs them and treats the
 * template as empty. Validation never raises either; it returns `false`.
 */

/**
 * Base class for every error raised by pkgmeta.
 */
export class PkgmetaError extends Error {

   public override readonly name: string = 'PkgmetaError';

   public constructor(message: string) {
      super(message);
   }

}

/**
 * Raised when a non-mapping value is passed to a merge entry point.
 *
 * Extends `TypeError` since it signals a programming error by the caller.
 */
export class MergeInputError extends TypeError {

   public override readonly name = 'MergeInputError';

   public constructor(
      public readonly argument: 'defaults' | 'overrides',
      public readonly receivedType: string
   ) {
      super(`${argument} must be a mapping, got ${receivedType}`);
   }

}

/**
 * Raised when a template condition does not follow the condition grammar.
 */
export class ConditionSyntaxError extends PkgmetaError {

   public override readonly name = 'ConditionSyntaxError';

   public constructor(
      message: string,
      public readonly source: string,
      public readonly position: number
   ) {
      super(`${message} at position ${position} in "${source}"`);
   }

}

/**
 * Raised when engine options fail validation.
 */
export class ConfigurationError extends PkgmetaError {

   public override readonly name = 'ConfigurationError';

   public constructor(message: string, public readonly issues: string[] = []) {
      super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
   }

}

/**
 * Describe the runtime type of a value for error messages.
 */
export function describeType(value: unknown): string {
   if (value === null) {
      return 'null';
   }

   if (Array.isArray(value)) {
      return 'array';
   }

   return typeof value;
}
