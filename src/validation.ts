/**
 * Validation utilities using TypeBox.
 */

import type { TSchema } from 'typebox';
import { Compile } from 'typebox/compile';

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Validate and throw on error */
  validate: (value: unknown) => T;
}

/**
 * Validation error structure from TypeBox (subset used for messages).
 */
interface LocalizedValidationError {
  instancePath: string;
  message: string;
}

/**
 * Thrown by `validate` with every violation joined into the message.
 */
export class SchemaMismatchError extends Error {
  constructor(message: string) {
    super(`Validation failed! ${message}`);
    this.name = 'SchemaMismatchError';
  }
}

function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a TypeBox (or plain JSON) schema into a validator.
 *
 * @example
 * ```typescript
 * const Tick = Type.Object({ price: Type.Number() });
 * const validator = compileSchema<Static<typeof Tick>>(Tick);
 * validator.validate(JSON.parse(text)).price;
 * ```
 */
export function compileSchema<T>(schema: TSchema): CompiledValidator<T> {
  const compiled = Compile(schema);

  const check = (value: unknown): value is T => compiled.Check(value);

  return {
    check,
    validate: (value: unknown): T => {
      if (!check(value)) {
        throw new SchemaMismatchError(formatErrors(compiled.Errors(value)));
      }
      return value;
    },
  };
}
