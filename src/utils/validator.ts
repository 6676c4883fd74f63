import type { StandardSchemaV1 } from '@standard-schema/spec';
import { SchemaValidationError } from '../error/schemaValidationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Validation is synchronous: it runs inside constructors and response parsing.
 * Schemas that validate asynchronously are rejected with a {@link SchemaValidationError}.
 */
export function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrap<SchemaValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new SchemaValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new SchemaValidationError('error async schemas are not supported', []), null];
  }

  if (result.issues) {
    return [new SchemaValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
