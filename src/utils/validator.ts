import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates a value against a Standard Schema (zod, valibot, arktype, ...) and
 * returns the schema's output as a tuple-style `[error, value]` result.
 *
 * Sync and async schemas are both supported. Thrown errors and reported issues
 * come back as a {@link ValidationError}.
 */
export async function validator<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<Error, Output> {
  const [errStart, pending] = safeWrap(() => schema['~standard'].validate(input));
  if (errStart) {
    return [new ValidationError('error validating on validation start', [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
