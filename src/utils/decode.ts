import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError } from '../error/decodeError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Parses a response body as JSON and validates it against a StandardSchemaV1 schema.
 *
 * Behavior:
 * - A body that is not JSON (including an empty body) yields a `DecodeError` without issues,
 *   with the `SyntaxError` as `cause`.
 * - The schema's `validate` may be sync or async; if it throws or rejects, the thrown value
 *   becomes the `cause` of a `DecodeError`.
 * - A result carrying `issues` yields a `DecodeError` listing them.
 * - Otherwise the schema's output value is returned.
 */
export async function decode<Schema extends StandardSchemaV1>(
  body: string,
  schema: Schema,
): SafeWrapAsync<DecodeError, StandardSchemaV1.InferOutput<Schema>> {
  type DecodeResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<Schema>>;

  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(body));
  if (errJson) {
    return [new DecodeError('error parsing response body as JSON', [], { cause: errJson }), null];
  }

  const [errValidate, pending] = safeWrap<Error, DecodeResult | Promise<DecodeResult>>(() =>
    schema['~standard'].validate(json),
  );
  if (errValidate) {
    return [new DecodeError('error validating response body', [], { cause: errValidate }), null];
  }

  const [errAsync, result] = await safeWrapAsync<Error, DecodeResult>(() => Promise.resolve(pending));
  if (errAsync) {
    return [new DecodeError('error validating response body asynchronously', [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new DecodeError('error decoding response body', result.issues), null];
  }

  return [null, result.value];
}
