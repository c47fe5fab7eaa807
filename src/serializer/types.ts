import type { ResponseType } from '../core/responseType.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/**
 * Converts request bodies to bytes and response bodies back into values.
 * A client has one default serializer; requests may override it.
 */
export interface Serializer {
  /**
   * Turns a request body into bytes.
   * Fails with `UnsupportedOperationError` when the value cannot be represented.
   */
  serialize(value: unknown): SafeWrap<Error, Uint8Array>;
  /**
   * Turns a (decompressed) response body into the requested response type.
   * Fails with `DeserializationError` when the response type or content type is not
   * supported, or the payload is malformed. Resolves `null` when there is no value.
   */
  deserialize<T>(
    responseType: ResponseType<T>,
    statusCode: number,
    headers: Headers,
    body: Uint8Array,
  ): SafeWrapAsync<Error, T | null>;
}
