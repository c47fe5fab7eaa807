import type { ResponseType } from '../core/responseType.js';
import { DeserializationError } from '../error/deserializationError.js';
import { UnsupportedOperationError } from '../error/unsupportedOperationError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { Serializer } from './types.js';

/**
 * Hands response bodies back untouched, as {@link ResponseType.bytes}.
 * Does not serialize; send `Uint8Array` bodies instead, transports pass those through.
 */
export class ByteSerializer implements Serializer {
  public serialize(_value: unknown): SafeWrap<Error, Uint8Array> {
    return [new UnsupportedOperationError('error ByteSerializer does not support serialization'), null];
  }

  public async deserialize<T>(
    responseType: ResponseType<T>,
    statusCode: number,
    _headers: Headers,
    body: Uint8Array,
  ): SafeWrapAsync<Error, T | null> {
    if (responseType.kind !== 'bytes') {
      return [
        new DeserializationError(`error ByteSerializer cannot deserialize to ${responseType.kind}`, statusCode),
        null,
      ];
    }

    return responseType.parse(body, statusCode);
  }
}
