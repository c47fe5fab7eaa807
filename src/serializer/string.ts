import type { ResponseType } from '../core/responseType.js';
import { DeserializationError } from '../error/deserializationError.js';
import { UnsupportedOperationError } from '../error/unsupportedOperationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { Serializer } from './types.js';

const encoder = new TextEncoder();

/**
 * Serializer for plain text. Bodies must be strings; responses must be requested
 * as {@link ResponseType.string}.
 */
export class StringSerializer implements Serializer {
  /** Charset responses are decoded with. */
  #charset: string;

  /**
   * @param charset - Any label `TextDecoder` understands, e.g. `utf-8` or `latin1`.
   */
  constructor(charset = 'utf-8') {
    this.#charset = charset;
  }

  get charset(): string {
    return this.#charset;
  }

  public serialize(value: unknown): SafeWrap<Error, Uint8Array> {
    if (value === null || value === undefined) {
      return [null, new Uint8Array()];
    }

    if (typeof value !== 'string') {
      return [
        new UnsupportedOperationError(`error StringSerializer only serializes strings, got ${typeof value}`),
        null,
      ];
    }

    return [null, encoder.encode(value)];
  }

  public async deserialize<T>(
    responseType: ResponseType<T>,
    statusCode: number,
    _headers: Headers,
    body: Uint8Array,
  ): SafeWrapAsync<Error, T | null> {
    if (responseType.kind !== 'string') {
      return [
        new DeserializationError(`error StringSerializer cannot deserialize to ${responseType.kind}`, statusCode),
        null,
      ];
    }

    const [errDecode, text] = safeWrap(() => new TextDecoder(this.#charset).decode(body));
    if (errDecode) {
      return [
        new DeserializationError(`error decoding ${this.#charset} response body`, statusCode, { cause: errDecode }),
        null,
      ];
    }

    return responseType.parse(text, statusCode);
  }
}
