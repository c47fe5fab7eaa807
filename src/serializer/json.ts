import type { ResponseType } from '../core/responseType.js';
import { DeserializationError } from '../error/deserializationError.js';
import { UnsupportedOperationError } from '../error/unsupportedOperationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { Serializer } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Options for {@link JsonSerializer}. */
export interface JsonSerializerOptions {
  /**
   * Media types accepted in a response's `Content-Type`. Parameters such as
   * `charset` are ignored; a response without `Content-Type` is always accepted.
   * @default ['application/json']
   */
  acceptedContentTypes?: string[];
}

/**
 * JSON serializer. Structured bodies go through `JSON.stringify`, string bodies are
 * sent as-is. Responses are parsed when requested as {@link ResponseType.json}.
 */
export class JsonSerializer implements Serializer {
  #acceptedContentTypes: Set<string>;

  constructor({ acceptedContentTypes = ['application/json'] }: JsonSerializerOptions = {}) {
    this.#acceptedContentTypes = new Set(acceptedContentTypes.map((type) => type.toLowerCase()));
  }

  get acceptedContentTypes(): string[] {
    return [...this.#acceptedContentTypes];
  }

  public serialize(value: unknown): SafeWrap<Error, Uint8Array> {
    if (value === null || value === undefined) {
      return [null, new Uint8Array()];
    }

    if (typeof value === 'string') {
      return [null, encoder.encode(value)];
    }

    // JSON.stringify throws on bigint + cycles, and yields undefined for functions/symbols
    const [errStringify, json] = safeWrap((): string | undefined => JSON.stringify(value));
    if (errStringify || json === undefined) {
      return [
        new UnsupportedOperationError(`error JsonSerializer cannot serialize ${typeof value}`, {
          cause: errStringify ?? undefined,
        }),
        null,
      ];
    }

    return [null, encoder.encode(json)];
  }

  public async deserialize<T>(
    responseType: ResponseType<T>,
    statusCode: number,
    headers: Headers,
    body: Uint8Array,
  ): SafeWrapAsync<Error, T | null> {
    if (body.length === 0) {
      return [null, null];
    }

    const contentType = headers.get('Content-Type');
    const mediaType = contentType?.split(';')[0]?.trim().toLowerCase();
    if (mediaType && !this.#acceptedContentTypes.has(mediaType)) {
      return [new DeserializationError(`error unsupported content type ${contentType}`, statusCode), null];
    }

    if (responseType.kind !== 'json') {
      return [
        new DeserializationError(`error JsonSerializer cannot deserialize to ${responseType.kind}`, statusCode),
        null,
      ];
    }

    const text = decoder.decode(body);
    const [errParse, parsed] = safeWrap((): unknown => JSON.parse(text));
    if (errParse) {
      return [
        new DeserializationError(`error parsing json response body: ${text}`, statusCode, { cause: errParse }),
        null,
      ];
    }

    return responseType.parse(parsed, statusCode);
  }
}
