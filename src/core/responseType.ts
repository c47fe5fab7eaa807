import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DeserializationError } from '../error/deserializationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * What a serializer produces for a response type:
 * - `string`: decoded text.
 * - `bytes`: the raw body.
 * - `json`: a parsed JSON value.
 * - `value`: a fixed in-memory value, never deserialized (completed requests).
 */
export type ResponseKind = 'string' | 'bytes' | 'json' | 'value';

/** Narrows what a serializer produced into the response value. */
export type ResponseParser<T> = (value: unknown, statusCode: number) => SafeWrapAsync<Error, T>;

/**
 * Response type token of a request. Tells the serializer what to produce and
 * narrows the produced value into `T`.
 *
 * @example
 * ResponseType.string;
 * ResponseType.bytes;
 * ResponseType.json(z.object({ id: z.number() }));
 */
export class ResponseType<T> {
  /** Kind of value the serializer has to produce. */
  readonly kind: ResponseKind;
  #parse: ResponseParser<T>;

  /** Creates a response type of the given kind with its narrowing step */
  constructor(kind: ResponseKind, parse: ResponseParser<T>) {
    this.kind = kind;
    this.#parse = parse;
  }

  /** Decoded text. */
  static readonly string = new ResponseType<string>('string', async (value, statusCode) => {
    if (typeof value !== 'string') {
      return [new DeserializationError(`error expected string response, got ${typeof value}`, statusCode), null];
    }

    return [null, value];
  });

  /** Raw body bytes. */
  static readonly bytes = new ResponseType<Uint8Array>('bytes', async (value, statusCode) => {
    if (!(value instanceof Uint8Array)) {
      return [new DeserializationError('error expected byte response', statusCode), null];
    }

    return [null, value];
  });

  /**
   * Parsed JSON. With a Standard Schema the parsed value is validated and typed
   * as the schema's output; schema transforms run as part of it.
   */
  static json(): ResponseType<unknown>;
  static json<Schema extends StandardSchemaV1>(schema: Schema): ResponseType<StandardSchemaV1.InferOutput<Schema>>;
  static json(schema?: StandardSchemaV1): ResponseType<unknown> {
    if (!schema) {
      return new ResponseType<unknown>('json', async (value) => [null, value]);
    }

    return new ResponseType<unknown>('json', async (value) => {
      const [errValidate, validated] = await validator(value, schema);
      if (errValidate) {
        return [new Error('error validating json response', { cause: errValidate }), null];
      }

      return [null, validated];
    });
  }

  /** Fixed value, used by completed requests. */
  static value<T>(value: T): ResponseType<T> {
    return new ResponseType<T>('value', async () => [null, value]);
  }

  /** Narrows a serializer-produced value into the response value */
  public parse(value: unknown, statusCode: number): SafeWrapAsync<Error, T> {
    return this.#parse(value, statusCode);
  }
}
