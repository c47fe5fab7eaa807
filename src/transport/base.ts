import type { ApiClient } from '../core/client.js';
import type { ApiRequest } from '../core/request.js';
import { supportsClientResponse } from '../core/response.js';
import { DeserializationError } from '../error/deserializationError.js';
import { HookError } from '../error/hookError.js';
import { TransportError } from '../error/transportError.js';
import { defer } from '../utils/defer.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { decompressIfNeeded } from './decompress.js';
import type { RawResponse, Transport } from './types.js';

/** Options shared by every transport. */
export interface TransportOptions {
  /**
   * Where warnings (unsupported content codings) and debug lines go.
   * @default console
   */
  logger?: Logger;
  /**
   * Log one debug line per request and per response.
   * @default false
   */
  debug?: boolean;
}

/**
 * Shared behavior of transports. Implementations only perform the raw exchange in
 * {@link exchange}; this class computes the URL, converts the body, decompresses and
 * deserializes the response, and runs the client's hooks around it:
 *
 * `onRequest` → exchange → `onResponse` on success, or `onException` on any failure.
 *
 * A hook that throws is not swallowed; the send fails with a {@link HookError}.
 */
export abstract class BaseTransport implements Transport {
  protected readonly logger: Logger;
  protected readonly debug: boolean;
  #closed = false;

  constructor({ logger = defaultLogger, debug = false }: TransportOptions = {}) {
    this.logger = logger;
    this.debug = debug;
  }

  /** Whether {@link close} was called. */
  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Performs the network exchange for an already resolved URL and converted body.
   * Failures are returned, not thrown.
   */
  protected abstract exchange<T>(
    request: ApiRequest<T>,
    url: string,
    body: Uint8Array | null,
  ): SafeWrapAsync<Error, RawResponse>;

  /**
   * Sends a request.
   *
   * URL computation happens right away: a request without a usable URL, or a closed
   * transport, fails before any I/O and without hooks. Everything else runs on a
   * later turn of the event loop; a transport closed in the meantime fails the same way.
   * There is no per-request cancellation.
   */
  public async send<T>(request: ApiRequest<T>): SafeWrapAsync<Error, T | null> {
    const [errUrl, url] = request.computeRequestUrl();
    if (errUrl) {
      return [new Error(`error computing request url in ${request.method} send`, { cause: errUrl }), null];
    }

    if (this.#closed) {
      return [new TransportError('error transport is closed', request.method, url), null];
    }

    await defer();
    if (this.#closed) {
      return [new TransportError('error transport is closed', request.method, url), null];
    }

    return this.#run(request, url);
  }

  /** Marks the transport closed. Subclasses release their resources and call `super.close()`. */
  public close(): void {
    this.#closed = true;
  }

  /**
   * Converts a request body to bytes: `Uint8Array` passes through, `ArrayBuffer` is
   * wrapped, strings are UTF-8 encoded, anything else goes to the request's serializer.
   */
  protected convertBodyToBytes<T>(request: ApiRequest<T>, body: unknown): SafeWrap<Error, Uint8Array> {
    if (body instanceof Uint8Array) {
      return [null, body];
    }

    if (body instanceof ArrayBuffer) {
      return [null, new Uint8Array(body)];
    }

    if (typeof body === 'string') {
      return [null, new TextEncoder().encode(body)];
    }

    const [errThrown, result] = safeWrap(() => request.serializer.serialize(body));
    if (errThrown) {
      return [new Error('error serializer threw in convertBodyToBytes', { cause: errThrown }), null];
    }

    return result;
  }

  /** Decompresses the body if needed, then deserializes it with the request's serializer. */
  protected async convertBytesToResponse<T>(
    request: ApiRequest<T>,
    body: Uint8Array,
    statusCode: number,
    headers: Headers,
  ): SafeWrapAsync<Error, T | null> {
    const [errDecompress, decompressed] = this.decompressIfNeeded(body, headers);
    if (errDecompress) {
      return [errDecompress, null];
    }

    const [errThrown, result] = await safeWrapAsync(() =>
      request.serializer.deserialize(request.responseType, statusCode, headers, decompressed),
    );
    if (errThrown) {
      return [
        new DeserializationError('error serializer threw in convertBytesToResponse', statusCode, { cause: errThrown }),
        null,
      ];
    }

    return result;
  }

  /** See {@link decompressIfNeeded}; warnings go to this transport's logger. */
  protected decompressIfNeeded(data: Uint8Array, headers: Headers): SafeWrap<Error, Uint8Array> {
    return decompressIfNeeded(data, headers, this.logger);
  }

  /** Hands the client to response values that can hold a back-reference to it. */
  protected handleClientSupportedResponse<T>(client: ApiClient, response: T): T {
    if (supportsClientResponse(response)) {
      response.setClient(client);
    }

    return response;
  }

  async #run<T>(request: ApiRequest<T>, url: string): SafeWrapAsync<Error, T | null> {
    const { client, method } = request;

    let body: Uint8Array | null = null;
    if (request.body !== null && request.body !== undefined) {
      const [errBody, converted] = this.convertBodyToBytes(request, request.body);
      if (errBody) {
        return this.#fail(request, new Error(`error converting ${method} request body`, { cause: errBody }));
      }

      body = converted;
    }

    const [errOnRequest] = safeWrap(() => client.onRequest(request));
    if (errOnRequest) {
      return this.#fail(request, new HookError('error in onRequest hook', 'onRequest', { cause: errOnRequest }));
    }

    if (this.debug) {
      this.logger.debug(`${method} ${url}`);
    }

    const [errThrown, exchanged] = await safeWrapAsync(() => this.exchange(request, url, body));
    if (errThrown) {
      return this.#fail(
        request,
        new TransportError(`error exchange threw for ${method} ${url}`, method, url, { cause: errThrown }),
      );
    }

    const [errExchange, raw] = exchanged;
    if (errExchange) {
      return this.#fail(request, errExchange);
    }

    if (this.debug) {
      this.logger.debug(`${method} ${url} responded ${raw.status} with ${raw.body.length} bytes`);
    }

    const [errConvert, response] = await this.convertBytesToResponse(request, raw.body, raw.status, raw.headers);
    if (errConvert) {
      return this.#fail(request, new Error(`error converting ${method} response`, { cause: errConvert }));
    }

    const [errOnResponse] = safeWrap(() => client.onResponse(request, response));
    if (errOnResponse) {
      return this.#fail(request, new HookError('error in onResponse hook', 'onResponse', { cause: errOnResponse }));
    }

    return [null, this.handleClientSupportedResponse(client, response)];
  }

  #fail<T>(request: ApiRequest<T>, error: Error): SafeWrap<Error, T | null> {
    const [errOnException] = safeWrap(() => request.client.onException(request, error));
    if (errOnException) {
      return [
        new HookError(`error in onException hook while handling: ${error.message}`, 'onException', {
          cause: errOnException,
        }),
        null,
      ];
    }

    return [error, null];
  }
}
