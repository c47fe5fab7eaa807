import { RequestHeader } from '../core/params.js';
import type { ApiRequest } from '../core/request.js';
import { AbortError } from '../error/abortError.js';
import { TransportError } from '../error/transportError.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { BaseTransport, type TransportOptions } from './base.js';
import type { RawResponse } from './types.js';

/** Content codings `fetch` decodes on its own. */
const FETCH_DECODED_ENCODINGS = new Set(['gzip', 'x-gzip', 'deflate', 'br']);

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions extends TransportOptions {
  /**
   * `fetch` implementation to use.
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;
  /**
   * Time in milliseconds an exchange (response + body) may take, `false` for no limit.
   * @default false
   */
  timeout?: number | false;
}

/**
 * Transport on top of the WHATWG `fetch` API shipped with Node.js.
 *
 * - Headers with the same key are folded into one comma-separated value; empty values are skipped.
 * - Non-2xx responses are not errors, their status reaches the serializer.
 * - `fetch` already decodes `gzip`, `deflate` and `br` bodies it announces, so those
 *   are handed on as `Content-Encoding: identity` and never inflated twice; payloads
 *   compressed without a `Content-Encoding` header are still sniffed and inflated.
 * - {@link close} aborts exchanges still in flight.
 */
export class FetchTransport extends BaseTransport {
  #fetch: typeof fetch;
  #timeout: number | false;
  #inFlight = new Set<AbortController>();

  /** Creates a new fetch transport, with an optional custom `fetch` + timeout */
  constructor({ fetch: fetchImpl = globalThis.fetch, timeout = false, ...opts }: FetchTransportOptions = {}) {
    super(opts);
    this.#fetch = fetchImpl;
    this.#timeout = timeout;
  }

  /** Closes the transport, aborting in-flight exchanges with an {@link AbortError}. Idempotent. */
  public override close(): void {
    super.close();

    for (const controller of this.#inFlight) {
      controller.abort(new AbortError('error transport was closed'));
    }
    this.#inFlight.clear();
  }

  protected async exchange<T>(
    request: ApiRequest<T>,
    url: string,
    body: Uint8Array | null,
  ): SafeWrapAsync<Error, RawResponse> {
    const controller = new AbortController();
    const settled = new AbortController();
    this.#inFlight.add(controller);

    try {
      const signal = mergeSignals([controller.signal, createTimeoutSignal(this.#timeout, settled.signal)]);
      return await this.#fetchResponse(request.method, url, request.headers ?? [], body, signal);
    } finally {
      settled.abort();
      this.#inFlight.delete(controller);
    }
  }

  async #fetchResponse(
    method: string,
    url: string,
    requestHeaders: readonly RequestHeader[],
    body: Uint8Array | null,
    signal: AbortSignal | null,
  ): SafeWrapAsync<Error, RawResponse> {
    const [errHeaders, headers] = safeWrap(() => createHeaders(requestHeaders));
    if (errHeaders) {
      return [
        new TransportError(`error setting headers of ${method} ${url}`, method, url, { cause: errHeaders }),
        null,
      ];
    }

    const [errFetch, response] = await safeWrapAsync(() =>
      this.#fetch(url, {
        method,
        headers,
        body,
        ...(signal && { signal }),
      }),
    );
    if (errFetch) {
      return [new TransportError(`error in ${method} request to ${url}`, method, url, { cause: errFetch }), null];
    }

    const [errBody, buffer] = await safeWrapAsync(() => response.arrayBuffer());
    if (errBody) {
      return [
        new TransportError(`error reading ${method} response body from ${url}`, method, url, { cause: errBody }),
        null,
      ];
    }

    return [
      null,
      { status: response.status, headers: withDecodedEncodings(response.headers), body: new Uint8Array(buffer) },
    ];
  }
}

/** Folds request headers into a `Headers` instance, skipping empty values. */
function createHeaders(requestHeaders: readonly RequestHeader[]): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(RequestHeader.toRecord(requestHeaders))) {
    if (value) {
      headers.set(key, value);
    }
  }

  return headers;
}

/**
 * Marks the body as `identity` when `fetch` decoded every listed coding, so it is not sniffed again.
 * Bodies with a coding `fetch` does not know are left encoded, and so is the header.
 */
function withDecodedEncodings(headers: Headers): Headers {
  const codings = headers
    .get('Content-Encoding')
    ?.split(',')
    .map((coding) => coding.trim().toLowerCase())
    .filter((coding) => coding && coding !== 'identity');

  if (!codings?.length || !codings.every((coding) => FETCH_DECODED_ENCODINGS.has(coding))) {
    return headers;
  }

  const decoded = new Headers(headers);
  decoded.set('Content-Encoding', 'identity');
  return decoded;
}
