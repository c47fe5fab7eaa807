import { JsonSerializer } from '../serializer/json.js';
import type { Serializer } from '../serializer/types.js';
import { FetchTransport } from '../transport/fetch.js';
import type { Transport } from '../transport/types.js';
import { CompletedRequest } from './completedRequest.js';
import type { RequestHeader } from './params.js';
import { ApiRequest } from './request.js';
import type { ResponseType } from './responseType.js';

/** Configuration for constructing an {@link ApiClient}, extends {@link ApiClientConfig}. */
export interface ApiClientOptions extends ApiClientConfig {
  /**
   * Transport performing the exchanges. Owned by the client and closed with it.
   * @default new FetchTransport()
   */
  transport?: Transport;
  /**
   * Serializer for request and response bodies, unless a request overrides it.
   * @default new JsonSerializer()
   */
  serializer?: Serializer;
}

/** Runtime configuration accepted by {@link ApiClient.config}. */
export interface ApiClientConfig {
  /** Base URL endpoints are appended to, e.g. `https://api.example.com`. */
  apiUrl?: string | null;
  /** Headers every request starts out with, e.g. `User-Agent` or `Authorization`. */
  headers?: Iterable<RequestHeader>;
}

/**
 * Base class for API wrappers. Extend it, and expose one method per API call built
 * with {@link createRequest}:
 *
 * @example
 * class UsersApi extends ApiClient {
 *   getUser(id: number) {
 *     return this.createRequest('GET', '/users/{id}', ResponseType.json(User)).withPathParameter('id', String(id));
 *   }
 * }
 *
 * Override {@link onRequest}, {@link onResponse} and {@link onException} to observe
 * every exchange. Hooks run inside the send; a hook that throws fails it.
 */
export class ApiClient {
  #transport: Transport;
  #serializer: Serializer;
  #apiUrl: string | null;
  #defaultRequestHeaders: readonly RequestHeader[];

  /**
   * Creates a client that owns `transport` and uses `serializer` by default.
   *
   * @param opts - Transport, serializer, base URL and default headers.
   */
  constructor({
    transport = new FetchTransport(),
    serializer = new JsonSerializer(),
    apiUrl = null,
    headers = [],
  }: ApiClientOptions = {}) {
    this.#transport = transport;
    this.#serializer = serializer;
    this.#apiUrl = apiUrl;
    this.#defaultRequestHeaders = Object.freeze([...headers]);
  }

  get transport(): Transport {
    return this.#transport;
  }

  get serializer(): Serializer {
    return this.#serializer;
  }

  /** Base URL of requests created by this client, `null` when unset. */
  get apiUrl(): string | null {
    return this.#apiUrl;
  }

  /** Headers every new request starts out with. Frozen; replace them through {@link config}. */
  get defaultRequestHeaders(): readonly RequestHeader[] {
    return this.#defaultRequestHeaders;
  }

  /**
   * Updates the base URL and default headers. Requests created earlier keep what they
   * were created with.
   */
  public config(opts: ApiClientConfig): void {
    if (opts.apiUrl !== undefined) {
      this.#apiUrl = opts.apiUrl;
    }

    if (opts.headers) {
      this.#defaultRequestHeaders = Object.freeze([...opts.headers]);
    }
  }

  /**
   * Creates a request against {@link apiUrl}, starting out with a copy of the default headers.
   *
   * @param method - HTTP method, e.g. `GET`.
   * @param endpoint - Endpoint template, may contain `{key}` placeholders.
   * @param responseType - What the response body is turned into.
   */
  public createRequest<T>(method: string, endpoint: string, responseType: ResponseType<T>): ApiRequest<T> {
    return new ApiRequest(this, method, this.apiUrl, endpoint, responseType).withExplicitHeaders(
      this.#defaultRequestHeaders,
    );
  }

  /**
   * Creates a request that resolves with `response` without any exchange, e.g. to serve
   * cached values through the same API as live ones.
   */
  public createCompletedRequest<T>(response: T): CompletedRequest<T> {
    return new CompletedRequest(this, response);
  }

  /** Closes the transport. No request may be sent afterwards. */
  public close(): void {
    this.#transport.close();
  }

  /** Invoked right before a request is transmitted. */
  public onRequest<T>(_request: ApiRequest<T>): void {}

  /** Invoked with the deserialized response of a successful exchange. */
  public onResponse<T>(_request: ApiRequest<T>, _response: T | null): void {}

  /** Invoked when an exchange fails, with the error the send resolves with. */
  public onException<T>(_request: ApiRequest<T>, _error: Error): void {}
}
