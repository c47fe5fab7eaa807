import { ConstructURLError } from '../error/constructUrlError.js';
import type { Serializer } from '../serializer/types.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { ApiClient } from './client.js';
import { PathParameter, RequestHeader, RequestQuery } from './params.js';
import type { ResponseType } from './responseType.js';

/**
 * A single API call under construction. Every `with*` method mutates the request
 * and returns it, so calls chain:
 *
 * @example
 * const [err, user] = await client
 *   .createRequest('GET', '/users/{id}', ResponseType.json(User))
 *   .withPathParameter('id', '42')
 *   .withRequestQuery('active', 'true')
 *   .send();
 *
 * Requests are single-use and unsynchronized; do not mutate one after calling {@link send}.
 *
 * @typeParam T - Response value the request resolves with.
 */
export class ApiRequest<T> {
  #client: ApiClient;
  #method: string;
  #endpoint: string;
  #responseType: ResponseType<T>;
  #url: string | null;
  #headers: RequestHeader[] | null = null;
  #pathParameters: Map<string, PathParameter> | null = null;
  #requestQueries: Map<string, RequestQuery> | null = null;
  #body: unknown = null;
  #serializerOverride: Serializer | null = null;

  /**
   * @param client - Client whose transport sends the request.
   * @param method - HTTP method, e.g. `GET`.
   * @param url - Base URL; `null` falls back to the client's base URL.
   * @param endpoint - Endpoint template appended to the base URL, may contain `{key}` placeholders.
   * @param responseType - What the response body is turned into.
   */
  constructor(client: ApiClient, method: string, url: string | null, endpoint: string, responseType: ResponseType<T>) {
    this.#client = client;
    this.#method = method;
    this.#url = url;
    this.#endpoint = endpoint;
    this.#responseType = responseType;
  }

  get client(): ApiClient {
    return this.#client;
  }

  get method(): string {
    return this.#method;
  }

  get endpoint(): string {
    return this.#endpoint;
  }

  get responseType(): ResponseType<T> {
    return this.#responseType;
  }

  /** Base URL of this request, `null` when the client's is used. */
  get url(): string | null {
    return this.#url;
  }

  get headers(): readonly RequestHeader[] | null {
    return this.#headers;
  }

  get pathParameters(): readonly PathParameter[] | null {
    return this.#pathParameters && [...this.#pathParameters.values()];
  }

  get requestQueries(): readonly RequestQuery[] | null {
    return this.#requestQueries && [...this.#requestQueries.values()];
  }

  get body(): unknown {
    return this.#body;
  }

  get serializerOverride(): Serializer | null {
    return this.#serializerOverride;
  }

  /** Serializer in effect: the override when set, otherwise the client's. */
  get serializer(): Serializer {
    return this.#serializerOverride ?? this.#client.serializer;
  }

  /** Sets the base URL. `null` falls back to the client's base URL. */
  public withUrl(url: string | null): this {
    this.#url = url;
    return this;
  }

  /** Uses `serializer` instead of the client's for this request's body and response. */
  public withSerializerOverride(serializer: Serializer | null): this {
    this.#serializerOverride = serializer;
    return this;
  }

  /** Replaces all headers. The list is copied. */
  public withExplicitHeaders(headers: Iterable<RequestHeader> | null): this {
    this.#headers = headers && [...headers];
    return this;
  }

  /** Replaces all path parameters. */
  public withExplicitPathParameters(pathParameters: Iterable<PathParameter> | null): this {
    this.#pathParameters = null;
    if (pathParameters) {
      this.withPathParameters(...pathParameters);
    }

    return this;
  }

  /** Replaces all query parameters. */
  public withExplicitRequestQueries(requestQueries: Iterable<RequestQuery> | null): this {
    this.#requestQueries = null;
    if (requestQueries) {
      this.withRequestQueries(...requestQueries);
    }

    return this;
  }

  /** Appends a header. Existing headers with the same key are kept. */
  public withHeader(header: RequestHeader): this;
  public withHeader(key: string, value: string): this;
  public withHeader(headerOrKey: RequestHeader | string, value = ''): this {
    const header = typeof headerOrKey === 'string' ? new RequestHeader(headerOrKey, value) : headerOrKey;
    return this.withHeaders(header);
  }

  /** Appends headers. */
  public withHeaders(...headers: RequestHeader[]): this {
    this.#headers ??= [];
    this.#headers.push(...headers);
    return this;
  }

  /** Adds a path parameter, replacing one with the same key. */
  public withPathParameter(pathParameter: PathParameter): this;
  public withPathParameter(key: string, value: string): this;
  public withPathParameter(parameterOrKey: PathParameter | string, value = ''): this {
    const parameter = typeof parameterOrKey === 'string' ? new PathParameter(parameterOrKey, value) : parameterOrKey;
    return this.withPathParameters(parameter);
  }

  /** Adds path parameters, replacing those with the same key. */
  public withPathParameters(...pathParameters: PathParameter[]): this {
    this.#pathParameters ??= new Map();
    for (const parameter of pathParameters) {
      this.#pathParameters.set(parameter.key, parameter);
    }

    return this;
  }

  /** Adds a query parameter. An identical key + value pair is only kept once. */
  public withRequestQuery(requestQuery: RequestQuery): this;
  public withRequestQuery(key: string, value: string): this;
  public withRequestQuery(queryOrKey: RequestQuery | string, value = ''): this {
    const query = typeof queryOrKey === 'string' ? new RequestQuery(queryOrKey, value) : queryOrKey;
    return this.withRequestQueries(query);
  }

  /** Adds query parameters. Identical key + value pairs are only kept once. */
  public withRequestQueries(...requestQueries: RequestQuery[]): this {
    this.#requestQueries ??= new Map();
    for (const query of requestQueries) {
      if (!this.#requestQueries.has(query.identity)) {
        this.#requestQueries.set(query.identity, query);
      }
    }

    return this;
  }

  /**
   * Sets the body. `Uint8Array`/`ArrayBuffer` bodies are sent as-is, strings as UTF-8,
   * anything else through the serializer. `null` sends no body.
   */
  public withBody(body: unknown): this {
    this.#body = body;
    return this;
  }

  /**
   * Computes the absolute request URL. Pure; repeated calls give the same URL.
   *
   * 1. Every `{key}` placeholder is replaced with its path parameter value, unescaped.
   * 2. Query parameters are percent-encoded one by one and appended as `?k=v&k2=v2`.
   * 3. With a base URL on the request, the result is `url + endpoint`.
   *    Otherwise the client's base URL is used and the whole endpoint, query included,
   *    is percent-encoded as one unit: `apiUrl + encodeURIComponent(endpoint)`.
   *
   * Paths are concatenated literally, slashes are not normalized. Path parameter keys
   * that overlap textually are substituted in insertion order.
   *
   * @returns `[ConstructURLError, null]` when neither the request nor the client has a base URL.
   */
  public computeRequestUrl(): SafeWrap<Error, string> {
    const [errEndpoint, endpoint] = safeWrap(() => this.#constructEndpoint());
    if (errEndpoint) {
      return [new ConstructURLError('error encoding endpoint', this.#endpoint, { cause: errEndpoint }), null];
    }

    if (this.#url !== null) {
      return [null, `${this.#url}${endpoint}`];
    }

    const apiUrl = this.#client.apiUrl;
    if (apiUrl === null) {
      return [new ConstructURLError('error no base url available on request or client', this.#endpoint), null];
    }

    const [errEncode, encoded] = safeWrap(() => encodeURIComponent(endpoint));
    if (errEncode) {
      return [new ConstructURLError('error encoding endpoint', this.#endpoint, { cause: errEncode }), null];
    }

    return [null, `${apiUrl}${encoded}`];
  }

  /** Sends the request through the client's transport. */
  public send(): SafeWrapAsync<Error, T | null> {
    return this.#client.transport.send(this);
  }

  #constructEndpoint(): string {
    let endpoint = this.#endpoint;
    for (const parameter of this.#pathParameters?.values() ?? []) {
      endpoint = endpoint.replaceAll(parameter.placeholder, () => parameter.value);
    }

    if (!this.#requestQueries?.size) {
      return endpoint;
    }

    const query = [...this.#requestQueries.values()]
      .map(({ key, value }) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
      .join('&');

    return `${endpoint}?${query}`;
  }
}
