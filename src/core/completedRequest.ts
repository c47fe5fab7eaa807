import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { ApiClient } from './client.js';
import { ApiRequest } from './request.js';
import { ResponseType } from './responseType.js';

/**
 * Request that is already answered. Useful for handing out cached responses through
 * the same API as live ones: {@link send} resolves with the stored value without
 * touching the transport or the client's hooks.
 *
 * It has no method, endpoint or base URL, so {@link computeRequestUrl} always fails.
 */
export class CompletedRequest<T> extends ApiRequest<T> {
  #response: T;

  constructor(client: ApiClient, response: T) {
    super(client, '', null, '', ResponseType.value(response));
    this.#response = response;
  }

  /** The stored value this request resolves with. */
  get response(): T {
    return this.#response;
  }

  public override computeRequestUrl(): SafeWrap<Error, string> {
    return [new ConstructURLError('error completed requests have no request url', this.endpoint), null];
  }

  public override send(): SafeWrapAsync<Error, T | null> {
    return Promise.resolve([null, this.#response]);
  }
}
