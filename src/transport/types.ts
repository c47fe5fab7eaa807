import type { ApiRequest } from '../core/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Contract for the component performing the network exchange of a request. */
export interface Transport {
  /**
   * Sends the request and resolves with the deserialized response value.
   * Never rejects; every failure comes back as `[error, null]`.
   */
  send<T>(request: ApiRequest<T>): SafeWrapAsync<Error, T | null>;
  /** Releases held resources. Idempotent; no request may be sent afterwards. */
  close(): void;
}

/** Undecoded response as a transport received it. */
export interface RawResponse {
  status: number;
  headers: Headers;
  body: Uint8Array;
}
