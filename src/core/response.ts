import type { ApiClient } from './client.js';

/**
 * Capability of a response value to hold a back-reference to the client that fetched it.
 * Transports set the reference before handing the value to the caller.
 *
 * The reference is for convenience lookups (follow-up requests from a response);
 * the response never owns the client.
 */
export interface SupportsClientResponse<Client extends ApiClient = ApiClient> {
  /** Sets the client this response was fetched through. */
  setClient(client: Client): void;
  /** Client this response was fetched through, `null` until set. */
  getClient(): Client | null;
}

/**
 * Type guard for {@link SupportsClientResponse}.
 */
export function supportsClientResponse(value: unknown): value is SupportsClientResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'setClient' in value &&
    typeof value.setClient === 'function' &&
    'getClient' in value &&
    typeof value.getClient === 'function'
  );
}

/**
 * Base class for response values that want the client back-reference.
 *
 * @example
 * class User extends ClientResponse<UsersApi> {
 *   constructor(readonly id: number) { super(); }
 *   friends() { return this.getClient()?.getFriends(this.id); }
 * }
 */
export abstract class ClientResponse<Client extends ApiClient = ApiClient> implements SupportsClientResponse<Client> {
  #client: Client | null = null;

  public setClient(client: Client): void {
    this.#client = client;
  }

  public getClient(): Client | null {
    return this.#client;
  }
}
