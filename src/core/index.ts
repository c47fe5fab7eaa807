/**
 * Core entrypoint: the client, requests, response types, transports and serializers.
 * Import from here if you only need those without the error helpers.
 * @module
 */

export { ApiClient, type ApiClientConfig, type ApiClientOptions } from './client.js';
export { CompletedRequest } from './completedRequest.js';
export { PathParameter, RequestHeader, RequestQuery } from './params.js';
export { ApiRequest } from './request.js';
export { ClientResponse, type SupportsClientResponse, supportsClientResponse } from './response.js';
export { type ResponseKind, type ResponseParser, ResponseType } from './responseType.js';
export { ByteSerializer } from '../serializer/bytes.js';
export { JsonSerializer, type JsonSerializerOptions } from '../serializer/json.js';
export { StringSerializer } from '../serializer/string.js';
export type { Serializer } from '../serializer/types.js';
export { BaseTransport, type TransportOptions } from '../transport/base.js';
export { decompressIfNeeded, type SniffedEncoding, sniffEncoding } from '../transport/decompress.js';
export { FetchTransport, type FetchTransportOptions } from '../transport/fetch.js';
export type { RawResponse, Transport } from '../transport/types.js';
