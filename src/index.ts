/**
 * Root entrypoint: re-exports the client, requests, transports, serializers and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';
export type { Logger } from './utils/logger.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
