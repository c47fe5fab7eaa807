/**
 * Error entrypoint: typed errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
export { DecompressionError, getDecompressionError, isDecompressionError } from './decompressionError.js';
export { DeserializationError, getDeserializationError, isDeserializationError } from './deserializationError.js';
export { getHookError, HookError, type HookName, isHookError } from './hookError.js';
export { isErrorType } from './isErrorType.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { getTransportError, isTransportError, TransportError } from './transportError.js';
export {
  getUnsupportedOperationError,
  isUnsupportedOperationError,
  UnsupportedOperationError,
} from './unsupportedOperationError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
