import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a response body cannot be turned into the requested response type:
 * the type is not one the serializer produces, the content type is not accepted,
 * or the payload is malformed.
 */
export class DeserializationError extends Error {
  /** DeserializationError error-name */
  name = 'DeserializationError';
  /** HTTP status of the response being deserialized */
  #statusCode: number;

  /** Creates a new instance of a DeserializationError for a response with the given status */
  constructor(message: string, statusCode: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#statusCode = statusCode;
  }

  /** HTTP status of the response being deserialized */
  get statusCode(): number {
    return this.#statusCode;
  }
}

/**
 * Extract a {@link DeserializationError} from an unknown error value, following nested causes.
 */
export function getDeserializationError(error: unknown): null | DeserializationError {
  return unwrapErrorType(DeserializationError, error);
}

/**
 * Type guard for {@link DeserializationError}.
 */
export function isDeserializationError(error: unknown): error is DeserializationError {
  return isErrorType(DeserializationError, error);
}
