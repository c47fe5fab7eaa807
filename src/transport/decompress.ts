import { gunzipSync, inflateSync } from 'node:zlib';
import { DecompressionError } from '../error/decompressionError.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Content codings recognized from a payload's leading bytes. */
export type SniffedEncoding = 'gzip' | 'deflate';

/**
 * Guesses the compression of a payload from its first two bytes.
 *
 * - `1f 8b` is the gzip magic number.
 * - A zlib header (RFC 1950) has compression method 8 in the low nibble of the
 *   first byte, and both bytes read as a big-endian number are a multiple of 31.
 *
 * @returns The sniffed coding, or `null` for anything else (including payloads under two bytes).
 */
export function sniffEncoding(data: Uint8Array): SniffedEncoding | null {
  if (data.length < 2) {
    return null;
  }

  const cmf = data[0];
  const flg = data[1];
  if (cmf === 0x1f && flg === 0x8b) {
    return 'gzip';
  }

  if ((cmf & 0x0f) === 8 && (cmf * 256 + flg) % 31 === 0) {
    return 'deflate';
  }

  return null;
}

/**
 * Decompresses a response body when it is compressed.
 *
 * A non-empty `Content-Encoding` header is trusted (first listed coding): `gzip`,
 * `deflate` and `identity` are handled, anything else is passed through with a warning.
 * Without the header the coding is sniffed with {@link sniffEncoding}.
 *
 * @returns `[DecompressionError, null]` when the payload is not a valid stream of its coding.
 */
export function decompressIfNeeded(
  data: Uint8Array,
  headers: Headers,
  logger: Logger = defaultLogger,
): SafeWrap<Error, Uint8Array> {
  const declared = headers.get('Content-Encoding')?.split(',')[0]?.trim().toLowerCase();
  const encoding = declared || sniffEncoding(data);
  if (!encoding) {
    return [null, data];
  }

  if (encoding.includes('gzip')) {
    return inflate('gzip', () => gunzipSync(data));
  }

  if (encoding.includes('deflate')) {
    return inflate('deflate', () => inflateSync(data));
  }

  if (!encoding.includes('identity')) {
    logger.warn(`unsupported content-encoding ${encoding}, passing response body through`);
  }

  return [null, data];
}

function inflate(encoding: SniffedEncoding, fn: () => Buffer): SafeWrap<Error, Uint8Array> {
  const [errInflate, inflated] = safeWrap(fn);
  if (errInflate) {
    return [
      new DecompressionError(`error decompressing ${encoding} response body`, encoding, { cause: errInflate }),
      null,
    ];
  }

  return [null, new Uint8Array(inflated.buffer, inflated.byteOffset, inflated.byteLength)];
}
