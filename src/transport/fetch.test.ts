import { gzipSync } from 'node:zlib';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { ApiClient } from '../core/client.js';
import { ResponseType } from '../core/responseType.js';
import { isAbortError } from '../error/abortError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { getTransportError } from '../error/transportError.js';
import { ByteSerializer } from '../serializer/bytes.js';
import { StringSerializer } from '../serializer/string.js';
import type { Logger } from '../utils/logger.js';
import { FetchTransport, type FetchTransportOptions } from './fetch.js';

const API_URL = 'https://api.example.com';

/** Fetch stand-in that only settles by rejecting with the abort reason of its signal. */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      return;
    }

    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

describe('FetchTransport', () => {
  let fetchMock: Mock<typeof fetch>;
  let logger: Logger;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    logger = { debug: vi.fn(), warn: vi.fn() };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createClient(opts: FetchTransportOptions = {}): ApiClient {
    const transport = new FetchTransport({ fetch: fetchMock, logger, ...opts });
    return new ApiClient({ apiUrl: API_URL, transport, serializer: new StringSerializer() });
  }

  it('folds multi-valued headers and skips empty ones', async () => {
    fetchMock.mockResolvedValueOnce(new Response('ok'));

    await createClient()
      .createRequest('GET', '/ping', ResponseType.string)
      .withHeader('Accept', 'text/plain')
      .withHeader('Accept', 'text/html')
      .withHeader('X-Empty', '')
      .send();

    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get('Accept')).toBe('text/plain, text/html');
    expect(headers.has('X-Empty')).toBe(false);
  });

  it('hands non-2xx responses to the serializer', async () => {
    fetchMock.mockResolvedValueOnce(new Response('not found', { status: 404 }));

    expect(await createClient().createRequest('GET', '/missing', ResponseType.string).send()).toEqual([
      null,
      'not found',
    ]);
  });

  it('returns identity bodies byte for byte', async () => {
    const bytes = new Uint8Array([0x1f, 0x8b, 0x00, 0x01, 0xff]);
    fetchMock.mockResolvedValueOnce(new Response(bytes, { headers: { 'Content-Encoding': 'identity' } }));

    const [err, data] = await createClient()
      .createRequest('GET', '/raw', ResponseType.bytes)
      .withSerializerOverride(new ByteSerializer())
      .send();

    expect(err).toBeNull();
    expect(data).toEqual(bytes);
  });

  it('does not decode again what fetch already decoded', async () => {
    fetchMock.mockResolvedValueOnce(new Response('already decoded', { headers: { 'Content-Encoding': 'gzip' } }));

    expect(await createClient().createRequest('GET', '/text', ResponseType.string).send()).toEqual([
      null,
      'already decoded',
    ]);
  });

  it('returns gzip files fetch already decoded as their gzip bytes', async () => {
    const archive = gzipSync('archive contents');
    fetchMock.mockResolvedValueOnce(new Response(archive, { headers: { 'Content-Encoding': 'gzip' } }));

    const [err, data] = await createClient()
      .createRequest('GET', '/archive.gz', ResponseType.bytes)
      .withSerializerOverride(new ByteSerializer())
      .send();

    expect(err).toBeNull();
    expect(data).toEqual(new Uint8Array(archive));
  });

  it('inflates gzip bodies that arrive without Content-Encoding', async () => {
    fetchMock.mockResolvedValueOnce(new Response(gzipSync('sniffed')));

    expect(await createClient().createRequest('GET', '/archive', ResponseType.string).send()).toEqual([
      null,
      'sniffed',
    ]);
  });

  it('keeps codings fetch does not decode and warns about them', async () => {
    fetchMock.mockResolvedValueOnce(new Response('zstd body', { headers: { 'Content-Encoding': 'zstd' } }));

    expect(await createClient().createRequest('GET', '/z', ResponseType.string).send()).toEqual([null, 'zstd body']);
    expect(logger.warn).toHaveBeenCalledWith('unsupported content-encoding zstd, passing response body through');
  });

  it('wraps fetch rejections in a TransportError', async () => {
    const cause = new TypeError('fetch failed');
    fetchMock.mockRejectedValueOnce(cause);

    const [err, data] = await createClient().createRequest('POST', '/users', ResponseType.string).withBody('x').send();

    expect(data).toBeNull();
    expect(err?.message).toBe('error in POST request to https://api.example.com/users');
    expect(getTransportError(err)?.method).toBe('POST');
    expect(err?.cause).toBe(cause);
  });

  it('wraps body read failures in a TransportError', async () => {
    const response = new Response('unread');
    vi.spyOn(response, 'arrayBuffer').mockRejectedValueOnce(new Error('stream reset'));
    fetchMock.mockResolvedValueOnce(response);

    const [err] = await createClient().createRequest('GET', '/stream', ResponseType.string).send();

    expect(err?.message).toBe('error reading GET response body from https://api.example.com/stream');
  });

  it('times out with a TimeoutError in the cause chain', async () => {
    fetchMock.mockImplementationOnce(hangingFetch);

    const [err] = await createClient({ timeout: 10 }).createRequest('GET', '/slow', ResponseType.string).send();

    expect(getTransportError(err)?.url).toBe('https://api.example.com/slow');
    expect(isTimeoutError(err)).toBe(true);
  });

  it('clears the timeout once the exchange settles', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    fetchMock.mockResolvedValueOnce(new Response('fast'));

    const result = await createClient({ timeout: 60_000 }).createRequest('GET', '/fast', ResponseType.string).send();

    expect(result).toEqual([null, 'fast']);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('always passes an abort signal to fetch', async () => {
    fetchMock.mockResolvedValueOnce(new Response('fast'));

    await createClient({ timeout: false }).createRequest('GET', '/fast', ResponseType.string).send();

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it('aborts in-flight exchanges on close', async () => {
    fetchMock.mockImplementationOnce(hangingFetch);
    const client = createClient();

    const pending = client.createRequest('GET', '/slow', ResponseType.string).send();
    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    client.close();

    const [err] = await pending;
    expect(isAbortError(err)).toBe(true);
    expect(getTransportError(err)?.message).toBe('error in GET request to https://api.example.com/slow');
  });

  it('does not fetch when closed before the deferred turn', async () => {
    const client = createClient();

    const pending = client.createRequest('GET', '/ping', ResponseType.string).send();
    client.close();

    const [err] = await pending;
    expect(err?.message).toBe('error transport is closed');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
