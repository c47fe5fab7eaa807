import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class CustomError extends Error {
  name = 'CustomError';
}

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new CustomError('boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
    expect(err?.message).toBe('boom');
  });

  it('captures JSON.parse errors as SyntaxError', () => {
    const [err, data] = safeWrap((): unknown => JSON.parse('{ value: 123 '));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('normalizes rejections with non-error values', async () => {
    const [err] = await safeWrapAsync(() => Promise.reject('plain string'));

    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('non-error value thrown: plain string');
    expect(err?.cause).toBe('plain string');
  });
});

describe('toError', () => {
  it('returns errors unchanged', () => {
    const err = new CustomError('same');
    expect(toError(err)).toBe(err);
  });

  it('wraps other values', () => {
    const err = toError(404);
    expect(err.message).toBe('non-error value thrown: 404');
    expect(err.cause).toBe(404);
  });
});
