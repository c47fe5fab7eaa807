import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

describe('ConstructURLError', () => {
  it('exposes endpoint via getter', () => {
    const err = new ConstructURLError('error no base url', '/users/{id}');
    expect(err.endpoint).toBe('/users/{id}');
    expect(err.name).toBe('ConstructURLError');
  });
});

describe('isConstructURLError', () => {
  it('returns true for instances of ConstructURLError', () => {
    const err = new ConstructURLError('error no base url', '/users');
    expect(isConstructURLError(err)).toBe(true);
  });

  it('returns false for non ConstructURLError errors', () => {
    expect(isConstructURLError(new Error('boom'))).toBe(false);
  });
});

describe('getConstructURLError', () => {
  it('returns the error when passed directly', () => {
    const err = new ConstructURLError('error no base url', '/users');
    expect(getConstructURLError(err)).toBe(err);
  });

  it('unwraps nested causes', () => {
    const err = new ConstructURLError('error no base url', '/users');
    const wrapped = new Error('outer', { cause: err });
    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('returns null when no ConstructURLError exists', () => {
    const wrapped = new Error('outer', { cause: new Error('inner') });
    expect(getConstructURLError(wrapped)).toBeNull();
  });
});
