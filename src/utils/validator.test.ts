import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

function schemaOf<Output>(
  validate: StandardSchemaV1.Props<unknown, Output>['validate'],
): StandardSchemaV1<unknown, Output> {
  return { '~standard': { version: 1, vendor: 'test', validate } };
}

describe('validator', () => {
  it('returns the parsed value for a valid zod schema', async () => {
    const [err, parsed] = await validator({ foo: 'bar' }, z.object({ foo: z.string() }));

    expect(err).toBeNull();
    expect(parsed).toEqual({ foo: 'bar' });
  });

  it('returns the transformed output of the schema', async () => {
    const [err, parsed] = await validator('42', z.string().transform(Number));

    expect(err).toBeNull();
    expect(parsed).toBe(42);
  });

  it('returns a ValidationError with issues for invalid data', async () => {
    const [err, parsed] = await validator({ foo: 1 }, z.object({ foo: z.string() }));

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.issues).toHaveLength(1);
  });

  it('returns error when sync validation throws', async () => {
    const schema = schemaOf<string>(() => {
      throw new Error('oops');
    });

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start; issues: []');
    expect(err?.cause).toBeInstanceOf(Error);
  });

  it('returns error when async validation rejects', async () => {
    const schema = schemaOf<string>(() => Promise.reject(new Error('oops')));

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating async data; issues: []');
  });

  it('resolves async validation results', async () => {
    const schema = schemaOf<string>(async (input) => ({ value: String(input) }));

    const [err, value] = await validator('test', schema);

    expect(err).toBeNull();
    expect(value).toBe('test');
  });
});
