import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class CustomError extends Error {
  name = 'CustomError';
}

describe('toError', () => {
  it('returns errors unchanged', () => {
    const error = new CustomError('boom');
    expect(toError(error)).toBe(error);
  });

  it('wraps non-error values and keeps them as cause', () => {
    const err = toError('plain string');

    expect(err.message).toBe('non-error thrown: plain string');
    expect(err.cause).toBe('plain string');
  });
});

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new CustomError('custom boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
    expect(err?.message).toBe('custom boom');
  });

  it('normalizes thrown non-errors', () => {
    const [err] = safeWrap(() => {
      throw 7;
    });

    expect(err?.message).toBe('non-error thrown: 7');
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
    const [err, data] = await safeWrapAsync((): Promise<string> => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('captures JSON.parse errors inside async function', async () => {
    const [err, data] = await safeWrapAsync(async () => {
      await Promise.resolve();
      return JSON.parse('{ value: 123 ');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});
