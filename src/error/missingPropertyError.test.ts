import { describe, expect, it } from 'vitest';
import { isMissingPropertyError, MissingPropertyError } from './missingPropertyError.js';
import { NuclinoError } from './nuclinoError.js';

describe('MissingPropertyError', () => {
  it('names the kind of object and the key in its message', () => {
    const err = new MissingPropertyError('title', 'collection');

    expect(err.message).toBe('error collection has no property "title"');
    expect(err.key).toBe('title');
    expect(err).toBeInstanceOf(NuclinoError);
  });

  it('is found along a cause chain', () => {
    const wrapped = new Error('navigation failed', { cause: new MissingPropertyError('id', 'item') });

    expect(isMissingPropertyError(wrapped)).toBe(true);
    expect(isMissingPropertyError(new Error('boom'))).toBe(false);
  });
});
