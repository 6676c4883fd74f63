import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Attempts to parse a string as JSON.
 *
 * Returns `[null, value]` on success and `[Error, null]` when the text is not
 * valid JSON (including the empty string). This function never throws.
 */
export function tryParse(input: string): SafeWrap<Error, unknown> {
  const [errParsed, parsed] = safeWrap<unknown>(() => JSON.parse(input));
  if (errParsed) {
    return [new Error('error parsing json in tryParse', { cause: errParsed }), null];
  }

  return [null, parsed];
}
