import { KeyError } from '../../src/errors/KeyError.js';

/** Run fn and return the KeyError it throws, or undefined when it throws nothing. */
export function catchKeyError(fn: () => unknown): KeyError | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof KeyError) return e;
    throw e;
  }
  return undefined;
}
