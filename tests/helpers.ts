import { PlayError } from '../src/errors';

/**
 * Run `fn` and return the PlayError it throws
 */
export function capturePlayError(fn: () => unknown): PlayError {
  try {
    fn();
  } catch (error) {
    if (error instanceof PlayError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a PlayError to be thrown');
}
