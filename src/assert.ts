
export class AssertError extends Error {
  readonly name = 'AssertError';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Internal invariant check. Input validation throws the public error classes instead.
 */
export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new AssertError(message);
  }
}
