/**
 * Base of every error this library throws on purpose, so callers can tell them apart from bugs.
 * Branch on the subclass (or `name`) to find the cause.
 */
export class PlistError extends Error {
  readonly name: string = 'PlistError';
}
