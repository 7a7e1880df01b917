import { PlistError } from "./plist-error";

/**
 * A construction helper was handed something that has no plist counterpart
 * (a function, `undefined`, a class instance, an out-of-range bigint, ...).
 */
export class ConstructionError extends PlistError {
  readonly name = 'ConstructionError';

  constructor(message: string, readonly input: unknown) {
    super(message);
  }
}
