import type { ValueKind } from "../models/node";
import type { Value } from "../models/value";
import { PlistError } from "./plist-error";

/**
 * Thrown by the consuming `Value.into*()` conversions on a kind mismatch.
 * The untouched original is handed back on {@link ConversionError.value}.
 */
export class ConversionError extends PlistError {
  readonly name = 'ConversionError';

  constructor(readonly expected: ValueKind, readonly actual: ValueKind, readonly value: Value) {
    super(`Expected a value of kind ${expected} but found ${actual}`);
  }
}
