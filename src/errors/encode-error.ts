import type { ValueKind } from "../models/node";
import { PlistError } from "./plist-error";

export class EncodeError extends PlistError {
  readonly name = 'EncodeError';

  constructor(message: string, readonly kind: ValueKind, readonly format: string) {
    super(message);
  }
}
