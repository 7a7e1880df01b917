import { IParseContext } from "../parse-context";
import { PlistError } from "./plist-error";

export enum DecodeErrorReason {
  malformed = 'Malformed',
  unsupportedVersion = 'UnsupportedVersion',
  truncated = 'Truncated',
}

export class DecodeError extends PlistError {
  readonly name = 'DecodeError';

  constructor(message: string, readonly reason: DecodeErrorReason, readonly context?: IParseContext, options?: ErrorOptions) {
    super(message, options);
  }

  static malformed(message: string, context?: IParseContext) {
    return new DecodeError(message, DecodeErrorReason.malformed, context);
  }

  static truncated(message: string, context?: IParseContext) {
    return new DecodeError(message, DecodeErrorReason.truncated, context);
  }
}
