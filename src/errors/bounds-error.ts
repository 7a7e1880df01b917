import { PlistError } from "./plist-error";

export type BoundsErrorReason =
  /** index past the end of an array */
  | 'out-of-bounds'
  /** borrowed handle used after its container was structurally mutated */
  | 'stale-handle'
  /** owning handle used after it was moved into a container or consumed by `into*()` */
  | 'moved'
  /** a tree was inserted somewhere inside itself */
  | 'self-insertion';

export class BoundsError extends PlistError {
  readonly name = 'BoundsError';

  constructor(
    message: string,
    readonly reason: BoundsErrorReason,
    readonly index?: number,
    readonly length?: number,
  ) {
    super(message);
  }

  static outOfBounds(index: number, length: number) {
    return new BoundsError(`Index ${index} is out of bounds for array of length ${length}`, 'out-of-bounds', index, length);
  }
}
