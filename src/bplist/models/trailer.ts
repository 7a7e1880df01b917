import { headerByteLength } from "../../constants/magic-number";
import { DecodeError } from "../../errors/decode-error";
import { ILogger } from "../../shared/logger";
import { deStruct } from "../de-struct";
import { ObjRef } from "../types/bplist-index-aliases";

const acceptedIntSizes: readonly number[] = [1, 2, 4, 8];

/*
 * The trailer is the last thing in the file, so when the input was cut short the 32 bytes
 * read as the trailer are object data. Widths and counts that no writer produces are
 * therefore reported as truncation; inconsistencies between sane fields as malformed.
 */

function toCount(value: bigint, field: string) {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw DecodeError.truncated(`No trailer at end of input: ${field} would be ${value}`);
  }
  return Number(value);
}

export class Trailer {
  static readonly trailerByteLength = 32;
  static readonly unusedLeadingBytes = 5;

  constructor(
    readonly sortVersion: number,
    /** size of offsets found in offsetTable that point to objects in object table */
    readonly offsetIntSize: number,
    /** size of objectRefs that are found in arrays/sets/dicts */
    readonly objectRefSize: number,
    readonly numObjects: number,
    readonly topObject: ObjRef,
    readonly offsetTableOffset: number,
    readonly _trailerOffset: number,
  ) { }

  /**
   * Reads and sanity-checks the fixed-size trailer at the end of the buffer.
   */
  static fromBuffer(view: DataView, logger: ILogger) {
    if (view.byteLength < headerByteLength + this.trailerByteLength) {
      throw DecodeError.truncated(`Binary plist must be at least ${headerByteLength + this.trailerByteLength} bytes, got ${view.byteLength}`);
    }
    const trailerOffset = view.byteLength - this.trailerByteLength;

    const [sortVersion, offsetIntSize, objectRefSize, numObjects, topObject, offsetTableOffset] =
      deStruct([8, 8, 8, 64, 64, 64], view, trailerOffset + this.unusedLeadingBytes);

    const trailer = new Trailer(
      sortVersion,
      offsetIntSize,
      objectRefSize,
      toCount(numObjects, 'numObjects'),
      toCount(topObject, 'topObject'),
      toCount(offsetTableOffset, 'offsetTableOffset'),
      trailerOffset,
    );
    logger.debug('DBG: Trailer found: %O', trailer);

    trailer.validate();
    return trailer;
  }

  private validate() {
    const context = { offset: this._trailerOffset };

    if (!acceptedIntSizes.includes(this.offsetIntSize)) {
      throw DecodeError.truncated(`No trailer at end of input: offsetIntSize would be ${this.offsetIntSize}`, context);
    }
    if (!acceptedIntSizes.includes(this.objectRefSize)) {
      throw DecodeError.truncated(`No trailer at end of input: objectRefSize would be ${this.objectRefSize}`, context);
    }
    if (this.numObjects === 0) {
      throw DecodeError.malformed('Binary plist contains no objects', context);
    }
    if (this.topObject >= this.numObjects) {
      throw DecodeError.malformed(`Top object ${this.topObject} is not among the ${this.numObjects} objects`, context);
    }
    if (this.offsetTableOffset < headerByteLength) {
      throw DecodeError.malformed(`Offset table offset ${this.offsetTableOffset} points into the header`, context);
    }

    const offsetTableEnd = this.offsetTableOffset + this.numObjects * this.offsetIntSize;
    if (offsetTableEnd > this._trailerOffset) {
      throw DecodeError.truncated(`Offset table should end at ${offsetTableEnd} but the trailer starts at ${this._trailerOffset}`, context);
    }
  }
}
