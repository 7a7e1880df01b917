import { headerByteLength } from "../../constants/magic-number";
import { DecodeError } from "../../errors/decode-error";
import { ILogger } from "../../shared/logger";
import { BaseReader } from "../base-reader";
import { ObjRef, ObjectTableOffset } from "../types/bplist-index-aliases";
import { Trailer } from "./trailer";

/**
 * Maps ObjRefs (indices) to full-file-offsets pointing to objects
 */
export class OffsetTable extends BaseReader {
  readonly offsetTableOffset: number;
  readonly offsetIntSize: number;
  readonly count: number;

  private readonly _table: ObjectTableOffset[] = [];

  constructor(view: DataView, trailer: Trailer, logger: ILogger) {
    super(view, logger, trailer._trailerOffset);

    this.offsetTableOffset = trailer.offsetTableOffset;
    this.offsetIntSize = trailer.offsetIntSize;
    this.count = trailer.numObjects;

    for (let ref = 0; ref < this.count; ++ref) {
      const entryOffset = this.offsetTableOffset + ref * this.offsetIntSize;
      const objectOffset = this.readUnsigned(entryOffset, this.offsetIntSize);

      if (objectOffset < headerByteLength || objectOffset >= this.offsetTableOffset) {
        throw DecodeError.malformed(`Offset ${objectOffset} of object ${ref} lies outside the object table`, { offset: entryOffset, objRef: ref });
      }
      this._table.push(objectOffset);
    }
  }

  getObjectTableOffsetByObjRef(ref: ObjRef): ObjectTableOffset {
    const offset = this._table[ref];
    if (offset === undefined) {
      throw DecodeError.malformed(`Ref ${ref} not in OffsetTable of ${this.count} objects`, { objRef: ref });
    }
    return offset;
  }
}
