import { DecodeError } from "../../errors/decode-error";
import { LeafNode } from "../../models/node";
import { ILogger } from "../../shared/logger";
import { BaseReader } from "../base-reader";
import { Marker, byteToMarker, extendedSizeNibble } from "../markers";
import { ObjectTableOffset } from "../types/bplist-index-aliases";
import { ObjectTableArrayLike, ObjectTableDict, ObjectTableEntry } from "./object-table-entries";
import { Trailer } from "./trailer";

const primitiveEntries: ReadonlyMap<Marker, LeafNode> = new Map<Marker, LeafNode>([
  [Marker.false, { kind: 'boolean', value: false }],
  [Marker.true, { kind: 'boolean', value: true }],
]);

/**
 * Decodes object records on demand, each at most once.
 */
export class ObjectTable extends BaseReader {
  readonly objectRefSize: number;

  private readonly _table = new Map<ObjectTableOffset, ObjectTableEntry>();

  constructor(view: DataView, trailer: Trailer, logger: ILogger) {
    super(view, logger, trailer.offsetTableOffset);

    this.objectRefSize = trailer.objectRefSize;
  }

  getEntryByObjectTableOffset(offset: ObjectTableOffset) {
    const existing = this._table.get(offset);
    if (existing !== undefined) {
      return existing;
    }

    const { entry, bytesRead } = this.parseObjectTableEntry(offset);
    this.logger.debug('DBG: offset=%d done, read %d bytes and found %O', offset, bytesRead, entry);

    this._table.set(offset, entry);
    return entry;
  }

  /**
   * Lower nibble is either the size itself, or {@link extendedSizeNibble} followed by an int record holding the size.
   */
  private readSize(offset: number, lowerNibble: number) {
    if (lowerNibble !== extendedSizeNibble) {
      return { size: lowerNibble, bytesRead: 0 };
    }
    const sizeCheck = this.readDynamicInt(offset);
    return { size: sizeCheck.entry, bytesRead: sizeCheck.bytesRead };
  }

  parseObjectTableEntry(offset: ObjectTableOffset): { entry: ObjectTableEntry, bytesRead: number } {
    this.ensureReadable(offset, 1);
    const markerByte = this.view.getUint8(offset);
    const markerParts = byteToMarker(markerByte);

    if (!markerParts) {
      throw DecodeError.malformed(`Invalid marker byte 0x${markerByte.toString(16)}`, { offset });
    }
    const { marker, lowerNibble } = markerParts;
    this.logger.debug('DBG: offset=%s found marker=%s with lowerNibble=0x%s', offset, Marker[marker], lowerNibble.toString(16));

    const primitive = primitiveEntries.get(marker);
    if (primitive) {
      return {
        entry: primitive,
        bytesRead: 1,
      }
    }

    let bytesRead = 1;
    let entry: ObjectTableEntry;

    switch (marker) {
      case Marker.int: {
        const bytes = 2 ** lowerNibble;
        entry = { kind: 'integer', value: this.readInt(offset + bytesRead, bytes) };
        bytesRead += bytes;
        break;
      }

      case Marker.real: {
        const bytes = 2 ** lowerNibble;
        entry = { kind: 'real', value: this.readReal(offset + bytesRead, bytes) };
        bytesRead += bytes;
        break;
      }

      case Marker.date: {
        const bytes = 2 ** lowerNibble;
        if (bytes !== 8) {
          this.logger.warn('Non-canonical date; should be 8 bytes but is %d as lowerNibble is %s', bytes, lowerNibble.toString(16));
        }
        entry = { kind: 'date', value: this.readDate(offset + bytesRead, bytes) };
        bytesRead += bytes;
        break;
      }

      case Marker.data: {
        const { size, bytesRead: sizeBytes } = this.readSize(offset + bytesRead, lowerNibble);
        bytesRead += sizeBytes;
        entry = { kind: 'data', value: this.readData(offset + bytesRead, size) };
        bytesRead += size;
        break;
      }

      case Marker.ascii: {
        const { size, bytesRead: sizeBytes } = this.readSize(offset + bytesRead, lowerNibble);
        bytesRead += sizeBytes;
        entry = { kind: 'string', value: this.readAscii(offset + bytesRead, size) };
        bytesRead += size;
        break;
      }

      case Marker.unicode: {
        const { size: charCount, bytesRead: sizeBytes } = this.readSize(offset + bytesRead, lowerNibble);
        bytesRead += sizeBytes;
        entry = { kind: 'string', value: this.readUnicode16(offset + bytesRead, charCount) };
        bytesRead += charCount * 2;
        break;
      }

      case Marker.uid: {
        const bytes = lowerNibble + 1;
        entry = { kind: 'uid', value: this.readUid(offset + bytesRead, bytes) };
        bytesRead += bytes;
        break;
      }

      case Marker.array:
      case Marker.set: {
        const { size, bytesRead: sizeBytes } = this.readSize(offset + bytesRead, lowerNibble);
        bytesRead += sizeBytes;
        entry = new ObjectTableArrayLike(
          marker,
          this.readObjRefs(offset + bytesRead, size, this.objectRefSize),
        );
        bytesRead += size * this.objectRefSize;
        break;
      }

      case Marker.dict: {
        const { size, bytesRead: sizeBytes } = this.readSize(offset + bytesRead, lowerNibble);
        bytesRead += sizeBytes;
        const keysAndObjs = this.readObjRefs(offset + bytesRead, size * 2, this.objectRefSize);
        entry = new ObjectTableDict(
          keysAndObjs.slice(0, size).map((key, i) => [key, keysAndObjs[size + i]] as const),
        );
        bytesRead += size * this.objectRefSize * 2;
        break;
      }

      default:
        // null and fill are placeholders, not values
        throw DecodeError.malformed(`Unsupported marker ${Marker[marker]} (0x${markerByte.toString(16)})`, { offset });
    }

    return {
      entry,
      bytesRead,
    }
  }
}
