import { DecodeError } from "../errors/decode-error";
import { PlistDate } from "../models/date";
import { maxInteger, minInteger } from "../models/node";
import { Uid } from "../models/uid";
import { IParseContext } from "../parse-context";
import { ILogger } from "../shared/logger";
import { AcceptedBitLength, deStructWithIter, getDeStructReaderBySize } from "./de-struct";
import { Marker, byteToMarker } from "./markers";
import { ObjRef } from "./types/bplist-index-aliases";

const charCodeChunkSize = 0x2000;

function isUnsignedBitLength(bits: number): bits is 8 | 16 | 32 | 64 {
  return bits === 8 || bits === 16 || bits === 32 || bits === 64;
}

/**
 * Bounds-checked big-endian primitives over a binary plist.
 *
 * Reads past the end of the input are reported as truncation; reads that stay inside the input
 * but cross `limit` (the start of the offset table, for object records) are malformed.
 */
export class BaseReader {
  protected readonly limit: number;

  constructor(
    protected readonly view: DataView,
    protected readonly logger: ILogger,
    limit?: number,
  ) {
    this.limit = limit ?? view.byteLength;
  }

  protected ensureReadable(offset: number, bytes: number, context?: IParseContext) {
    const end = offset + bytes;
    if (!Number.isSafeInteger(end) || end > this.view.byteLength) {
      throw DecodeError.truncated(`Need ${bytes} bytes at offset ${offset} but the input is only ${this.view.byteLength} bytes long`, { offset, ...context });
    }
    if (end > this.limit) {
      throw DecodeError.malformed(`Record at offset ${offset} runs ${end - this.limit} bytes past the end of its table`, { offset, ...context });
    }
  }

  /**
   * Unsigned integer used for sizes, offsets and object references.
   */
  readUnsigned(offset: number, bytes: number): number {
    const bits = bytes * 8;
    if (!isUnsignedBitLength(bits)) {
      throw DecodeError.malformed(`Unexpected byte length for unsigned int: ${bytes}`, { offset });
    }
    this.ensureReadable(offset, bytes);

    const value = getDeStructReaderBySize(bits)(this.view, offset).value;
    if (typeof value === 'bigint') {
      if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw DecodeError.malformed(`Unsigned int ${value} at offset ${offset} is too large to address anything`, { offset });
      }
      return Number(value);
    }
    return value;
  }

  /**
   * In version '00', ints of size 1|2|4 are always unsigned while ints of size 8|16 are always signed.
   * 16-byte ints only exist to carry unsigned 64-bit values.
   */
  readInt(offset: number, bytes: number): bigint {
    let bits = bytes * 8 as AcceptedBitLength;

    if (bits !== 8 && bits !== 16 && bits !== 32 && bits !== 64 && bits !== 128) {
      throw DecodeError.malformed(`Unexpected byte length for int: ${bytes}`, { offset });
    }
    this.ensureReadable(offset, bytes);

    if (bits === 64 || bits === 128) {
      bits = -bits as AcceptedBitLength;
    }

    const value = BigInt(getDeStructReaderBySize(bits)(this.view, offset).value);
    if (value < minInteger || value > maxInteger) {
      throw DecodeError.malformed(`Int ${value} at offset ${offset} does not fit in 64 bits`, { offset });
    }
    return value;
  }

  /**
   * First byte must be a {@link Marker.int} which determines the rest of size of the int.
   * Reads the marker byte and the rest of the int, returns the int as a count, and the total number of bytes read.
   */
  readDynamicInt(offset: number) {
    this.ensureReadable(offset, 1);
    const markerParts = byteToMarker(this.view.getUint8(offset));
    if (markerParts?.marker !== Marker.int) {
      throw DecodeError.malformed(`Extended size at offset ${offset} is not an int record`, { offset });
    }
    const bytes = 2 ** markerParts.lowerNibble;
    const entry = this.readInt(offset + 1, bytes);
    if (entry < 0n || entry > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw DecodeError.malformed(`Extended size ${entry} at offset ${offset} is not a valid count`, { offset });
    }
    return {
      entry: Number(entry),
      bytesRead: bytes + 1,
    };
  }

  readReal(offset: number, bytes: number) {
    this.ensureReadable(offset, bytes);
    switch (bytes) {
      case 4:
        return this.view.getFloat32(offset);
      case 8:
        return this.view.getFloat64(offset);
    }

    throw DecodeError.malformed(`Unexpected byte length for real: ${bytes}`, { offset });
  }

  readDate(offset: number, bytes: number) {
    const secondsSinceEpoch = this.readReal(offset, bytes);
    if (!PlistDate.isRepresentableSeconds(secondsSinceEpoch)) {
      throw DecodeError.malformed(`Date at offset ${offset} is out of range: ${secondsSinceEpoch}`, { offset });
    }
    return PlistDate.fromReferenceSeconds(secondsSinceEpoch);
  }

  readData(offset: number, size: number) {
    this.ensureReadable(offset, size);
    return new Uint8Array(this.view.buffer, this.view.byteOffset + offset, size).slice();
  }

  /**
   * Bytes are taken as Latin-1; writers only ever emit 7-bit ASCII here.
   */
  readAscii(offset: number, bytes: number) {
    this.ensureReadable(offset, bytes);
    const byteArray = new Uint8Array(this.view.buffer, this.view.byteOffset + offset, bytes);

    return charCodesToString(byteArray);
  }

  readUnicode16(offset: number, count: number) {
    // damn you little-endian; if Uint16Array were bigendian we could just read that
    const byteLength = count * 2;
    this.ensureReadable(offset, byteLength);

    const codeUnits = new Uint16Array(count);
    for (let i = 0; i < count; ++i) {
      codeUnits[i] = this.view.getUint16(offset + i * 2);
    }
    return charCodesToString(codeUnits);
  }

  readUid(offset: number, bytes: number) {
    const bits = bytes * 8;
    if (!isUnsignedBitLength(bits)) {
      throw DecodeError.malformed(`Unexpected byte length for UID: ${bytes}`, { offset });
    }
    this.ensureReadable(offset, bytes);

    return new Uid(BigInt(getDeStructReaderBySize(bits)(this.view, offset).value));
  }

  readObjRefs(offset: number, count: number, objectRefSize: number): ObjRef[] {
    const objectRefBitSize = objectRefSize * 8;
    if (!isUnsignedBitLength(objectRefBitSize)) {
      throw DecodeError.malformed(`Unexpected objectRefSize: ${objectRefSize}`, { offset });
    }
    this.ensureReadable(offset, count * objectRefSize);

    const fn = getDeStructReaderBySize(objectRefBitSize);
    const refs: ObjRef[] = [];
    for (const ref of deStructWithIter<number | bigint>(Array<typeof fn>(count).fill(fn), this.view, offset)) {
      if (typeof ref === 'bigint' && ref > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw DecodeError.malformed(`Object reference ${ref} is out of range`, { offset });
      }
      refs.push(Number(ref));
    }
    return refs;
  }
}

function charCodesToString(codes: Uint8Array | Uint16Array) {
  let result = '';
  for (let i = 0; i < codes.length; i += charCodeChunkSize) {
    result += String.fromCharCode(...codes.subarray(i, i + charCodeChunkSize));
  }
  return result;
}
