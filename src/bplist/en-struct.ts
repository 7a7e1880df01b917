import { assert } from "../assert";

const initialCapacity = 256;

/**
 * Growable big-endian byte sink; the write-side counterpart of {@link deStruct}.
 */
export class StructWriter {
  private _bytes = new Uint8Array(initialCapacity);
  private _view = new DataView(this._bytes.buffer);
  private _length = 0;

  get length() {
    return this._length;
  }

  private reserve(bytes: number) {
    const required = this._length + bytes;
    if (required <= this._bytes.byteLength) {
      return this._length;
    }
    let capacity = this._bytes.byteLength * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this._bytes.subarray(0, this._length));
    this._bytes = grown;
    this._view = new DataView(grown.buffer);
    return this._length;
  }

  writeUint8(value: number) {
    const at = this.reserve(1);
    this._view.setUint8(at, value);
    this._length += 1;
  }

  /**
   * Unsigned big-endian integer in exactly `bytes` bytes.
   */
  writeUnsigned(value: number | bigint, bytes: 1 | 2 | 4 | 8) {
    const at = this.reserve(bytes);
    switch (bytes) {
      case 1:
        this._view.setUint8(at, Number(value));
        break;
      case 2:
        this._view.setUint16(at, Number(value));
        break;
      case 4:
        this._view.setUint32(at, Number(value));
        break;
      case 8:
        this._view.setBigUint64(at, BigInt(value));
        break;
    }
    this._length += bytes;
  }

  writeBigInt64(value: bigint) {
    const at = this.reserve(8);
    this._view.setBigInt64(at, value);
    this._length += 8;
  }

  writeFloat64(value: number) {
    const at = this.reserve(8);
    this._view.setFloat64(at, value);
    this._length += 8;
  }

  writeBytes(bytes: Uint8Array) {
    const at = this.reserve(bytes.byteLength);
    this._bytes.set(bytes, at);
    this._length += bytes.byteLength;
  }

  writeZeros(count: number) {
    assert(count >= 0, `cannot write ${count} zero bytes`);
    this.reserve(count);
    this._bytes.fill(0, this._length, this._length + count);
    this._length += count;
  }

  toBytes() {
    return this._bytes.slice(0, this._length);
  }
}

/**
 * Smallest of 1, 2, 4 or 8 bytes that holds the unsigned value.
 */
export function byteCount(value: number | bigint): 1 | 2 | 4 | 8 {
  const big = BigInt(value);
  if (big <= 0xFFn) {
    return 1;
  }
  if (big <= 0xFFFFn) {
    return 2;
  }
  if (big <= 0xFFFF_FFFFn) {
    return 4;
  }
  return 8;
}
