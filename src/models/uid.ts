import { ConstructionError } from "../errors/construction-error";

const maxUid = 0xFFFF_FFFF_FFFF_FFFFn;

/**
 * Keyed-archiver object reference (`CF$UID`). Only meaningful inside archives written by NSKeyedArchiver.
 */
export class Uid {
  readonly value: bigint;

  constructor(value: bigint | number) {
    const big = typeof value === 'number' && Number.isSafeInteger(value) ? BigInt(value) : value;
    if (typeof big !== 'bigint' || big < 0n || big > maxUid) {
      throw new ConstructionError(`Uid must be an unsigned 64-bit integer, got ${value}`, value);
    }
    this.value = big;
  }

  equals(other: Uid) {
    return this.value === other.value;
  }

  toString() {
    return `Uid<${this.value}>`;
  }
}
