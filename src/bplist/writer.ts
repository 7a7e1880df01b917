import { bplistMagicNumber, supportedBplistVersion } from "../constants/magic-number";
import { EncodeError } from "../errors/encode-error";
import { LeafNode, Node } from "../models/node";
import { ILogger } from "../shared/logger";
import { StructWriter, byteCount } from "./en-struct";
import { Marker, extendedSizeNibble, markerByte } from "./markers";
import { Trailer } from "./models/trailer";
import { ObjRef } from "./types/bplist-index-aliases";

const maxSignedInt64 = 2n ** 63n - 1n;
const maxAsciiCode = 0x7F;

type FlatObject =
  | { readonly type: 'leaf', readonly node: LeafNode }
  | { readonly type: 'array', readonly refs: readonly ObjRef[] }
  | { readonly type: 'dict', readonly keyRefs: readonly ObjRef[], readonly valueRefs: readonly ObjRef[] };

/** a container whose children are being numbered */
type OpenContainer = {
  readonly ref: ObjRef,
  /** set for dictionaries, whose keys are numbered before any value */
  readonly keyRefs?: readonly ObjRef[],
  readonly children: readonly Node[],
  next: number,
  readonly refs: ObjRef[],
};

/**
 * Serializes a node tree as `bplist00`.
 *
 * Objects are numbered in pre-order (a dictionary's keys before its values). Equal leaves,
 * dictionary keys included, are written once and referenced from every place they occur.
 */
export class Writer {
  private readonly objects: FlatObject[] = [];
  private readonly leafRefs = new Map<string, ObjRef>();

  constructor(private readonly logger: ILogger) { }

  static encode(root: Node, logger: ILogger) {
    return new Writer(logger).write(root);
  }

  write(root: Node): Uint8Array {
    const topObject = this.flatten(root);

    const out = new StructWriter();
    out.writeBytes(new TextEncoder().encode(bplistMagicNumber + supportedBplistVersion));

    const objectRefSize = byteCount(this.objects.length);
    const offsets: number[] = [];
    for (const object of this.objects) {
      offsets.push(out.length);
      this.writeObject(out, object, objectRefSize);
    }

    const offsetTableOffset = out.length;
    const offsetIntSize = byteCount(offsetTableOffset);
    for (const offset of offsets) {
      out.writeUnsigned(offset, offsetIntSize);
    }

    // 5 unused bytes plus the sort version
    out.writeZeros(Trailer.unusedLeadingBytes + 1);
    out.writeUint8(offsetIntSize);
    out.writeUint8(objectRefSize);
    out.writeUnsigned(this.objects.length, 8);
    out.writeUnsigned(topObject, 8);
    out.writeUnsigned(offsetTableOffset, 8);

    this.logger.debug('DBG: wrote %d objects, offset table at %d', this.objects.length, offsetTableOffset);
    return out.toBytes();
  }

  private flatten(root: Node): ObjRef {
    const stack: OpenContainer[] = [];
    let opened = this.open(root);

    for (;;) {
      if (typeof opened !== 'number') {
        stack.push(opened);
      }
      else if (stack.length === 0) {
        return opened;
      }
      else {
        stack[stack.length - 1].refs.push(opened);
      }

      const container = stack[stack.length - 1];
      if (container.next < container.children.length) {
        opened = this.open(container.children[container.next++]);
        continue;
      }

      stack.pop();
      this.objects[container.ref] = container.keyRefs === undefined
        ? { type: 'array', refs: container.refs }
        : { type: 'dict', keyRefs: container.keyRefs, valueRefs: container.refs };
      opened = container.ref;
    }
  }

  /** numbers a leaf, or reserves a container's number (and its keys') ahead of its children */
  private open(node: Node): ObjRef | OpenContainer {
    switch (node.kind) {
      case 'null':
        throw new EncodeError('Null has no binary plist representation', node.kind, 'binary');

      case 'array':
        return { ref: this.reserve(), children: node.items, next: 0, refs: [] };

      case 'dictionary': {
        const ref = this.reserve();
        const keyRefs = [...node.entries.keys()].map(key => this.flattenLeaf({ kind: 'string', value: key }));
        return { ref, keyRefs, children: [...node.entries.values()], next: 0, refs: [] };
      }

      default:
        return this.flattenLeaf(node);
    }
  }

  private reserve(): ObjRef {
    // placeholder until the container's children have been numbered
    this.objects.push({ type: 'array', refs: [] });
    return this.objects.length - 1;
  }

  private flattenLeaf(node: LeafNode): ObjRef {
    const key = leafKey(node);
    const existing = this.leafRefs.get(key);
    if (existing !== undefined) {
      return existing;
    }

    this.objects.push({ type: 'leaf', node });
    const ref = this.objects.length - 1;
    this.leafRefs.set(key, ref);
    return ref;
  }

  private writeObject(out: StructWriter, object: FlatObject, objectRefSize: 1 | 2 | 4 | 8) {
    switch (object.type) {
      case 'array':
        writeSizedMarker(out, Marker.array, object.refs.length);
        object.refs.forEach(ref => out.writeUnsigned(ref, objectRefSize));
        return;
      case 'dict':
        writeSizedMarker(out, Marker.dict, object.keyRefs.length);
        object.keyRefs.forEach(ref => out.writeUnsigned(ref, objectRefSize));
        object.valueRefs.forEach(ref => out.writeUnsigned(ref, objectRefSize));
        return;
      case 'leaf':
        writeLeaf(out, object.node);
        return;
    }
  }
}

function writeLeaf(out: StructWriter, node: LeafNode) {
  switch (node.kind) {
    case 'boolean':
      out.writeUint8(node.value ? Marker.true : Marker.false);
      return;
    case 'integer':
      writeInt(out, node.value);
      return;
    case 'real':
      out.writeUint8(markerByte(Marker.real, 3));
      out.writeFloat64(node.value);
      return;
    case 'date':
      out.writeUint8(markerByte(Marker.date, 3));
      out.writeFloat64(node.value.referenceSeconds);
      return;
    case 'data':
      writeSizedMarker(out, Marker.data, node.value.byteLength);
      out.writeBytes(node.value);
      return;
    case 'string':
      writeString(out, node.value);
      return;
    case 'uid': {
      const bytes = byteCount(node.value.value);
      out.writeUint8(markerByte(Marker.uid, bytes - 1));
      out.writeUnsigned(node.value.value, bytes);
      return;
    }
    case 'null':
      throw new EncodeError('Null has no binary plist representation', node.kind, 'binary');
  }
}

/**
 * 1, 2 and 4 byte ints are unsigned and 8 byte ints signed, so negatives always take 8 bytes
 * and values past the signed 64-bit range take 16.
 */
function writeInt(out: StructWriter, value: bigint) {
  if (value < 0n) {
    out.writeUint8(markerByte(Marker.int, 3));
    out.writeBigInt64(value);
    return;
  }
  if (value > maxSignedInt64) {
    out.writeUint8(markerByte(Marker.int, 4));
    out.writeZeros(8);
    out.writeUnsigned(value, 8);
    return;
  }

  const bytes = byteCount(value);
  out.writeUint8(markerByte(Marker.int, Math.log2(bytes)));
  out.writeUnsigned(value, bytes);
}

function writeSizedMarker(out: StructWriter, marker: Marker, size: number) {
  if (size < extendedSizeNibble) {
    out.writeUint8(markerByte(marker, size));
    return;
  }
  out.writeUint8(markerByte(marker, extendedSizeNibble));
  writeInt(out, BigInt(size));
}

function writeString(out: StructWriter, value: string) {
  let ascii = true;
  for (let i = 0; i < value.length; ++i) {
    if (value.charCodeAt(i) > maxAsciiCode) {
      ascii = false;
      break;
    }
  }

  if (ascii) {
    writeSizedMarker(out, Marker.ascii, value.length);
    for (let i = 0; i < value.length; ++i) {
      out.writeUint8(value.charCodeAt(i));
    }
    return;
  }

  // size counts UTF-16 code units, which is what `length` measures
  writeSizedMarker(out, Marker.unicode, value.length);
  for (let i = 0; i < value.length; ++i) {
    out.writeUnsigned(value.charCodeAt(i), 2);
  }
}

function leafKey(node: LeafNode): string {
  switch (node.kind) {
    case 'boolean':
      return `b:${node.value}`;
    case 'integer':
      return `i:${node.value}`;
    case 'real':
      return Object.is(node.value, -0) ? 'r:-0' : `r:${node.value}`;
    case 'string':
      return `s:${node.value}`;
    case 'data':
      return `d:${Buffer.from(node.value).toString('hex')}`;
    case 'date':
      return `t:${node.value.microseconds}`;
    case 'uid':
      return `u:${node.value.value}`;
    case 'null':
      return 'n';
  }
}
