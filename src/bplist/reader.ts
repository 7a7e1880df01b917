import { BaseReader } from "./base-reader";
import { bplistMagicNumber, headerByteLength, supportedBplistVersion, versionByteLength } from "../constants/magic-number";
import { DecodeError, DecodeErrorReason } from "../errors/decode-error";
import { DictionaryNode, Node, newArrayNode, newDictionaryNode } from "../models/node";
import { ILogger } from "../shared/logger";
import { ObjectTable } from "./models/object-table";
import { ObjectTableArrayLike, ObjectTableDict } from "./models/object-table-entries";
import { OffsetTable } from "./models/offset-table";
import { Trailer } from "./models/trailer";
import { ObjRef } from "./types/bplist-index-aliases";

/**
 * Parses a complete `bplist00` document into a node tree.
 *
 * Objects referenced from several containers are rebuilt for each reference so the
 * resulting tree never shares a container; a reference back into an ancestor is rejected.
 */
export class Reader extends BaseReader {
  readonly version: string;

  readonly trailer: Trailer;
  readonly offsetTable: OffsetTable;
  readonly objectTable: ObjectTable;

  constructor(bytes: Uint8Array, logger: ILogger) {
    super(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength), logger);

    const magicNumber = this.readAscii(0, Math.min(bplistMagicNumber.length, this.view.byteLength));
    if (!bplistMagicNumber.startsWith(magicNumber)) {
      throw DecodeError.malformed(`Invalid magicNumber (at start of file); must be ${bplistMagicNumber} but got ${JSON.stringify(magicNumber)}`, { offset: 0 });
    }
    if (this.view.byteLength < headerByteLength) {
      throw DecodeError.truncated(`Binary plist header needs ${headerByteLength} bytes, got ${this.view.byteLength}`, { offset: 0 });
    }

    this.version = this.readAscii(bplistMagicNumber.length, versionByteLength);
    if (this.version !== supportedBplistVersion) {
      throw new DecodeError(`Unsupported binary plist version ${JSON.stringify(this.version)}; only ${supportedBplistVersion} is understood`, DecodeErrorReason.unsupportedVersion, { offset: bplistMagicNumber.length });
    }

    this.trailer = Trailer.fromBuffer(this.view, logger);
    this.offsetTable = new OffsetTable(this.view, this.trailer, logger);
    this.objectTable = new ObjectTable(this.view, this.trailer, logger);
  }

  static readonly minNodeBudget = 65_536;
  static readonly nodesPerObject = 256;

  /**
   * Shared containers are copied once per reference, so a small document can describe an
   * exponentially large tree; building stops once it passes this many nodes.
   */
  get nodeBudget() {
    return Math.max(Reader.minNodeBudget, this.trailer.numObjects * Reader.nodesPerObject);
  }

  buildTopLevelObject(): Node {
    const budget = this.nodeBudget;
    const stack: Container[] = [];
    // refs on the stack, for rejecting a container that reaches itself
    const ancestors = new Set<ObjRef>();
    let built = 0;

    const open = (ref: ObjRef) => {
      if (++built > budget) {
        throw DecodeError.malformed(`Document expands to more than ${budget} values through shared references`, { objRef: ref });
      }
      return this.open(ref, ancestors);
    };

    let opened = open(this.trailer.topObject);
    for (;;) {
      if (opened instanceof ArrayInProgress || opened instanceof DictInProgress) {
        stack.push(opened);
      }
      else if (stack.length === 0) {
        return opened;
      }
      else {
        stack[stack.length - 1].accept(opened);
      }

      const container = stack[stack.length - 1];
      const childRef = container.nextRef();
      if (childRef !== undefined) {
        opened = open(childRef);
      }
      else {
        stack.pop();
        ancestors.delete(container.ref);
        opened = container.finish();
      }
    }
  }

  private open(ref: ObjRef, ancestors: Set<ObjRef>): Node | Container {
    const tableEntry = this.getObjectEntryByObjRef(ref);

    if (!(tableEntry instanceof ObjectTableArrayLike) && !(tableEntry instanceof ObjectTableDict)) {
      return tableEntry;
    }

    if (ancestors.has(ref)) {
      throw DecodeError.malformed(`Object ${ref} contains itself`, { objRef: ref });
    }
    ancestors.add(ref);

    return tableEntry instanceof ObjectTableArrayLike
      ? new ArrayInProgress(ref, tableEntry.objrefs)
      : new DictInProgress(ref, tableEntry, this, this.logger);
  }

  getObjectEntryByObjRef(ref: ObjRef) {
    const offset = this.offsetTable.getObjectTableOffsetByObjRef(ref);

    return this.objectTable.getEntryByObjectTableOffset(offset);
  }
}

class ArrayInProgress {
  private readonly items: Node[] = [];
  private next = 0;

  constructor(readonly ref: ObjRef, private readonly objrefs: readonly ObjRef[]) { }

  nextRef(): ObjRef | undefined {
    return this.objrefs[this.next++];
  }

  accept(node: Node) {
    this.items.push(node);
  }

  finish(): Node {
    return newArrayNode(this.items);
  }
}

class DictInProgress {
  private readonly entries = new Map<string, Node>();
  private next = 0;
  private key = '';

  constructor(
    readonly ref: ObjRef,
    private readonly tableEntry: ObjectTableDict,
    private readonly reader: Reader,
    private readonly logger: ILogger,
  ) { }

  /** resolves the key of the next entry and hands back its value's ref */
  nextRef(): ObjRef | undefined {
    if (this.next >= this.tableEntry.entries.length) {
      return undefined;
    }

    const [keyRef, valueRef] = this.tableEntry.entries[this.next++];
    const key = this.reader.getObjectEntryByObjRef(keyRef);
    if (!('kind' in key) || key.kind !== 'string') {
      throw DecodeError.malformed(`Dictionary ${this.ref} has a key that is not a string (object ${keyRef})`, { objRef: keyRef });
    }
    if (this.entries.has(key.value)) {
      this.logger.warn('Dictionary %d repeats key %s; the last value wins', this.ref, JSON.stringify(key.value));
    }
    this.key = key.value;
    return valueRef;
  }

  accept(node: Node) {
    this.entries.set(this.key, node);
  }

  finish(): DictionaryNode {
    return newDictionaryNode(this.entries);
  }
}

type Container = ArrayInProgress | DictInProgress;
