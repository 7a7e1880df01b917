import { ConversionError } from "../errors/conversion-error";
import { ConstructionError } from "../errors/construction-error";
import { PlistArray } from "./array";
import { ValueLike, bigintToNode, nodeFromLike } from "./coerce";
import { PlistDate } from "./date";
import { PlistDictionary } from "./dictionary";
import { Handle, HandleInit } from "./handle";
import { OwnerLease } from "./lease";
import { ArrayNode, DictionaryNode, Node, ValueKind, cloneNode, nullNode } from "./node";
import { Uid } from "./uid";

/**
 * Read access shared by owning {@link Value}s and borrowed {@link Item}s.
 *
 * `as*()` never converts between kinds: an Integer is not a Real and `asReal()` on it
 * returns undefined.
 */
export abstract class ValueView extends Handle {
  asBoolean(): boolean | undefined {
    const node = this._resolve();
    return node.kind === 'boolean' ? node.value : undefined;
  }

  asInteger(): bigint | undefined {
    const node = this._resolve();
    return node.kind === 'integer' ? node.value : undefined;
  }

  asReal(): number | undefined {
    const node = this._resolve();
    return node.kind === 'real' ? node.value : undefined;
  }

  asString(): string | undefined {
    const node = this._resolve();
    return node.kind === 'string' ? node.value : undefined;
  }

  /** a copy; changing it does not change the tree */
  asData(): Uint8Array | undefined {
    const node = this._resolve();
    return node.kind === 'data' ? node.value.slice() : undefined;
  }

  asDate(): PlistDate | undefined {
    const node = this._resolve();
    return node.kind === 'date' ? node.value : undefined;
  }

  asUid(): Uid | undefined {
    const node = this._resolve();
    return node.kind === 'uid' ? node.value : undefined;
  }

  /**
   * Container view sharing this handle's lease: it can mutate the array and dies with this handle.
   */
  asArray(): PlistArray | undefined {
    const node = this._resolve();
    return node.kind === 'array' ? new PlistArray(new HandleInit(this._lease, node, false)) : undefined;
  }

  asDictionary(): PlistDictionary | undefined {
    const node = this._resolve();
    return node.kind === 'dictionary' ? new PlistDictionary(new HandleInit(this._lease, node, false)) : undefined;
  }

  isNull() {
    return this._resolve().kind === 'null';
  }

  /** an independently owned deep copy */
  clone(): Value {
    return Value._adopt(cloneNode(this._resolve()));
  }
}

/**
 * Owning handle on the root of a plist tree.
 */
export class Value extends ValueView {
  constructor(like: ValueLike | HandleInit) {
    super(like instanceof HandleInit ? like : new HandleInit(new OwnerLease(), nodeFromLike(like), true));
  }

  /** @internal */
  static _adopt(node: Node) {
    return new Value(new HandleInit(new OwnerLease(), node, true));
  }

  static from(like: ValueLike) {
    return new Value(like);
  }

  static boolean(value: boolean) {
    return this._adopt({ kind: 'boolean', value });
  }

  /**
   * @throws ConstructionError for a non-integral number or one past the 64-bit range
   */
  static integer(value: bigint | number) {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new ConstructionError(`Integer must be a safe integer, got ${value}`, value);
    }
    return this._adopt(bigintToNode(BigInt(value)));
  }

  static real(value: number) {
    return this._adopt({ kind: 'real', value });
  }

  static string(value: string) {
    return this._adopt({ kind: 'string', value });
  }

  static data(value: Uint8Array | ArrayBuffer) {
    return this._adopt(nodeFromLike(value));
  }

  static date(value: Date | PlistDate) {
    return this._adopt(nodeFromLike(value));
  }

  static uid(value: Uid | bigint | number) {
    return this._adopt({ kind: 'uid', value: value instanceof Uid ? value : new Uid(value) });
  }

  static null() {
    return this._adopt(nullNode);
  }

  private consume<K extends ValueKind>(expected: K): Extract<Node, { kind: K }> {
    const node = this._resolve();
    if (!isKind(node, expected)) {
      throw new ConversionError(expected, node.kind, this);
    }
    this._lease.root.consume();
    return node;
  }

  intoBoolean(): boolean {
    return this.consume('boolean').value;
  }

  intoInteger(): bigint {
    return this.consume('integer').value;
  }

  intoReal(): number {
    return this.consume('real').value;
  }

  intoString(): string {
    return this.consume('string').value;
  }

  intoData(): Uint8Array {
    return this.consume('data').value.slice();
  }

  intoDate(): PlistDate {
    return this.consume('date').value;
  }

  intoUid(): Uid {
    return this.consume('uid').value;
  }

  intoArray(): PlistArray {
    const node: ArrayNode = this.consume('array');
    return new PlistArray(new HandleInit(new OwnerLease(), node, true));
  }

  intoDictionary(): PlistDictionary {
    const node: DictionaryNode = this.consume('dictionary');
    return new PlistDictionary(new HandleInit(new OwnerLease(), node, true));
  }
}

function isKind<K extends ValueKind>(node: Node, kind: K): node is Extract<Node, { kind: K }> {
  return node.kind === kind;
}

/**
 * Borrowed handle on a child of a container. Valid until the container changes shape.
 */
export class Item extends ValueView {
  /** @internal */
  constructor(init: HandleInit) {
    super(init);
  }
}
