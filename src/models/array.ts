import { BoundsError } from "../errors/bounds-error";
import { ValueLike, arrayNodeFromLikes, nodeFromLike } from "./coerce";
import { Handle, HandleInit } from "./handle";
import { BorrowLease, OwnerLease } from "./lease";
import { ArrayNode, cloneArrayNode, cloneNode, touch } from "./node";
import { Item, Value } from "./value";

/**
 * Ordered plist container.
 *
 * `new PlistArray()` owns its items. Arrays obtained from `asArray()` are views into
 * somebody else's tree: mutating them mutates that tree.
 */
export class PlistArray extends Handle<ArrayNode> implements Iterable<Item> {
  constructor(items: Iterable<ValueLike> | HandleInit<ArrayNode> = []) {
    super(items instanceof HandleInit ? items : new HandleInit(new OwnerLease(), arrayNodeFromLikes(items), true));
  }

  get length() {
    return this._resolve().items.length;
  }

  isEmpty() {
    return this.length === 0;
  }

  private checkIndex(index: number, length: number) {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw BoundsError.outOfBounds(index, length);
    }
  }

  private borrow(node: ArrayNode, index: number, lease = BorrowLease.issue(this._lease, node)) {
    return new Item(new HandleInit(lease, node.items[index], false));
  }

  /** borrowed handle on the element, or undefined past the end */
  get(index: number): Item | undefined {
    const node = this._resolve();
    if (!Number.isInteger(index) || index < 0 || index >= node.items.length) {
      return undefined;
    }
    return this.borrow(node, index);
  }

  push(value: ValueLike) {
    const node = this._resolve();
    node.items.push(nodeFromLike(value, this._lease.root));
    touch(node);
  }

  /**
   * @throws BoundsError when `index > length`
   */
  insert(index: number, value: ValueLike) {
    const node = this._resolve();
    if (!Number.isInteger(index) || index < 0 || index > node.items.length) {
      throw BoundsError.outOfBounds(index, node.items.length);
    }
    node.items.splice(index, 0, nodeFromLike(value, this._lease.root));
    touch(node);
  }

  /**
   * Takes the element out of the array; later elements move down by one.
   */
  remove(index: number): Value {
    const node = this._resolve();
    this.checkIndex(index, node.items.length);
    const [removed] = node.items.splice(index, 1);
    touch(node);
    return Value._adopt(removed);
  }

  /** replaces the element and hands back the previous one */
  set(index: number, value: ValueLike): Value {
    const node = this._resolve();
    this.checkIndex(index, node.items.length);
    const replacement = nodeFromLike(value, this._lease.root);
    const previous = node.items[index];
    node.items[index] = replacement;
    touch(node);
    return Value._adopt(previous);
  }

  clear() {
    const node = this._resolve();
    node.items.length = 0;
    touch(node);
  }

  /** independent copies of every element */
  toValues(): Value[] {
    return this._resolve().items.map(item => Value._adopt(cloneNode(item)));
  }

  clone(): PlistArray {
    return new PlistArray(new HandleInit(new OwnerLease(), cloneArrayNode(this._resolve()), true));
  }

  /**
   * Yields borrowed items in index order. Mutating the array mid-way makes the next step throw.
   */
  *[Symbol.iterator](): Iterator<Item> {
    const node = this._resolve();
    const lease = BorrowLease.issue(this._lease, node);
    for (let index = 0; ; ++index) {
      lease.check();
      if (index >= node.items.length) {
        return;
      }
      yield this.borrow(node, index, lease);
    }
  }
}
