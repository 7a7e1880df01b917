import { DictionaryEntriesLike, ValueLike, dictionaryNodeFromLikes, nodeFromLike } from "./coerce";
import { Handle, HandleInit } from "./handle";
import { BorrowLease, OwnerLease } from "./lease";
import { DictionaryNode, Node, cloneDictionaryNode, cloneNode, touch } from "./node";
import { Item, Value } from "./value";

/**
 * Plist dictionary: string keys in insertion order.
 *
 * Replacing the value of an existing key keeps the key where it was.
 */
export class PlistDictionary extends Handle<DictionaryNode> implements Iterable<[string, Item]> {
  constructor(entries: DictionaryEntriesLike | HandleInit<DictionaryNode> = []) {
    super(entries instanceof HandleInit ? entries : new HandleInit(new OwnerLease(), dictionaryNodeFromLikes(entries), true));
  }

  get size() {
    return this._resolve().entries.size;
  }

  isEmpty() {
    return this.size === 0;
  }

  has(key: string) {
    return this._resolve().entries.has(key);
  }

  get(key: string): Item | undefined {
    const node = this._resolve();
    const child = node.entries.get(key);
    if (child === undefined) {
      return undefined;
    }
    return new Item(new HandleInit(BorrowLease.issue(this._lease, node), child, false));
  }

  /**
   * Adds or replaces the value under `key`.
   * @returns the value previously stored under `key`, now owned by the caller
   */
  insert(key: string, value: ValueLike): Value | undefined {
    const node = this._resolve();
    const replacement = nodeFromLike(value, this._lease.root);
    const previous = node.entries.get(key);
    node.entries.set(key, replacement);
    touch(node);
    return previous === undefined ? undefined : Value._adopt(previous);
  }

  remove(key: string): Value | undefined {
    const node = this._resolve();
    const previous = node.entries.get(key);
    if (previous === undefined) {
      return undefined;
    }
    node.entries.delete(key);
    touch(node);
    return Value._adopt(previous);
  }

  /**
   * Copies every entry of `other` into this dictionary. Existing keys are replaced in place.
   */
  merge(other: PlistDictionary) {
    const node = this._resolve();
    const copies = [...other._resolve().entries].map(([key, value]): [string, Node] => [key, cloneNode(value)]);
    for (const [key, value] of copies) {
      node.entries.set(key, value);
    }
    touch(node);
  }

  clear() {
    const node = this._resolve();
    node.entries.clear();
    touch(node);
  }

  clone(): PlistDictionary {
    return new PlistDictionary(new HandleInit(new OwnerLease(), cloneDictionaryNode(this._resolve()), true));
  }

  *entries(): Generator<[string, Item]> {
    const node = this._resolve();
    const lease = BorrowLease.issue(this._lease, node);
    // snapshot the keys; the lease check below stops iteration once the map changes
    const keys = [...node.entries.keys()];
    for (const key of keys) {
      lease.check();
      const child = node.entries.get(key);
      if (child === undefined) {
        return;
      }
      yield [key, new Item(new HandleInit(lease, child, false))];
    }
    lease.check();
  }

  *keys(): Generator<string> {
    for (const [key] of this.entries()) {
      yield key;
    }
  }

  *values(): Generator<Item> {
    for (const [, item] of this.entries()) {
      yield item;
    }
  }

  [Symbol.iterator]() {
    return this.entries();
  }
}
