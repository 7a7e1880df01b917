import { PlistDate } from "./date";
import { assert } from "../assert";
import { ContainerNode, LeafNode, Node, isContainer } from "./node";
import { Uid } from "./uid";

/**
 * Detached, frozen JavaScript snapshot of a plist tree. Integers stay `bigint` so
 * values beyond 2^53 survive; dictionaries become plain objects in key order.
 */
export type PlainValue =
  | boolean
  | bigint
  | number
  | string
  | Uint8Array
  | PlistDate
  | Uid
  | null
  | readonly PlainValue[]
  | { readonly [key: string]: PlainValue };

export function nodeToPlain(root: Node): PlainValue {
  // every container after its parent, so walking backwards converts children first
  const containers: ContainerNode[] = [];
  const pending: Node[] = [root];
  for (let node = pending.pop(); node; node = pending.pop()) {
    if (node.kind === 'array') {
      containers.push(node);
      node.items.forEach(item => pending.push(item));
    }
    else if (node.kind === 'dictionary') {
      containers.push(node);
      node.entries.forEach(value => pending.push(value));
    }
  }

  const converted = new Map<ContainerNode, PlainValue>();
  const plainOf = (node: Node): PlainValue => {
    if (!isContainer(node)) {
      return leafToPlain(node);
    }
    const plain = converted.get(node);
    assert(plain !== undefined, 'children are converted before their parents');
    return plain;
  };

  for (let i = containers.length - 1; i >= 0; --i) {
    const node = containers[i];
    converted.set(node, node.kind === 'array'
      ? Object.freeze(node.items.map(plainOf))
      : Object.freeze(Object.fromEntries([...node.entries].map(([key, value]): [string, PlainValue] => [key, plainOf(value)]))));
  }
  return plainOf(root);
}

function leafToPlain(node: LeafNode): PlainValue {
  switch (node.kind) {
    case 'boolean':
    case 'integer':
    case 'real':
    case 'string':
    case 'date':
    case 'uid':
      return node.value;
    case 'data':
      return node.value.slice();
    case 'null':
      return null;
  }
}
