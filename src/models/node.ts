import { PlistDate } from "./date";
import { Uid } from "./uid";

/*
 * The in-memory tree the codecs read and write. Nodes never leave the library:
 * callers only ever see them through the handles in `handle.ts`, which enforce ownership.
 * Leaf nodes are immutable and may be shared; container nodes belong to exactly one parent.
 */

export type BooleanNode = { readonly kind: 'boolean', readonly value: boolean };
export type IntegerNode = { readonly kind: 'integer', readonly value: bigint };
export type RealNode = { readonly kind: 'real', readonly value: number };
export type StringNode = { readonly kind: 'string', readonly value: string };
export type DataNode = { readonly kind: 'data', readonly value: Uint8Array };
export type DateNode = { readonly kind: 'date', readonly value: PlistDate };
export type UidNode = { readonly kind: 'uid', readonly value: Uid };
export type NullNode = { readonly kind: 'null' };

export interface ArrayNode {
  readonly kind: 'array';
  readonly items: Node[];
  /** bumped on every structural change; borrowed handles remember the value they were issued at */
  generation: number;
}

export interface DictionaryNode {
  readonly kind: 'dictionary';
  readonly entries: Map<string, Node>;
  generation: number;
}

export type LeafNode = BooleanNode | IntegerNode | RealNode | StringNode | DataNode | DateNode | UidNode | NullNode;
export type ContainerNode = ArrayNode | DictionaryNode;
export type Node = LeafNode | ContainerNode;

export type ValueKind = Node['kind'];

export const minInteger = -(2n ** 63n);
export const maxInteger = 2n ** 64n - 1n;

export const nullNode: NullNode = Object.freeze({ kind: 'null' });

export function newArrayNode(items: Node[] = []): ArrayNode {
  return { kind: 'array', items, generation: 0 };
}

export function newDictionaryNode(entries = new Map<string, Node>()): DictionaryNode {
  return { kind: 'dictionary', entries, generation: 0 };
}

export function isContainer(node: Node): node is ContainerNode {
  return node.kind === 'array' || node.kind === 'dictionary';
}

export function touch(container: ContainerNode) {
  container.generation++;
}

type CopyTask =
  | { readonly kind: 'array', readonly source: ArrayNode, readonly target: ArrayNode }
  | { readonly kind: 'dictionary', readonly source: DictionaryNode, readonly target: DictionaryNode };

/** fills each target with copies of its source's children, walking the tree with an explicit stack */
function copyContainers(pending: CopyTask[]) {
  const copyOf = (node: Node): Node => {
    switch (node.kind) {
      case 'array': {
        const target = newArrayNode();
        pending.push({ kind: 'array', source: node, target });
        return target;
      }
      case 'dictionary': {
        const target = newDictionaryNode();
        pending.push({ kind: 'dictionary', source: node, target });
        return target;
      }
      default:
        return node;
    }
  };

  for (let task = pending.pop(); task; task = pending.pop()) {
    if (task.kind === 'array') {
      for (const item of task.source.items) {
        task.target.items.push(copyOf(item));
      }
    }
    else {
      for (const [key, value] of task.source.entries) {
        task.target.entries.set(key, copyOf(value));
      }
    }
  }
}

export function cloneArrayNode(node: ArrayNode): ArrayNode {
  const target = newArrayNode();
  copyContainers([{ kind: 'array', source: node, target }]);
  return target;
}

export function cloneDictionaryNode(node: DictionaryNode): DictionaryNode {
  const target = newDictionaryNode();
  copyContainers([{ kind: 'dictionary', source: node, target }]);
  return target;
}

/** containers are copied; leaves are immutable and shared */
export function cloneNode(node: Node): Node {
  switch (node.kind) {
    case 'array':
      return cloneArrayNode(node);
    case 'dictionary':
      return cloneDictionaryNode(node);
    default:
      return node;
  }
}

export function nodesEqual(a: Node, b: Node): boolean {
  const pending: [Node, Node][] = [[a, b]];
  for (let pair = pending.pop(); pair; pair = pending.pop()) {
    if (!shallowEqual(pair[0], pair[1], pending)) {
      return false;
    }
  }
  return true;
}

/** compares leaves, or the shape of two containers, queueing their children for comparison */
function shallowEqual(a: Node, b: Node, pending: [Node, Node][]): boolean {
  if (a === b) {
    return true;
  }

  switch (a.kind) {
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'integer':
      return b.kind === 'integer' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'real':
      return b.kind === 'real' && Object.is(a.value, b.value);
    case 'data':
      return b.kind === 'data' && bytesEqual(a.value, b.value);
    case 'date':
      return b.kind === 'date' && a.value.equals(b.value);
    case 'uid':
      return b.kind === 'uid' && a.value.equals(b.value);
    case 'null':
      return b.kind === 'null';
    case 'array':
      if (b.kind !== 'array' || a.items.length !== b.items.length) {
        return false;
      }
      a.items.forEach((item, idx) => pending.push([item, b.items[idx]]));
      return true;
    case 'dictionary': {
      if (b.kind !== 'dictionary' || a.entries.size !== b.entries.size) {
        return false;
      }
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined) {
          return false;
        }
        pending.push([value, other]);
      }
      return true;
    }
  }
}

export function bytesEqual(a: Uint8Array, b: Uint8Array) {
  if (a.byteLength !== b.byteLength) {
    return false;
  }
  for (let i = 0; i < a.byteLength; ++i) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

