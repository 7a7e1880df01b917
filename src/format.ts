import { LeafNode, Node } from "./models/node";

function realText(value: number) {
  return Object.is(value, -0) ? '-0' : String(value);
}

function hex(bytes: Uint8Array) {
  return Buffer.from(bytes).toString('hex');
}

/**
 * Debug rendering of a node tree.
 *
 * Clean: `{"a": 1, "b": ["x", 2.5]}`.
 * Raw: `Dictionary(gen=0){"a": Integer(1), "b": Array(gen=0)[String("x"), Real(2.5)]}`.
 */
export function formatNode(node: Node, clean: boolean): string {
  const formatLeaf = clean ? formatCleanLeaf : formatRawLeaf;
  const parts: string[] = [];
  // nodes still to render, and literal text to emit between them
  const pending: (Node | string)[] = [node];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (typeof next === 'string') {
      parts.push(next);
      continue;
    }

    switch (next.kind) {
      case 'array': {
        parts.push(clean ? '[' : `Array(gen=${next.generation})[`);
        pending.push(']');
        for (let i = next.items.length - 1; i >= 0; --i) {
          pending.push(next.items[i]);
          if (i > 0) {
            pending.push(', ');
          }
        }
        break;
      }
      case 'dictionary': {
        parts.push(clean ? '{' : `Dictionary(gen=${next.generation}){`);
        pending.push('}');
        const entries = [...next.entries];
        for (let i = entries.length - 1; i >= 0; --i) {
          const [key, value] = entries[i];
          pending.push(value, `${JSON.stringify(key)}: `);
          if (i > 0) {
            pending.push(', ');
          }
        }
        break;
      }
      default:
        parts.push(formatLeaf(next));
    }
  }
  return parts.join('');
}

function formatCleanLeaf(node: LeafNode): string {
  switch (node.kind) {
    case 'boolean':
    case 'integer':
      return String(node.value);
    case 'real': {
      const text = realText(node.value);
      // keep reals distinguishable from integers
      return /^-?\d+$/.test(text) ? `${text}.0` : text;
    }
    case 'string':
      return JSON.stringify(node.value);
    case 'data':
      return `<${hex(node.value)}>`;
    case 'date':
      return node.value.toISOString();
    case 'uid':
      return node.value.toString();
    case 'null':
      return 'null';
  }
}

function formatRawLeaf(node: LeafNode): string {
  switch (node.kind) {
    case 'boolean':
      return `Boolean(${node.value})`;
    case 'integer':
      return `Integer(${node.value})`;
    case 'real':
      return `Real(${realText(node.value)})`;
    case 'string':
      return `String(${JSON.stringify(node.value)})`;
    case 'data':
      return `Data(${node.value.byteLength})<${hex(node.value)}>`;
    case 'date':
      return `Date(microseconds=${node.value.microseconds})`;
    case 'uid':
      return `Uid(${node.value.value})`;
    case 'null':
      return 'Null';
  }
}
