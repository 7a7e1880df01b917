import { XMLBuilder } from "fast-xml-parser";
import { EncodeError } from "../errors/encode-error";
import { LeafNode, Node, NullNode, UidNode } from "../models/node";
import { ILogger } from "../shared/logger";
import { plistDoctype, plistVersion, uidKey, xmlDeclaration } from "./tags";

/** one entry of fast-xml-parser's `preserveOrder` representation */
type OrderedNode = Record<string, unknown>;

function element(name: string, children: OrderedNode[] = []): OrderedNode {
  return { [name]: children };
}

function textElement(name: string, text: string): OrderedNode {
  return text === '' ? element(name) : element(name, [{ '#text': text }]);
}

/**
 * `String()` gives the shortest text that reads back as the same double;
 * only the sign of zero and the non-finite values need spelling out.
 */
export function formatReal(value: number) {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (value === Infinity) {
    return '+infinity';
  }
  if (value === -Infinity) {
    return '-infinity';
  }
  if (Object.is(value, -0)) {
    return '-0';
  }
  return String(value);
}

/** a pending value, or a line (a `<key>` or a closing tag) to emit once the values pushed after it are written */
type Task = { readonly node: Node, readonly depth: number } | { readonly line: string };

/**
 * Serializes a node tree as an XML property list, tab-indented, with Apple's declaration and DOCTYPE.
 *
 * Containers are opened and closed here with an explicit stack; the builder renders and escapes each leaf.
 * A dictionary whose only key is `CF$UID` reads back as a UID.
 */
export class XmlWriter {
  private readonly builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    suppressEmptyNode: true,
  });

  constructor(private readonly logger: ILogger) { }

  static encode(root: Node, logger: ILogger) {
    return new XmlWriter(logger).write(root);
  }

  write(root: Node): string {
    const lines = [xmlDeclaration, plistDoctype, `<plist version="${plistVersion}">`];
    const tasks: Task[] = [{ node: root, depth: 1 }];

    for (let task = tasks.pop(); task; task = tasks.pop()) {
      if ('line' in task) {
        lines.push(task.line);
        continue;
      }

      const { node, depth } = task;
      const indent = '\t'.repeat(depth);
      switch (node.kind) {
        case 'array':
          if (node.items.length === 0) {
            lines.push(`${indent}<array/>`);
            break;
          }
          lines.push(`${indent}<array>`);
          tasks.push({ line: `${indent}</array>` });
          for (let i = node.items.length - 1; i >= 0; --i) {
            tasks.push({ node: node.items[i], depth: depth + 1 });
          }
          break;
        case 'dictionary': {
          if (node.entries.size === 0) {
            lines.push(`${indent}<dict/>`);
            break;
          }
          lines.push(`${indent}<dict>`);
          tasks.push({ line: `${indent}</dict>` });
          const entries = [...node.entries];
          for (let i = entries.length - 1; i >= 0; --i) {
            const [key, value] = entries[i];
            tasks.push({ node: value, depth: depth + 1 });
            tasks.push({ line: `${indent}\t${this.leaf(textElement('key', key))}` });
          }
          break;
        }
        case 'uid':
          lines.push(
            `${indent}<dict>`,
            `${indent}\t${this.leaf(textElement('key', uidKey))}`,
            `${indent}\t${this.leaf(textElement('integer', node.value.value.toString()))}`,
            `${indent}</dict>`,
          );
          break;
        case 'null':
          throw new EncodeError('Null has no XML plist representation', node.kind, 'xml');
        default:
          lines.push(`${indent}${this.leaf(leafElement(node))}`);
      }
    }

    lines.push('</plist>', '');
    const text = lines.join('\n');
    this.logger.debug('DBG: built XML plist of %d characters', text.length);
    return text;
  }

  /** XML parsers turn a raw CR into LF, so it is written as a character reference */
  private leaf(ordered: OrderedNode): string {
    const text: string = this.builder.build([ordered]);
    return text.replace(/\r/g, '&#13;');
  }
}

function leafElement(node: Exclude<LeafNode, UidNode | NullNode>): OrderedNode {
  switch (node.kind) {
    case 'boolean':
      return element(node.value ? 'true' : 'false');
    case 'integer':
      return textElement('integer', node.value.toString());
    case 'real':
      return textElement('real', formatReal(node.value));
    case 'string':
      return textElement('string', node.value);
    case 'data':
      return textElement('data', Buffer.from(node.value).toString('base64'));
    case 'date':
      if (!node.value.hasISOForm) {
        throw new EncodeError(`Date ${node.value.microseconds} µs from 2001 lies outside years 0000-9999`, node.kind, 'xml');
      }
      return textElement('date', node.value.toISOString());
  }
}
