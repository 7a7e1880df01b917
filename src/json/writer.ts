import { EncodeError } from "../errors/encode-error";
import { LeafNode, Node } from "../models/node";
import { ILogger } from "../shared/logger";

export interface IJsonWriterOptions {
  /** two-space indentation and a space after each colon; compact otherwise */
  readonly prettify: boolean;
}

type Task = { readonly node: Node, readonly depth: number } | string;

/**
 * Serializes a node tree as JSON.
 *
 * Data becomes a base64 string and reals always carry a fraction or exponent. Dates, UIDs
 * and non-finite reals have no JSON spelling and fail to encode.
 */
export class JsonWriter {
  constructor(private readonly logger: ILogger, private readonly options: IJsonWriterOptions) { }

  static encode(root: Node, logger: ILogger, options: IJsonWriterOptions) {
    return new JsonWriter(logger, options).write(root);
  }

  write(root: Node): string {
    const { prettify } = this.options;
    const newline = (depth: number) => prettify ? `\n${'  '.repeat(depth)}` : '';
    const parts: string[] = [];
    const tasks: Task[] = [{ node: root, depth: 0 }];

    for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
      if (typeof task === 'string') {
        parts.push(task);
        continue;
      }

      const { node, depth } = task;
      switch (node.kind) {
        case 'array': {
          if (node.items.length === 0) {
            parts.push('[]');
            break;
          }
          parts.push('[');
          tasks.push(`${newline(depth)}]`);
          for (let i = node.items.length - 1; i >= 0; --i) {
            tasks.push({ node: node.items[i], depth: depth + 1 });
            tasks.push(`${i > 0 ? ',' : ''}${newline(depth + 1)}`);
          }
          break;
        }
        case 'dictionary': {
          if (node.entries.size === 0) {
            parts.push('{}');
            break;
          }
          parts.push('{');
          tasks.push(`${newline(depth)}}`);
          const entries = [...node.entries];
          for (let i = entries.length - 1; i >= 0; --i) {
            const [key, value] = entries[i];
            tasks.push({ node: value, depth: depth + 1 });
            tasks.push(`${i > 0 ? ',' : ''}${newline(depth + 1)}${JSON.stringify(key)}:${prettify ? ' ' : ''}`);
          }
          break;
        }
        default:
          parts.push(leafJson(node));
      }
    }

    const text = parts.join('');
    this.logger.debug('DBG: built JSON plist of %d characters', text.length);
    return text;
  }
}

function leafJson(node: LeafNode): string {
  switch (node.kind) {
    case 'boolean':
    case 'integer':
      return String(node.value);
    case 'real': {
      if (!Number.isFinite(node.value)) {
        throw new EncodeError(`JSON cannot hold the real ${node.value}`, node.kind, 'json');
      }
      const text = Object.is(node.value, -0) ? '-0' : String(node.value);
      return /^-?\d+$/.test(text) ? `${text}.0` : text;
    }
    case 'string':
      return JSON.stringify(node.value);
    case 'data':
      return JSON.stringify(Buffer.from(node.value).toString('base64'));
    case 'date':
    case 'uid':
    case 'null':
      throw new EncodeError(`Values of kind ${node.kind} have no JSON representation`, node.kind, 'json');
  }
}
