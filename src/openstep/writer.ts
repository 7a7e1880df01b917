import { EncodeError } from "../errors/encode-error";
import { LeafNode, Node } from "../models/node";
import { ILogger } from "../shared/logger";
import { formatReal } from "../xml/writer";

const unquotedPattern = /^[A-Za-z0-9_$/:.-]+$/;

export interface IOpenStepWriterOptions {
  /** one entry per line, tab-indented; everything on one line otherwise */
  readonly prettify: boolean;
}

type Task = { readonly node: Node, readonly depth: number } | string;

/** Quotes `value` unless it is made only of characters that need none. */
export function quoteString(value: string) {
  if (unquotedPattern.test(value)) {
    return value;
  }

  let quoted = '"';
  for (const char of value) {
    const code = char.charCodeAt(0);
    switch (char) {
      case '"':
      case '\\':
        quoted += `\\${char}`;
        break;
      case '\n':
        quoted += '\\n';
        break;
      case '\t':
        quoted += '\\t';
        break;
      case '\r':
        quoted += '\\r';
        break;
      default:
        quoted += code < 0x20 || code === 0x7F ? `\\U${code.toString(16).padStart(4, '0')}` : char;
    }
  }
  return `${quoted}"`;
}

/** `<0001feff 0a>`: hex digits in groups of four bytes */
function hexData(bytes: Uint8Array) {
  const hex = Buffer.from(bytes).toString('hex');
  return `<${hex.match(/.{1,8}/g)?.join(' ') ?? ''}>`;
}

/**
 * Serializes a node tree as a NeXTSTEP/OpenStep ASCII property list.
 *
 * Booleans are written `YES`/`NO` and numbers as their decimal text; all of them read back
 * as strings. Dates and UIDs have no OpenStep spelling and fail to encode.
 */
export class OpenStepWriter {
  constructor(private readonly logger: ILogger, private readonly options: IOpenStepWriterOptions) { }

  static encode(root: Node, logger: ILogger, options: IOpenStepWriterOptions) {
    return new OpenStepWriter(logger, options).write(root);
  }

  write(root: Node): string {
    const { prettify } = this.options;
    const newline = (depth: number) => prettify ? `\n${'\t'.repeat(depth)}` : '';
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
            parts.push('()');
            break;
          }
          parts.push('(');
          tasks.push(`${newline(depth)})`);
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
            tasks.push(';');
            tasks.push({ node: value, depth: depth + 1 });
            tasks.push(`${newline(depth + 1)}${quoteString(key)}${prettify ? ' = ' : '='}`);
          }
          break;
        }
        default:
          parts.push(leafOpenStep(node));
      }
    }

    if (prettify) {
      parts.push('\n');
    }
    const text = parts.join('');
    this.logger.debug('DBG: built OpenStep plist of %d characters', text.length);
    return text;
  }
}

function leafOpenStep(node: LeafNode): string {
  switch (node.kind) {
    case 'boolean':
      return node.value ? 'YES' : 'NO';
    case 'integer':
      return node.value.toString();
    case 'real':
      return quoteString(formatReal(node.value));
    case 'string':
      return quoteString(node.value);
    case 'data':
      return hexData(node.value);
    case 'date':
    case 'uid':
    case 'null':
      throw new EncodeError(`Values of kind ${node.kind} have no OpenStep representation`, node.kind, 'openstep');
  }
}
