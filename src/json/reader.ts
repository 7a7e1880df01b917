import { Node, maxInteger, minInteger, newArrayNode, newDictionaryNode } from "../models/node";
import { ILogger } from "../shared/logger";
import { TextScanner } from "../shared/text-scanner";

const numberPattern = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/y;
const hexQuadPattern = /[0-9a-fA-F]{4}/y;
const stringSpecialPattern = /["\\\u0000-\u001f]/g;

const escapes: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

type Frame =
  | { readonly kind: 'array', readonly items: Node[] }
  | { readonly kind: 'object', readonly entries: Map<string, Node>, key: string, count: number };

/**
 * Parses a JSON document into a node tree.
 *
 * Numbers without a fraction or exponent are integers (exact to 64 bits), the rest reals.
 * `null` has no counterpart and is rejected. Containers are read with an explicit stack.
 */
export class JsonReader extends TextScanner {
  constructor(text: string, logger: ILogger) {
    super(text, logger);
  }

  static decode(text: string, logger: ILogger) {
    return new JsonReader(text, logger).read();
  }

  read(): Node {
    const stack: Frame[] = [];
    let value = this.readValue(stack);

    for (;;) {
      if (value !== undefined) {
        if (stack.length === 0) {
          this.skipWhitespace();
          if (!this.atEnd) {
            throw this.unexpected('expected the end of the document');
          }
          return value;
        }
        this.add(stack[stack.length - 1], value);
      }

      const frame = stack[stack.length - 1];
      const size = frame.kind === 'array' ? frame.items.length : frame.count;
      this.skipWhitespace();
      if (this.peek() === (frame.kind === 'array' ? ']' : '}')) {
        this.offset++;
        stack.pop();
        value = frame.kind === 'array' ? newArrayNode(frame.items) : newDictionaryNode(frame.entries);
        continue;
      }

      if (size > 0) {
        this.expect(',');
        this.skipWhitespace();
      }
      if (frame.kind === 'object') {
        frame.key = this.readString();
        this.skipWhitespace();
        this.expect(':');
      }
      value = this.readValue(stack);
    }
  }

  private add(frame: Frame, value: Node) {
    if (frame.kind === 'array') {
      frame.items.push(value);
      return;
    }

    if (frame.entries.has(frame.key)) {
      this.logger.warn('JSON object repeats key %s; the last value wins', JSON.stringify(frame.key));
    }
    frame.entries.set(frame.key, value);
    frame.count++;
  }

  /** a leaf, or `undefined` after pushing a frame for a container */
  private readValue(stack: Frame[]): Node | undefined {
    this.skipWhitespace();
    const start = this.offset;

    switch (this.peek()) {
      case '[':
        this.offset++;
        stack.push({ kind: 'array', items: [] });
        return undefined;
      case '{':
        this.offset++;
        stack.push({ kind: 'object', entries: new Map(), key: '', count: 0 });
        return undefined;
      case '"':
        return { kind: 'string', value: this.readString() };
      case 't':
      case 'f':
      case 'n': {
        const word = this.match(/true|false|null/y)?.[0];
        if (word === 'null') {
          throw this.fail('JSON null has no plist counterpart', start);
        }
        if (word === undefined) {
          throw this.unexpected('expected a value');
        }
        return { kind: 'boolean', value: word === 'true' };
      }
    }

    const number = this.match(numberPattern);
    if (!number) {
      throw this.unexpected('expected a value');
    }
    if (number[1] !== undefined || number[2] !== undefined) {
      return { kind: 'real', value: Number(number[0]) };
    }

    const value = BigInt(number[0]);
    if (value < minInteger || value > maxInteger) {
      throw this.fail(`Integer ${number[0]} does not fit in 64 bits`, start);
    }
    return { kind: 'integer', value };
  }

  private readString(): string {
    this.expect('"');
    let value = '';

    for (;;) {
      stringSpecialPattern.lastIndex = this.offset;
      const special = stringSpecialPattern.exec(this.text);
      if (!special) {
        this.offset = this.text.length;
        throw this.unexpected('expected the end of the string');
      }
      value += this.text.slice(this.offset, special.index);
      this.offset = special.index;

      const char = this.peek();
      if (char === '"') {
        this.offset++;
        return value;
      }
      if (char !== '\\') {
        throw this.fail('Control characters must be escaped inside JSON strings');
      }

      this.offset++;
      const escape = this.peek();
      this.offset++;
      if (escape === 'u') {
        const hex = this.match(hexQuadPattern);
        if (!hex) {
          throw this.unexpected('expected four hex digits');
        }
        value += String.fromCharCode(parseInt(hex[0], 16));
      }
      else if (escape in escapes) {
        value += escapes[escape];
      }
      else {
        throw this.fail(`Invalid escape \\${escape}`, this.offset - 2);
      }
    }
  }
}
