import { Node, newArrayNode, newDictionaryNode } from "../models/node";
import { ILogger } from "../shared/logger";
import { TextScanner } from "../shared/text-scanner";

/** characters a string may use without quotes */
const unquotedPattern = /[A-Za-z0-9_$/:.-]+/y;

const hexPattern = /^[0-9a-fA-F]*$/;
const octalPattern = /[0-7]{1,3}/y;
const unicodeEscapePattern = /[0-9a-fA-F]{1,4}/y;

const escapes: Readonly<Record<string, string>> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

type Frame =
  | { readonly kind: 'array', readonly items: Node[] }
  | { readonly kind: 'dictionary', readonly entries: Map<string, Node>, key: string };

/**
 * Parses a NeXTSTEP/OpenStep ASCII property list into a node tree.
 *
 * The format only knows strings, data, arrays and dictionaries, so `12` or `YES` read back
 * as strings. Line and block comments count as whitespace. Containers are read with an
 * explicit stack.
 */
export class OpenStepReader extends TextScanner {
  constructor(text: string, logger: ILogger) {
    super(text, logger);
  }

  static decode(text: string, logger: ILogger) {
    return new OpenStepReader(text, logger).read();
  }

  read(): Node {
    const stack: Frame[] = [];
    let value = this.readValue(stack);

    for (;;) {
      if (value !== undefined) {
        if (stack.length === 0) {
          this.skipSpace();
          if (!this.atEnd) {
            throw this.unexpected('expected the end of the document');
          }
          return value;
        }
        this.add(stack[stack.length - 1], value);
      }

      const frame = stack[stack.length - 1];
      this.skipSpace();
      if (frame.kind === 'array') {
        if (this.peek() === ')') {
          this.offset++;
          stack.pop();
          value = newArrayNode(frame.items);
          continue;
        }
        // a trailing comma before ')' is allowed
        if (frame.items.length > 0) {
          this.expect(',');
          this.skipSpace();
          if (this.peek() === ')') {
            value = undefined;
            continue;
          }
        }
        value = this.readValue(stack);
        continue;
      }

      if (this.peek() === '}') {
        this.offset++;
        stack.pop();
        value = newDictionaryNode(frame.entries);
        continue;
      }
      frame.key = this.readKey();
      this.skipSpace();
      this.expect('=');
      value = this.readValue(stack);
    }
  }

  private add(frame: Frame, value: Node) {
    if (frame.kind === 'array') {
      frame.items.push(value);
      return;
    }

    this.skipSpace();
    this.expect(';');
    if (frame.entries.has(frame.key)) {
      this.logger.warn('Dictionary repeats key %s; the last value wins', JSON.stringify(frame.key));
    }
    frame.entries.set(frame.key, value);
  }

  /** whitespace and comments */
  private skipSpace() {
    for (;;) {
      this.match(/\s+/y);
      if (this.text.startsWith('//', this.offset)) {
        const end = this.text.indexOf('\n', this.offset);
        this.offset = end === -1 ? this.text.length : end + 1;
      }
      else if (this.text.startsWith('/*', this.offset)) {
        const end = this.text.indexOf('*/', this.offset + 2);
        if (end === -1) {
          throw this.fail('Unterminated comment');
        }
        this.offset = end + 2;
      }
      else {
        return;
      }
    }
  }

  private readKey(): string {
    const start = this.offset;
    const key = this.readString();
    if (key === undefined) {
      throw this.fail('Dictionary keys must be strings', start);
    }
    return key;
  }

  /** a leaf, or `undefined` after pushing a frame for a container */
  private readValue(stack: Frame[]): Node | undefined {
    this.skipSpace();

    switch (this.peek()) {
      case '(':
        this.offset++;
        stack.push({ kind: 'array', items: [] });
        return undefined;
      case '{':
        this.offset++;
        stack.push({ kind: 'dictionary', entries: new Map(), key: '' });
        return undefined;
      case '<':
        return { kind: 'data', value: this.readData() };
    }

    const value = this.readString();
    if (value === undefined) {
      throw this.unexpected('expected a value');
    }
    return { kind: 'string', value };
  }

  private readData(): Uint8Array {
    const start = this.offset;
    this.expect('<');
    const end = this.text.indexOf('>', this.offset);
    if (end === -1) {
      throw this.fail('Unterminated data', start);
    }

    const hex = this.text.slice(this.offset, end).replace(/\s+/g, '');
    if (hex.length % 2 !== 0 || !hexPattern.test(hex)) {
      throw this.fail('Data must be an even number of hex digits', start);
    }
    this.offset = end + 1;
    return new Uint8Array(Buffer.from(hex, 'hex'));
  }

  /** a quoted or unquoted string, or `undefined` when none starts at the cursor */
  private readString(): string | undefined {
    const quote = this.peek();
    if (quote !== '"' && quote !== '\'') {
      return this.match(unquotedPattern)?.[0];
    }

    const start = this.offset;
    this.offset++;
    let value = '';
    for (;;) {
      if (this.atEnd) {
        throw this.fail('Unterminated string', start);
      }

      const char = this.peek();
      this.offset++;
      if (char === quote) {
        return value;
      }
      value += char === '\\' ? this.readEscape() : char;
    }
  }

  private readEscape(): string {
    const char = this.peek();
    if (char === 'U' || char === 'u') {
      this.offset++;
      const hex = this.match(unicodeEscapePattern);
      if (!hex) {
        throw this.unexpected('expected hex digits');
      }
      return String.fromCharCode(parseInt(hex[0], 16));
    }

    const octal = this.match(octalPattern);
    if (octal) {
      return String.fromCharCode(parseInt(octal[0], 8));
    }

    if (this.atEnd) {
      throw this.unexpected('expected an escaped character');
    }
    this.offset++;
    return escapes[char] ?? char;
  }
}
