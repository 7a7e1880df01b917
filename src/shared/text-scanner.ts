import { DecodeError } from "../errors/decode-error";
import { IParseContext } from "../parse-context";
import { ILogger } from "./logger";

/**
 * Cursor over the text of a JSON or OpenStep plist. Failures carry the 1-based line and column
 * of the cursor.
 */
export class TextScanner {
  protected offset = 0;

  constructor(
    protected readonly text: string,
    protected readonly logger: ILogger,
  ) { }

  protected get atEnd() {
    return this.offset >= this.text.length;
  }

  /** the character under the cursor, or `''` at the end */
  protected peek() {
    return this.text.charAt(this.offset);
  }

  protected skipWhitespace() {
    while (/[ \t\n\r]/.test(this.peek())) {
      this.offset++;
    }
  }

  protected expect(char: string) {
    if (this.peek() !== char) {
      throw this.unexpected(`expected ${JSON.stringify(char)}`);
    }
    this.offset++;
  }

  /** consumes `pattern` (a sticky regex) at the cursor */
  protected match(pattern: RegExp): RegExpExecArray | undefined {
    pattern.lastIndex = this.offset;
    const match = pattern.exec(this.text);
    if (!match) {
      return undefined;
    }
    this.offset += match[0].length;
    return match;
  }

  protected unexpected(wanted: string) {
    const found = this.atEnd ? 'end of input' : JSON.stringify(this.peek());
    return this.fail(`Unexpected ${found}, ${wanted}`);
  }

  protected fail(message: string, offset = this.offset) {
    return DecodeError.malformed(message, this.contextAt(offset));
  }

  protected contextAt(offset: number): IParseContext {
    let line = 1;
    let lineStart = 0;
    for (let i = this.text.indexOf('\n'); i !== -1 && i < offset; i = this.text.indexOf('\n', i + 1)) {
      line++;
      lineStart = i + 1;
    }
    return { offset, line, column: offset - lineStart + 1 };
  }
}
