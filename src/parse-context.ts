/**
 * Where in the input a decoder was when it gave up.
 * Binary readers fill in byte offsets and object refs. The XML reader fills in line/column or an element path,
 * and the JSON and OpenStep readers a character offset with its line/column.
 */
export interface IParseContext {
  readonly offset?: number;
  readonly objRef?: number;
  readonly line?: number;
  readonly column?: number;
  readonly path?: string;
}
