import { describe, expect, it, vi } from "vitest";
import { DecodeError, DecodeErrorReason } from "../errors/decode-error";
import { Node } from "../models/node";
import { ILogger, LogLevel, buildLeveledLogger } from "../shared/logger";
import { OpenStepReader } from "./reader";

const silent = buildLeveledLogger({ logger: console, level: LogLevel.silent });

function read(text: string, logger: ILogger = silent): Node {
  return OpenStepReader.decode(text, logger);
}

function decodeFailure(text: string): DecodeError {
  try {
    read(text);
  }
  catch (err) {
    if (err instanceof DecodeError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected decoding to fail');
}

describe('OpenStepReader', () => {
  it('reads a commented project file', () => {
    const node = read(`// !$*UTF8*$!
{
	/* build settings */
	archiveVersion = 1;
	objects = {
		"key with space" = ( a, "b", <0aff>, );
	};
	name = 'single';
}
`);

    expect(node).toEqual({
      kind: 'dictionary',
      generation: 0,
      entries: new Map<string, Node>([
        ['archiveVersion', { kind: 'string', value: '1' }],
        ['objects', {
          kind: 'dictionary',
          generation: 0,
          entries: new Map<string, Node>([
            ['key with space', {
              kind: 'array',
              generation: 0,
              items: [
                { kind: 'string', value: 'a' },
                { kind: 'string', value: 'b' },
                { kind: 'data', value: new Uint8Array([0x0A, 0xFF]) },
              ],
            }],
          ]),
        }],
        ['name', { kind: 'string', value: 'single' }],
      ]),
    });
  });

  it('reads every scalar as a string', () => {
    expect(read('(YES, 12, -2.5, com.example.app)')).toEqual({
      kind: 'array',
      generation: 0,
      items: [
        { kind: 'string', value: 'YES' },
        { kind: 'string', value: '12' },
        { kind: 'string', value: '-2.5' },
        { kind: 'string', value: 'com.example.app' },
      ],
    });
  });

  it('reads escapes inside quoted strings', () => {
    expect(read('"a\\n\\t\\"\\\\\\U00e9\\101"')).toEqual({ kind: 'string', value: 'a\n\t"\\éA' });
  });

  it('reads data with spaces between the digits', () => {
    expect(read('<00010203 04>')).toEqual({ kind: 'data', value: new Uint8Array([0, 1, 2, 3, 4]) });
    expect(read('<>')).toEqual({ kind: 'data', value: new Uint8Array([]) });
  });

  it('reads empty containers', () => {
    expect(read('( )')).toEqual({ kind: 'array', generation: 0, items: [] });
    expect(read('{}')).toEqual({ kind: 'dictionary', generation: 0, entries: new Map() });
  });

  it('warns about repeated keys and keeps the last value', () => {
    const logger: ILogger = { ...console, warn: vi.fn() };
    expect(read('{ a = 1; a = 2; }', logger)).toEqual({
      kind: 'dictionary',
      generation: 0,
      entries: new Map<string, Node>([['a', { kind: 'string', value: '2' }]]),
    });
    expect(logger.warn).toHaveBeenCalledWith('Dictionary repeats key %s; the last value wins', '"a"');
  });

  it.each([
    ['{ a = 1 }', 'Unexpected "}", expected ";"'],
    ['( a b )', 'Unexpected "b", expected ","'],
    ['{ (a) = b; }', 'Dictionary keys must be strings'],
    ['<abc>', 'Data must be an even number of hex digits'],
    ['<zz>', 'Data must be an even number of hex digits'],
    ['<00', 'Unterminated data'],
    ['"open', 'Unterminated string'],
    ['( a /* open', 'Unterminated comment'],
    ['a b', 'Unexpected "b", expected the end of the document'],
    ['', 'Unexpected end of input, expected a value'],
  ])('rejects %j', (text, message) => {
    const err = decodeFailure(text);
    expect(err.reason).toBe(DecodeErrorReason.malformed);
    expect(err.message).toContain(message);
  });

  it('reports the line and column of a failure', () => {
    const err = decodeFailure('{\n\tname = ok;\n\tlist = (a b);\n}');
    expect(err.context).toEqual({ offset: 25, line: 3, column: 12 });
  });
});
