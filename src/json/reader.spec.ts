import { describe, expect, it, vi } from "vitest";
import { DecodeError, DecodeErrorReason } from "../errors/decode-error";
import { Node } from "../models/node";
import { ILogger, LogLevel, buildLeveledLogger } from "../shared/logger";
import { JsonReader } from "./reader";

const silent = buildLeveledLogger({ logger: console, level: LogLevel.silent });

function read(text: string, logger: ILogger = silent): Node {
  return JsonReader.decode(text, logger);
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

describe('JsonReader', () => {
  it('reads objects in document order', () => {
    const node = read('{"a": 1, "b": [true, false, -2.5e3, "x\\u00e9\\n"], "c": {}}');

    expect(node).toEqual({
      kind: 'dictionary',
      generation: 0,
      entries: new Map<string, Node>([
        ['a', { kind: 'integer', value: 1n }],
        ['b', {
          kind: 'array',
          generation: 0,
          items: [
            { kind: 'boolean', value: true },
            { kind: 'boolean', value: false },
            { kind: 'real', value: -2500 },
            { kind: 'string', value: 'xé\n' },
          ],
        }],
        ['c', { kind: 'dictionary', generation: 0, entries: new Map() }],
      ]),
    });
  });

  it.each([
    ['0', { kind: 'integer', value: 0n }],
    ['-17', { kind: 'integer', value: -17n }],
    ['18446744073709551615', { kind: 'integer', value: 2n ** 64n - 1n }],
    ['-9223372036854775808', { kind: 'integer', value: -(2n ** 63n) }],
    ['1.0', { kind: 'real', value: 1 }],
    ['1e2', { kind: 'real', value: 100 }],
    ['-0.5', { kind: 'real', value: -0.5 }],
  ])('reads number %s', (text, node) => {
    expect(read(text)).toEqual(node);
  });

  it('reads escaped characters', () => {
    expect(read('"\\"\\\\\\/\\b\\f\\n\\r\\t\\u0041"')).toEqual({ kind: 'string', value: '"\\/\b\f\n\r\tA' });
  });

  it('warns about repeated keys and keeps the last value', () => {
    const logger: ILogger = { ...console, warn: vi.fn() };
    expect(read('{"a": 1, "a": 2}', logger)).toEqual({
      kind: 'dictionary',
      generation: 0,
      entries: new Map<string, Node>([['a', { kind: 'integer', value: 2n }]]),
    });
    expect(logger.warn).toHaveBeenCalledWith('JSON object repeats key %s; the last value wins', '"a"');
  });

  it('reads nesting of any depth', () => {
    let node = read(`${'['.repeat(10_000)}${']'.repeat(10_000)}`);
    let depth = 1;
    while (node.kind === 'array' && node.items.length === 1) {
      node = node.items[0];
      ++depth;
    }
    expect(depth).toBe(10_000);
    expect(node).toEqual({ kind: 'array', generation: 0, items: [] });
  });

  it.each([
    ['null', 'JSON null has no plist counterpart'],
    ['[1,]', 'Unexpected "]", expected a value'],
    ['{"a": 1,}', 'Unexpected "}", expected "\\""'],
    ['[1 2]', 'Unexpected "2", expected ","'],
    ['{"a" 1}', 'Unexpected "1", expected ":"'],
    ['"open', 'Unexpected end of input, expected the end of the string'],
    ['01', 'Unexpected "1", expected the end of the document'],
    ['18446744073709551616', 'Integer 18446744073709551616 does not fit in 64 bits'],
    ['"\\x"', 'Invalid escape \\x'],
    ['"a\tb"', 'Control characters must be escaped inside JSON strings'],
    ["{'a': 1}", 'Unexpected "\'", expected "\\""'],
    ['tru', 'Unexpected "t", expected a value'],
    ['[', 'Unexpected end of input, expected a value'],
    ['', 'Unexpected end of input, expected a value'],
  ])('rejects %j', (text, message) => {
    const err = decodeFailure(text);
    expect(err.reason).toBe(DecodeErrorReason.malformed);
    expect(err.message).toContain(message);
  });

  it('reports the line and column of a failure', () => {
    const err = decodeFailure('[\n  1,\n  x\n]');
    expect(err.context).toEqual({ offset: 9, line: 3, column: 3 });
  });
});
