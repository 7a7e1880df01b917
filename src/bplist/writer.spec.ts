import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { EncodeError } from "../errors/encode-error";
import { PlistDate } from "../models/date";
import { Node, newArrayNode, newDictionaryNode, nullNode } from "../models/node";
import { Uid } from "../models/uid";
import { LogLevel, buildLeveledLogger } from "../shared/logger";
import { Reader } from "./reader";
import { Writer } from "./writer";

const logger = buildLeveledLogger({ logger: console, level: LogLevel.silent });

function encode(node: Node) {
  return Writer.encode(node, logger);
}

/** bytes between the header and the offset table */
function objectTable(bytes: Uint8Array) {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const offsetTableOffset = Number(view.getBigUint64(bytes.byteLength - 8));
  return [...bytes.subarray(8, offsetTableOffset)];
}

function trailerNumObjects(bytes: Uint8Array) {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return Number(view.getBigUint64(bytes.byteLength - 24));
}

const int = (value: bigint): Node => ({ kind: 'integer', value });
const str = (value: string): Node => ({ kind: 'string', value });

describe('bplist Writer', () => {
  it('writes a single boolean document', () => {
    expect([...encode({ kind: 'boolean', value: true })]).toEqual([
      ...Buffer.from('bplist00'),
      0x09,
      0x08,
      0, 0, 0, 0, 0, 0, 1, 1,
      0, 0, 0, 0, 0, 0, 0, 1,
      0, 0, 0, 0, 0, 0, 0, 0,
      0, 0, 0, 0, 0, 0, 0, 9,
    ]);
  });

  it.each([
    [0n, [0x10, 0x00]],
    [255n, [0x10, 0xFF]],
    [256n, [0x11, 0x01, 0x00]],
    [65_536n, [0x12, 0x00, 0x01, 0x00, 0x00]],
    [2n ** 32n, [0x13, 0, 0, 0, 1, 0, 0, 0, 0]],
    [-1n, [0x13, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF]],
    [2n ** 64n - 1n, [0x14, 0, 0, 0, 0, 0, 0, 0, 0, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF]],
  ])('writes integer %s in the smallest record', (value, record) => {
    expect(objectTable(encode(int(value)))).toEqual(record);
  });

  it('writes non-ASCII strings as UTF-16BE code units', () => {
    expect(objectTable(encode(str('é')))).toEqual([0x61, 0x00, 0xE9]);
    expect(objectTable(encode(str('😀')))).toEqual([0x62, 0xD8, 0x3D, 0xDE, 0x00]);
  });

  it('moves sizes of 15 and more into an int record', () => {
    expect(objectTable(encode(str('a'.repeat(15))))).toEqual([0x5F, 0x10, 0x0F, ...Array(15).fill(0x61)]);
  });

  it('writes reals, dates and UIDs', () => {
    expect(objectTable(encode({ kind: 'real', value: 2.5 }))).toEqual([0x23, 0x40, 0x04, 0, 0, 0, 0, 0, 0]);
    expect(objectTable(encode({ kind: 'date', value: PlistDate.fromReferenceSeconds(1) }))).toEqual([0x33, 0x3F, 0xF0, 0, 0, 0, 0, 0, 0]);
    expect(objectTable(encode({ kind: 'uid', value: new Uid(0x1234) }))).toEqual([0x81, 0x12, 0x34]);
  });

  it('writes equal leaves once', () => {
    const bytes = encode(newArrayNode([str('x'), str('x'), int(1n)]));
    expect(trailerNumObjects(bytes)).toBe(3);
    expect(objectTable(bytes)).toEqual([0xA3, 1, 1, 2, 0x51, 0x78, 0x10, 0x01]);
  });

  it('shares a string between a key and a value', () => {
    const bytes = encode(newDictionaryNode(new Map([['k', str('k')]])));
    expect(objectTable(bytes)).toEqual([0xD1, 1, 1, 0x51, 0x6B]);
  });

  it('keeps 0 and -0 apart', () => {
    const bytes = encode(newArrayNode([{ kind: 'real', value: 0 }, { kind: 'real', value: -0 }]));
    expect(trailerNumObjects(bytes)).toBe(3);
  });

  it('matches the layout of other bplist00 writers', () => {
    const expected = new Uint8Array(readFileSync(join(__dirname, '../__fixtures__/kinds.bplist')));
    const node = newDictionaryNode(new Map<string, Node>([
      ['flag', { kind: 'boolean', value: true }],
      ['count', int(42n)],
      ['negative', int(-7n)],
      ['big', int(2n ** 63n + 5n)],
      ['ratio', { kind: 'real', value: 2.5 }],
      ['when', { kind: 'date', value: PlistDate.fromDate(new Date(Date.UTC(2020, 0, 2, 3, 4, 5))) }],
      ['blob', { kind: 'data', value: new Uint8Array([0, 1, 2]) }],
      ['items', newArrayNode([str('a'), int(1n), str('a')])],
      ['uid', { kind: 'uid', value: new Uid(7) }],
      ['empty', newArrayNode()],
    ]));

    expect(encode(node)).toEqual(expected);
  });

  it('writes documents the reader reads back', () => {
    const node = newArrayNode([
      newDictionaryNode(new Map([['nested', newArrayNode([str('déjà vu'), int(-(2n ** 63n))])]])),
      { kind: 'data', value: new Uint8Array(300).fill(7) },
      { kind: 'real', value: NaN },
    ]);

    expect(new Reader(encode(node), logger).buildTopLevelObject()).toEqual(node);
  });

  it('refuses Null anywhere in the tree', () => {
    expect(() => encode(newArrayNode([int(1n), nullNode]))).toThrow(EncodeError);

    let thrown: unknown;
    try {
      encode(nullNode);
    }
    catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(EncodeError);
    expect(thrown).toMatchObject({ kind: 'null', format: 'binary' });
  });
});
