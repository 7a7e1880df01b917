import { inspect } from "node:util";
import { afterEach, describe, expect, it } from "vitest";
import { plistArray, plistDict } from "./build";
import { setCleanDebug } from "./config";
import { formatNode } from "./format";
import { PlistDate } from "./models/date";
import { Node } from "./models/node";
import { Uid } from "./models/uid";
import { Value } from "./models/value";

describe('formatNode', () => {
  it.each<[Node, string, string]>([
    [{ kind: 'boolean', value: false }, 'false', 'Boolean(false)'],
    [{ kind: 'integer', value: -3n }, '-3', 'Integer(-3)'],
    [{ kind: 'real', value: 3 }, '3.0', 'Real(3)'],
    [{ kind: 'real', value: -0 }, '-0.0', 'Real(-0)'],
    [{ kind: 'real', value: 0.25 }, '0.25', 'Real(0.25)'],
    [{ kind: 'real', value: NaN }, 'NaN', 'Real(NaN)'],
    [{ kind: 'string', value: 'say "hi"' }, '"say \\"hi\\""', 'String("say \\"hi\\"")'],
    [{ kind: 'data', value: new Uint8Array([1, 0xAB]) }, '<01ab>', 'Data(2)<01ab>'],
    [{ kind: 'date', value: PlistDate.fromReferenceSeconds(1.5) }, '2001-01-01T00:00:01.5Z', 'Date(microseconds=1500000)'],
    [{ kind: 'uid', value: new Uid(5) }, 'Uid<5>', 'Uid(5)'],
    [{ kind: 'null' }, 'null', 'Null'],
  ])('renders %o', (node, clean, raw) => {
    expect(formatNode(node, true)).toBe(clean);
    expect(formatNode(node, false)).toBe(raw);
  });
});

describe('debug rendering of handles', () => {
  afterEach(() => {
    setCleanDebug(true);
  });

  it('prints decoded values by default', () => {
    expect(plistDict({ a: 1, b: plistArray('x', 2.5) }).toString()).toBe('{"a": 1, "b": ["x", 2.5]}');
  });

  it('prints kinds and generations when clean rendering is off', () => {
    const dictionary = plistDict({ a: 1, b: ['x', 2.5] });
    setCleanDebug(false);
    expect(dictionary.toString()).toBe('Dictionary(gen=0){"a": Integer(1), "b": Array(gen=0)[String("x"), Real(2.5)]}');

    dictionary.get('b')?.asArray()?.push(true);
    expect(dictionary.toString()).toBe('Dictionary(gen=0){"a": Integer(1), "b": Array(gen=1)[String("x"), Real(2.5), Boolean(true)]}');
  });

  it('names the handle class in inspect output', () => {
    expect(inspect(Value.from([1]))).toBe('Value [1]');

    const array = plistArray('a');
    const item = array.get(0);
    array.clear();
    expect(inspect(item)).toBe('Item <stale-handle>');
  });
});
