import { describe, expect, it } from "vitest";
import { BoundsError } from "../errors/bounds-error";
import { ConstructionError } from "../errors/construction-error";
import { ConversionError } from "../errors/conversion-error";
import { PlistDate } from "./date";
import { ValueKind } from "./node";
import { Uid } from "./uid";
import { Value } from "./value";

const samples: ReadonlyArray<readonly [ValueKind, () => Value]> = [
  ['boolean', () => Value.boolean(true)],
  ['integer', () => Value.integer(1)],
  ['real', () => Value.real(1)],
  ['string', () => Value.string('1')],
  ['data', () => Value.data(new Uint8Array([1]))],
  ['date', () => Value.date(new Date(0))],
  ['uid', () => Value.uid(1)],
  ['array', () => Value.from([1])],
  ['dictionary', () => Value.from({ one: 1 })],
  ['null', () => Value.null()],
];

const accessors: Record<ValueKind, (value: Value) => unknown> = {
  boolean: value => value.asBoolean(),
  integer: value => value.asInteger(),
  real: value => value.asReal(),
  string: value => value.asString(),
  data: value => value.asData(),
  date: value => value.asDate(),
  uid: value => value.asUid(),
  array: value => value.asArray(),
  dictionary: value => value.asDictionary(),
  null: value => value.isNull() ? null : undefined,
};

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  }
  catch (err) {
    return err;
  }
  throw new Error('expected a throw');
}

describe('Value', () => {
  describe.each(samples)('of kind %s', (kind, make) => {
    it('reports its kind', () => {
      expect(make().kind).toBe(kind);
    });

    it('answers only its own accessor', () => {
      const value = make();
      for (const [other, accessor] of Object.entries(accessors)) {
        if (other === kind) {
          expect(accessor(value), other).not.toBeUndefined();
        }
        else {
          expect(accessor(value), other).toBeUndefined();
        }
      }
    });
  });

  it('never reads an Integer as a Real or the other way around', () => {
    expect(Value.integer(2).asReal()).toBeUndefined();
    expect(Value.real(2).asInteger()).toBeUndefined();
  });

  describe('from', () => {
    it.each([
      [1, 'integer'],
      [-5, 'integer'],
      [1.5, 'real'],
      [-0, 'real'],
      [2 ** 53, 'real'],
      [NaN, 'real'],
      [10n, 'integer'],
      ['s', 'string'],
      [false, 'boolean'],
      [null, 'null'],
      [new Uint8Array(2), 'data'],
      [new ArrayBuffer(2), 'data'],
      [new Date(0), 'date'],
      [new Uid(3), 'uid'],
      [[], 'array'],
      [{}, 'dictionary'],
    ] as const)('turns %s into %s', (input, kind) => {
      expect(Value.from(input).kind).toBe(kind);
    });

    it('keeps large integers exact', () => {
      expect(Value.from(2n ** 64n - 1n).asInteger()).toBe(18446744073709551615n);
    });

    it('refuses values with no plist counterpart', () => {
      expect(() => Value.integer(1.5)).toThrow(ConstructionError);
      expect(() => Value.integer(2n ** 64n)).toThrow(ConstructionError);
      expect(() => Value.from(-(2n ** 63n) - 1n)).toThrow(ConstructionError);
      expect(() => Value.date(new Date(NaN))).toThrow(ConstructionError);
      expect(() => Value.uid(-1)).toThrow(ConstructionError);
    });
  });

  describe('into', () => {
    it('hands over the payload and consumes the value', () => {
      const value = Value.string('payload');
      expect(value.intoString()).toBe('payload');
      expect(value.isValid).toBe(false);

      const err = thrownBy(() => value.asString());
      expect(err).toBeInstanceOf(BoundsError);
      expect(err).toMatchObject({ reason: 'moved' });
    });

    it('gives the untouched value back on a kind mismatch', () => {
      const value = Value.string('kept');
      const err = thrownBy(() => value.intoInteger());

      expect(err).toBeInstanceOf(ConversionError);
      expect(err).toMatchObject({ expected: 'integer', actual: 'string' });
      if (err instanceof ConversionError) {
        expect(err.value).toBe(value);
        expect(err.value.asString()).toBe('kept');
      }
    });

    it('turns containers into owned arrays and dictionaries', () => {
      const array = Value.from(['a', 'b']).intoArray();
      array.push('c');
      expect(array.toPlain()).toEqual(['a', 'b', 'c']);

      const dictionary = Value.from({ a: 1 }).intoDictionary();
      expect(dictionary.get('a')?.asInteger()).toBe(1n);
    });

    it('invalidates items borrowed before the conversion', () => {
      const value = Value.from([1]);
      const item = value.asArray()?.get(0);
      value.intoArray();
      expect(() => item?.asInteger()).toThrow(BoundsError);
    });
  });

  it('returns copies of data', () => {
    const value = Value.data(new Uint8Array([1, 2]));
    const bytes = value.asData();
    bytes?.fill(9);
    expect(value.asData()).toEqual(new Uint8Array([1, 2]));
  });

  it('converts dates', () => {
    const date = new Date(Date.UTC(2021, 5, 1, 12, 0, 0, 250));
    expect(Value.date(date).asDate()?.toDate()).toEqual(date);
    expect(Value.date(PlistDate.fromReferenceSeconds(0.5)).asDate()?.microseconds).toBe(500_000n);
  });

  describe('equals', () => {
    it('compares reals by identity of value', () => {
      expect(Value.real(NaN).equals(Value.real(NaN))).toBe(true);
      expect(Value.real(0).equals(Value.real(-0))).toBe(false);
    });

    it('never equates different kinds', () => {
      expect(Value.integer(1).equals(Value.real(1))).toBe(false);
      expect(Value.from([]).equals(Value.from({}))).toBe(false);
    });

    it('ignores dictionary order but not array order', () => {
      expect(Value.from({ a: 1, b: [1, 2] }).equals(Value.from({ b: [1, 2], a: 1 }))).toBe(true);
      expect(Value.from([1, 2]).equals(Value.from([2, 1]))).toBe(false);
      expect(Value.from({ a: 1 }).equals(Value.from({ a: 1, b: 2 }))).toBe(false);
    });
  });

  it('clones into an independent tree', () => {
    const original = Value.from({ list: [1] });
    const copy = original.clone();
    original.asDictionary()?.get('list')?.asArray()?.push(2);

    expect(copy.toPlain()).toEqual({ list: [1n] });
    expect(original.toPlain()).toEqual({ list: [1n, 2n] });
  });

  it('lets container views edit the tree they came from', () => {
    const value = Value.from({ list: [] });
    value.asDictionary()?.insert('name', 'x');
    expect(value.toPlain()).toEqual({ list: [], name: 'x' });
  });

  it('produces frozen plain snapshots', () => {
    const plain = Value.from({ a: [1.5, 'b', true, null] }).toPlain();
    expect(plain).toEqual({ a: [1.5, 'b', true, null] });
    expect(Object.isFrozen(plain)).toBe(true);
  });
});
