import { describe, expect, it } from "vitest";
import { plistArray, plistDict } from "./build";
import { ConstructionError } from "./errors/construction-error";
import type { ValueLike } from "./models/coerce";
import { PlistDate } from "./models/date";
import { Uid } from "./models/uid";
import { Value } from "./models/value";

describe('plistArray', () => {
  it('coerces each argument', () => {
    const array = plistArray('APT.', 2.5, [true], 3, 4n);
    expect(array.toPlain()).toEqual(['APT.', 2.5, [true], 3n, 4n]);
    expect(array.get(3)?.kind).toBe('integer');
  });

  it('builds an empty array without arguments', () => {
    expect(plistArray().isEmpty()).toBe(true);
  });

  it('converts nested input of any depth', () => {
    let input: ValueLike = { leaf: 'bottom' };
    for (let i = 0; i < 20_000; ++i) {
      input = [input];
    }

    const text = plistArray(input).toString();
    expect(text).toBe(`${'['.repeat(20_001)}{"leaf": "bottom"}${']'.repeat(20_001)}`);
  });

  it('rejects input that contains itself', () => {
    const loop: ValueLike[] = ['a'];
    loop.push([loop]);
    expect(() => plistArray(loop)).toThrow(ConstructionError);
  });

  it('moves owned handles it is given', () => {
    const inner = plistDict({ a: 1 });
    const array = plistArray(inner);
    expect(inner.isValid).toBe(false);
    expect(array.toPlain()).toEqual([{ a: 1n }]);
  });
});

describe('plistDict', () => {
  it('keeps the order of a plain object', () => {
    const dictionary = plistDict({ 'First key': 'hello world', 'Second key': 123, 'Third key': plistArray('APT.', 2.5) });
    expect([...dictionary.keys()]).toEqual(['First key', 'Second key', 'Third key']);
  });

  it('lets later pairs win', () => {
    expect(plistDict([['k', 1], ['k', 2]]).get('k')?.asInteger()).toBe(2n);
  });

  it('converts every leaf kind', () => {
    const when = new Date(Date.UTC(2020, 0, 1));
    const dictionary = plistDict({
      data: new Uint8Array([1, 2]),
      when,
      uid: new Uid(9),
      nothing: null,
    });

    expect(dictionary.get('data')?.asData()).toEqual(new Uint8Array([1, 2]));
    expect(dictionary.get('when')?.asDate()).toEqual(PlistDate.fromDate(when));
    expect(dictionary.get('uid')?.asUid()?.value).toBe(9n);
    expect(dictionary.get('nothing')?.isNull()).toBe(true);
  });

  it('fails without consuming anything', () => {
    const kept = Value.from('kept');
    expect(() => plistDict({ kept, bad: new Date(NaN) })).toThrow(ConstructionError);
    expect(kept.asString()).toBe('kept');
  });
});
