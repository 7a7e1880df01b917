import { describe, expect, it } from "vitest";
import { plistDict } from "../build";
import { EncodeError } from "../errors/encode-error";
import { PlistDate } from "../models/date";
import { Node } from "../models/node";
import { Uid } from "../models/uid";
import { LogLevel, buildLeveledLogger } from "../shared/logger";
import { OpenStepReader } from "./reader";
import { OpenStepWriter, quoteString } from "./writer";

const logger = buildLeveledLogger({ logger: console, level: LogLevel.silent });

function sample() {
  return plistDict({
    name: 'Sample App',
    id: 'com.example.app',
    count: 3,
    ratio: 2.5,
    on: true,
    blob: new Uint8Array([0, 1, 2, 3, 4]),
    list: ['a b', ''],
    empty: {},
  })._resolve();
}

describe('OpenStepWriter', () => {
  it('writes one entry per line when prettified', () => {
    expect(OpenStepWriter.encode(sample(), logger, { prettify: true })).toBe([
      '{',
      '\tname = "Sample App";',
      '\tid = com.example.app;',
      '\tcount = 3;',
      '\tratio = 2.5;',
      '\ton = YES;',
      '\tblob = <00010203 04>;',
      '\tlist = (',
      '\t\t"a b",',
      '\t\t""',
      '\t);',
      '\tempty = {};',
      '}',
      '',
    ].join('\n'));
  });

  it('writes everything on one line otherwise', () => {
    expect(OpenStepWriter.encode(sample(), logger, { prettify: false }))
      .toBe('{name="Sample App";id=com.example.app;count=3;ratio=2.5;on=YES;blob=<00010203 04>;list=("a b","");empty={};}');
  });

  it('writes text the reader reads back', () => {
    const text = OpenStepWriter.encode(sample(), logger, { prettify: true });
    const node = OpenStepReader.decode(text, logger);

    expect(node.kind === 'dictionary' && [...node.entries.keys()]).toEqual(['name', 'id', 'count', 'ratio', 'on', 'blob', 'list', 'empty']);
    expect(node.kind === 'dictionary' && node.entries.get('on')).toEqual({ kind: 'string', value: 'YES' });
    expect(node.kind === 'dictionary' && node.entries.get('blob')).toEqual({ kind: 'data', value: new Uint8Array([0, 1, 2, 3, 4]) });
  });

  it.each([
    ['plain', 'plain'],
    ['/usr/lib:x.y-z_$', '/usr/lib:x.y-z_$'],
    ['', '""'],
    ['two words', '"two words"'],
    ['tab\there "q" \\ é\u0001', '"tab\\there \\"q\\" \\\\ é\\U0001"'],
    ['crlf\r\n', '"crlf\\r\\n"'],
  ])('quotes %j as %s', (value, text) => {
    expect(quoteString(value)).toBe(text);
    expect(OpenStepReader.decode(text, logger)).toEqual({ kind: 'string', value });
  });

  it.each<[Node, string]>([
    [{ kind: 'date', value: PlistDate.fromReferenceSeconds(0) }, 'date'],
    [{ kind: 'uid', value: new Uid(1) }, 'uid'],
    [{ kind: 'null' }, 'null'],
  ])('refuses %o', (node, kind) => {
    let err: unknown;
    try {
      OpenStepWriter.encode(node, logger, { prettify: true });
    }
    catch (thrown) {
      err = thrown;
    }
    expect(err).toBeInstanceOf(EncodeError);
    expect(err).toMatchObject({ kind, format: 'openstep' });
  });
});
