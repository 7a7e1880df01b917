import { XMLParser, XMLValidator } from "fast-xml-parser";
import { DecodeError, DecodeErrorReason } from "../errors/decode-error";
import { PlistDate } from "../models/date";
import { LeafNode, Node, maxInteger, minInteger, newArrayNode, newDictionaryNode } from "../models/node";
import { Uid } from "../models/uid";
import { ILogger } from "../shared/logger";
import { uidKey } from "./tags";

type XmlText = { readonly text: string };
type XmlElement = {
  readonly name: string;
  readonly children: readonly XmlChild[];
};
type XmlChild = XmlElement | XmlText;

const textNodeName = '#text';
const attributesGroupName = ':@';

const integerPattern = /^[+-]?\d+$/;
const hexIntegerPattern = /^([+-]?)0x([0-9a-f]+)$/i;
const realPattern = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const base64Pattern = /^[A-Za-z0-9+/]*={0,2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isText(child: XmlChild): child is XmlText {
  return 'text' in child;
}

const parserOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  htmlEntities: true,
  // the parser stops at 100 levels by default
  maxNestedTags: Number.MAX_SAFE_INTEGER,
};

/** an `<array>` whose items are still being read */
class ArrayFrame {
  private readonly items: Node[] = [];
  private next = 0;

  constructor(readonly path: string, private readonly elements: readonly XmlElement[]) { }

  nextElement(): XmlElement | undefined {
    return this.elements[this.next++];
  }

  accept(node: Node) {
    this.items.push(node);
  }

  finish(): Node {
    return newArrayNode(this.items);
  }
}

/** a `<dict>` whose values are still being read; keys are read as their values are requested */
class DictFrame {
  private readonly entries = new Map<string, Node>();
  private next = 0;
  private key = '';

  constructor(readonly path: string, private readonly elements: readonly XmlElement[], private readonly logger: ILogger) {
    if (elements.length % 2 !== 0) {
      throw DecodeError.malformed('<dict> must hold <key>/value pairs', { path });
    }
  }

  nextElement(): XmlElement | undefined {
    if (this.next >= this.elements.length) {
      return undefined;
    }

    const keyElement = this.elements[this.next];
    if (keyElement.name !== 'key') {
      throw DecodeError.malformed(`Expected <key> in <dict> but found <${keyElement.name}>`, { path: `${this.path}/${keyElement.name}` });
    }
    this.key = textOf(keyElement, `${this.path}/key`);
    if (this.entries.has(this.key)) {
      this.logger.warn('<dict> at %s repeats key %s; the last value wins', this.path, JSON.stringify(this.key));
    }

    const value = this.elements[this.next + 1];
    this.next += 2;
    return value;
  }

  accept(node: Node) {
    this.entries.set(this.key, node);
  }

  finish(): Node {
    return asUid(this.entries) ?? newDictionaryNode(this.entries);
  }
}

type Frame = ArrayFrame | DictFrame;

/**
 * Parses an XML property list (Apple's `PropertyList-1.0` DTD) into a node tree.
 *
 * fast-xml-parser does the tokenizing; everything plist-specific (element kinds, `<key>`
 * pairing, leaf syntax) is checked here. Containers are read with an explicit stack.
 */
export class XmlReader {
  private readonly parser = new XMLParser(parserOptions);

  constructor(private readonly logger: ILogger) { }

  static decode(text: string, logger: ILogger) {
    return new XmlReader(logger).read(text);
  }

  read(text: string): Node {
    const validationOutput = XMLValidator.validate(text);
    if (validationOutput !== true) {
      const { msg, line, col } = validationOutput.err;
      throw DecodeError.malformed(`Invalid XML: ${msg}`, { line, column: col });
    }

    let parsed: unknown;
    try {
      parsed = this.parser.parse(text);
    }
    catch (err) {
      throw new DecodeError(`Invalid XML: ${err instanceof Error ? err.message : String(err)}`, DecodeErrorReason.malformed, undefined, { cause: err });
    }
    const roots = elementsOf(toChildren(parsed), '');
    const plist = roots[0];
    if (roots.length !== 1 || plist.name !== 'plist') {
      throw DecodeError.malformed('XML property list must have a single <plist> root element', { path: '/' });
    }

    const values = elementsOf(plist.children, '/plist');
    if (values.length !== 1) {
      throw DecodeError.malformed(`<plist> must contain exactly one value, found ${values.length}`, { path: '/plist' });
    }
    return this.readValue(values[0], '/plist');
  }

  private readValue(element: XmlElement, parentPath: string): Node {
    const stack: Frame[] = [];
    let opened = this.open(element, parentPath);

    for (;;) {
      if (opened instanceof ArrayFrame || opened instanceof DictFrame) {
        stack.push(opened);
      }
      else if (stack.length === 0) {
        return opened;
      }
      else {
        stack[stack.length - 1].accept(opened);
      }

      const frame = stack[stack.length - 1];
      const child = frame.nextElement();
      if (child) {
        opened = this.open(child, frame.path);
      }
      else {
        stack.pop();
        opened = frame.finish();
      }
    }
  }

  /** a leaf is read straight away; a container becomes a frame to fill */
  private open(element: XmlElement, parentPath: string): Node | Frame {
    const path = `${parentPath}/${element.name}`;

    switch (element.name) {
      case 'array':
        return new ArrayFrame(path, elementsOf(element.children, path));
      case 'dict':
        return new DictFrame(path, elementsOf(element.children, path), this.logger);
      default:
        return readLeaf(element, path);
    }
  }
}

/**
 * A dictionary whose only entry is an integer under `CF$UID` is how XML spells a UID.
 */
function asUid(entries: Map<string, Node>): LeafNode | undefined {
  const value = entries.get(uidKey);
  if (entries.size !== 1 || value?.kind !== 'integer' || value.value < 0n) {
    return undefined;
  }
  return { kind: 'uid', value: new Uid(value.value) };
}

function readLeaf(element: XmlElement, path: string): LeafNode {
  switch (element.name) {
    case 'true':
    case 'false':
      if (textOf(element, path).trim() !== '') {
        throw DecodeError.malformed(`<${element.name}> must be empty`, { path });
      }
      return { kind: 'boolean', value: element.name === 'true' };
    case 'string':
      return { kind: 'string', value: textOf(element, path) };
    case 'integer':
      return { kind: 'integer', value: parseInteger(textOf(element, path).trim(), path) };
    case 'real':
      return { kind: 'real', value: parseReal(textOf(element, path).trim(), path) };
    case 'data':
      return { kind: 'data', value: parseData(textOf(element, path), path) };
    case 'date': {
      const text = textOf(element, path).trim();
      const date = PlistDate.parseISO(text);
      if (!date) {
        throw DecodeError.malformed(`Invalid date ${JSON.stringify(text)}`, { path });
      }
      return { kind: 'date', value: date };
    }
  }

  throw DecodeError.malformed(`Unknown plist element <${element.name}>`, { path });
}

function parseInteger(text: string, path: string) {
  let value: bigint;
  const hex = hexIntegerPattern.exec(text);
  if (hex) {
    const magnitude = BigInt(`0x${hex[2]}`);
    value = hex[1] === '-' ? -magnitude : magnitude;
  }
  else if (integerPattern.test(text)) {
    value = BigInt(text);
  }
  else {
    throw DecodeError.malformed(`Invalid integer ${JSON.stringify(text)}`, { path });
  }

  if (value < minInteger || value > maxInteger) {
    throw DecodeError.malformed(`Integer ${text} does not fit in 64 bits`, { path });
  }
  return value;
}

function parseReal(text: string, path: string) {
  switch (text.toLowerCase()) {
    case 'nan':
      return NaN;
    case 'inf':
    case '+inf':
    case 'infinity':
    case '+infinity':
      return Infinity;
    case '-inf':
    case '-infinity':
      return -Infinity;
  }

  if (!realPattern.test(text)) {
    throw DecodeError.malformed(`Invalid real ${JSON.stringify(text)}`, { path });
  }
  return Number(text);
}

function parseData(text: string, path: string) {
  const base64 = text.replace(/\s+/g, '');
  if (base64.length % 4 !== 0 || !base64Pattern.test(base64)) {
    throw DecodeError.malformed('<data> is not valid base64', { path });
  }
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

function textOf(element: XmlElement, path: string) {
  let text = '';
  for (const child of element.children) {
    if (!isText(child)) {
      throw DecodeError.malformed(`<${element.name}> cannot contain <${child.name}>`, { path });
    }
    text += child.text;
  }
  return text;
}

/**
 * Child elements, skipping the whitespace between them. Any other text is an error.
 */
function elementsOf(children: readonly XmlChild[], path: string): XmlElement[] {
  const elements: XmlElement[] = [];
  for (const child of children) {
    if (!isText(child)) {
      elements.push(child);
    }
    else if (child.text.trim() !== '') {
      throw DecodeError.malformed(`Unexpected text ${JSON.stringify(child.text.trim())}`, { path: path || '/' });
    }
  }
  return elements;
}

/**
 * Converts fast-xml-parser's `preserveOrder` output (`[{ tag: [...children], ':@': {...} }, { '#text': '...' }]`)
 * into typed children.
 */
function toChildren(raw: unknown): XmlChild[] {
  const top: XmlChild[] = [];
  const pending: { raw: unknown, path: string, children: XmlChild[] }[] = [{ raw, path: '', children: top }];

  for (let work = pending.pop(); work; work = pending.pop()) {
    const { path, children } = work;
    if (!Array.isArray(work.raw)) {
      throw DecodeError.malformed('Unexpected XML parser output', { path: path || '/' });
    }

    for (const item of work.raw) {
      if (!isRecord(item)) {
        throw DecodeError.malformed('Unexpected XML parser output', { path: path || '/' });
      }
      if (textNodeName in item) {
        children.push({ text: String(item[textNodeName]) });
        continue;
      }
      const name = Object.keys(item).find(key => key !== attributesGroupName);
      if (name === undefined) {
        continue;
      }
      const elementChildren: XmlChild[] = [];
      children.push({ name, children: elementChildren });
      pending.push({ raw: item[name], path: `${path}/${name}`, children: elementChildren });
    }
  }
  return top;
}
