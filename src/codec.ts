import { randomBytes } from "node:crypto";
import { readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { Reader, Writer } from "./bplist";
import { getLogConfig, getLogger } from "./config";
import { bplistMagicNumber } from "./constants/magic-number";
import { DecodeError, DecodeErrorReason } from "./errors/decode-error";
import { IoError } from "./errors/io-error";
import { Handle } from "./models/handle";
import { Value } from "./models/value";
import { ILogger, buildLeveledLogger } from "./shared/logger";
import { JsonReader, JsonWriter } from "./json";
import { OpenStepReader, OpenStepWriter } from "./openstep";
import { XmlReader, XmlWriter } from "./xml";

export enum PlistFormat {
  binary = 'binary',
  xml = 'xml',
  json = 'json',
  openstep = 'openstep',
}

export interface ICodecOptions {
  /** per-call logger; filtered at the level given to {@link configureLogging} */
  readonly logger?: ILogger;
}

export interface IEncodeOptions extends ICodecOptions {
  /** JSON and OpenStep only: indent nested values, one per line (the default) */
  readonly prettify?: boolean;
}

function loggerFor(options?: ICodecOptions): ILogger {
  if (!options?.logger) {
    return getLogger();
  }
  return buildLeveledLogger({ logger: options.logger, level: getLogConfig().level });
}

const magicBytes = new TextEncoder().encode(bplistMagicNumber);

/**
 * `bplist` magic means binary. Text opening with `[` or `{` is taken for JSON and text
 * opening with `(` for OpenStep; anything else is assumed to be XML.
 */
export function detectFormat(bytes: Uint8Array): PlistFormat {
  if (bytes.byteLength >= magicBytes.byteLength && magicBytes.every((byte, idx) => bytes[idx] === byte)) {
    return PlistFormat.binary;
  }

  const text = new TextDecoder('utf-8').decode(bytes.subarray(0, 64)).trimStart();
  switch (text.charAt(0)) {
    case '[':
    case '{':
      return PlistFormat.json;
    case '(':
      return PlistFormat.openstep;
    default:
      return PlistFormat.xml;
  }
}

/**
 * @throws DecodeError when `bytes` is not a complete, valid `bplist00` document
 */
export function decodeBinary(bytes: Uint8Array, options?: ICodecOptions): Value {
  const reader = new Reader(bytes, loggerFor(options));
  return Value._adopt(reader.buildTopLevelObject());
}

/**
 * A dictionary whose only entry is a non-negative integer under `CF$UID` decodes as a UID.
 *
 * @throws DecodeError when `text` is not a valid XML property list
 */
export function decodeXml(text: string, options?: ICodecOptions): Value {
  return Value._adopt(XmlReader.decode(text, loggerFor(options)));
}

/**
 * @throws DecodeError when `text` is not valid JSON, holds `null`, or holds an integer beyond 64 bits
 */
export function decodeJson(text: string, options?: ICodecOptions): Value {
  return Value._adopt(JsonReader.decode(text, loggerFor(options)));
}

/**
 * Every scalar comes back as a String or Data.
 *
 * @throws DecodeError when `text` is not a valid OpenStep property list
 */
export function decodeOpenStep(text: string, options?: ICodecOptions): Value {
  return Value._adopt(OpenStepReader.decode(text, loggerFor(options)));
}

/**
 * Decodes `bytes` in `format`, or in the format {@link detectFormat} picks. A detected JSON
 * document opening with `{` that fails to parse is tried again as an OpenStep dictionary.
 */
export function decode(bytes: Uint8Array, format?: PlistFormat, options?: ICodecOptions): Value {
  const resolved = format ?? detectFormat(bytes);
  if (resolved === PlistFormat.binary) {
    return decodeBinary(bytes, options);
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  }
  catch (err) {
    throw new DecodeError(`${resolved} property list is not valid UTF-8`, DecodeErrorReason.malformed, undefined, { cause: err });
  }

  switch (resolved) {
    case PlistFormat.xml:
      return decodeXml(text, options);
    case PlistFormat.openstep:
      return decodeOpenStep(text, options);
    case PlistFormat.json:
      if (format !== undefined || !text.trimStart().startsWith('{')) {
        return decodeJson(text, options);
      }
      try {
        return decodeJson(text, options);
      }
      catch (err) {
        if (!(err instanceof DecodeError)) {
          throw err;
        }
        loggerFor(options).debug('DBG: not JSON (%s), trying OpenStep', err.message);
        return decodeOpenStep(text, options);
      }
  }
}

/**
 * @throws EncodeError when the tree contains a Null
 */
export function encodeBinary(handle: Handle, options?: ICodecOptions): Uint8Array {
  return Writer.encode(handle._resolve(), loggerFor(options));
}

/**
 * UIDs are written as a dictionary with the single key `CF$UID`, which is also how the XML reader
 * recognizes them: a Dictionary holding only a non-negative Integer under `CF$UID` encodes the
 * same way and decodes as a UID. Binary keeps the two apart.
 *
 * @throws EncodeError when the tree contains a Null, or a Date outside years 0000-9999
 */
export function encodeXml(handle: Handle, options?: ICodecOptions): string {
  return XmlWriter.encode(handle._resolve(), loggerFor(options));
}

/**
 * Data becomes a base64 string and reals always print a fraction or exponent.
 *
 * @throws EncodeError when the tree contains a Date, a UID, a non-finite Real or a Null
 */
export function encodeJson(handle: Handle, options?: IEncodeOptions): string {
  return JsonWriter.encode(handle._resolve(), loggerFor(options), { prettify: options?.prettify ?? true });
}

/**
 * Booleans, Integers and Reals are written as text and decode as Strings.
 *
 * @throws EncodeError when the tree contains a Date, a UID or a Null
 */
export function encodeOpenStep(handle: Handle, options?: IEncodeOptions): string {
  return OpenStepWriter.encode(handle._resolve(), loggerFor(options), { prettify: options?.prettify ?? true });
}

/** text formats come back UTF-8 encoded */
export function encode(handle: Handle, format: PlistFormat, options?: IEncodeOptions): Uint8Array {
  switch (format) {
    case PlistFormat.binary:
      return encodeBinary(handle, options);
    case PlistFormat.xml:
      return new TextEncoder().encode(encodeXml(handle, options));
    case PlistFormat.json:
      return new TextEncoder().encode(encodeJson(handle, options));
    case PlistFormat.openstep:
      return new TextEncoder().encode(encodeOpenStep(handle, options));
  }
}

/**
 * Reads and decodes a plist file, detecting its format.
 *
 * @throws IoError when the file cannot be read
 * @throws DecodeError when its contents are not a valid plist
 */
export function loadFile(path: string, options?: ICodecOptions): Value {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  }
  catch (err) {
    throw new IoError(`Could not read ${path}`, path, err);
  }

  loggerFor(options).debug('DBG: loading %s, detected as %s', path, detectFormat(bytes));
  return decode(bytes, undefined, options);
}

/**
 * Encodes `handle` and replaces `path` with the result.
 *
 * The bytes go to a temporary file beside `path` which is then renamed over it,
 * so `path` never holds a partial document.
 *
 * @throws EncodeError before anything is written when the tree cannot be encoded
 * @throws IoError when writing or renaming fails
 */
export function saveFile(path: string, handle: Handle, format: PlistFormat, options?: IEncodeOptions) {
  const bytes = encode(handle, format, options);
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);

  try {
    writeFileSync(tempPath, bytes);
    renameSync(tempPath, path);
  }
  catch (err) {
    rmSync(tempPath, { force: true });
    throw new IoError(`Could not write ${path}`, path, err);
  }
}
