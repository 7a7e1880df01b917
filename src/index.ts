export * from './errors';
export { AssertError } from './assert';

export { LogLevel } from './shared/logger';
export type { ILogConfig, ILogger } from './shared/logger';
export {
  configureLogging,
  disableCleanDebug,
  enableCleanDebug,
  getLogConfig,
  isCleanDebug,
  setCleanDebug,
} from './config';
export type { IParseContext } from './parse-context';

export { PlistDate } from './models/date';
export { Uid } from './models/uid';
export type { ValueKind } from './models/node';
export type { PlainValue } from './models/plain';
export type { DictionaryEntriesLike, ValueLike } from './models/coerce';
export { Handle } from './models/handle';
export { Item, Value, ValueView } from './models/value';
export { PlistArray } from './models/array';
export { PlistDictionary } from './models/dictionary';

export { plistArray, plistDict } from './build';

export {
  PlistFormat,
  decode,
  decodeBinary,
  decodeJson,
  decodeOpenStep,
  decodeXml,
  detectFormat,
  encode,
  encodeBinary,
  encodeJson,
  encodeOpenStep,
  encodeXml,
  loadFile,
  saveFile,
} from './codec';
export type { ICodecOptions, IEncodeOptions } from './codec';
