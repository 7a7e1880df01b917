import { PlistArray } from "./models/array";
import { DictionaryEntriesLike, ValueLike } from "./models/coerce";
import { PlistDictionary } from "./models/dictionary";

/**
 * `plistArray("APT.", 2.5, [true])` builds an owned array, coercing each argument.
 *
 * @throws ConstructionError for arguments with no plist counterpart
 */
export function plistArray(...items: ValueLike[]) {
  return new PlistArray(items);
}

/**
 * Accepts a plain object (`{ "First key": "hello world" }`) or `[key, value]` pairs, such as a `Map`.
 * Later pairs win over earlier ones with the same key.
 */
export function plistDict(entries: DictionaryEntriesLike = []) {
  return new PlistDictionary(entries);
}
