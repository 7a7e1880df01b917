export { JsonReader } from './reader';
export { JsonWriter } from './writer';
export type { IJsonWriterOptions } from './writer';
