export { XmlReader } from './reader';
export { XmlWriter, formatReal } from './writer';
export * from './tags';
