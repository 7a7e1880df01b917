export * from './markers';
export * from './de-struct';
export { StructWriter, byteCount } from './en-struct';

export { Trailer } from './models/trailer';
export { OffsetTable } from './models/offset-table';
export { ObjectTable } from './models/object-table';
export * from './models/object-table-entries';

export { Reader } from './reader';
export { Writer } from './writer';
