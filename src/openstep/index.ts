export { OpenStepReader } from './reader';
export { OpenStepWriter, quoteString } from './writer';
export type { IOpenStepWriterOptions } from './writer';
