export * from '../index.js';
export { FileRandomAccess } from './RandomAccess.js';
export { FileSink } from './Sink.js';
