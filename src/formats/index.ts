export { defaultFormatWriters, notImplementedWriter, writeC } from './writers.js';
export { StringSink } from './sink.js';
export { CodeGenerator } from './generator.js';
export type { GeneratorOptions } from './generator.js';
export * from './types.js';
