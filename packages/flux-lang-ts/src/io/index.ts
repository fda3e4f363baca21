export type { ByteSource, ByteSink } from './ports.js';
export { MemorySource, MemorySink, EmptySource } from './memory.js';
