export * as trace from './trace/index.js';
export * from './model/index.js';
export * from './compiler/index.js';
export * from './vm/index.js';
export * from './io/index.js';
export * from './listing/index.js';
export { parseProgram, serializeProgram, programId } from './bytecode/index.js';
export * from './canon/index.js';
export { withTraceLog, type TraceTag } from './trace/index.js';
