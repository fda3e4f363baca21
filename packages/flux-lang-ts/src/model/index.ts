export * from './opcode.js';
export * from './bytecode.js';
