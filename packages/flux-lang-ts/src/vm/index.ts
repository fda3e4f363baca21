export { VM, run, toByte, type VMStreams, type RunResult } from './interpreter.js';
export * from './errors.js';
