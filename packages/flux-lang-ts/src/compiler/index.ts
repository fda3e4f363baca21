export { compile, compileOrThrow, type CompileResult } from './compile.js';
export * from './errors.js';
