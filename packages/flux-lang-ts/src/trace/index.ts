export * from './tags.js';
export { emit, withTraceLog, type TraceLogOptions } from './log.js';
export { traceEnabled, resetTraceFlagForTest } from './flag.js';
