import { afterEach, describe, it, expect } from 'vitest';
import { compile, compileOrThrow, run, MemorySink, withTraceLog, trace } from '../src/index.js';
import type { TraceTag } from '../src/index.js';

describe('trace log', () => {
  afterEach(() => {
    delete process.env.FLUX_TRACE;
    trace.resetTraceFlagForTest();
  });

  it('records compile, empty pop and halt tags in order', async () => {
    const { tags } = await withTraceLog(async () => {
      const result = compile('/#');
      if (!result.ok) throw new Error('compile failed');
      return run(result.program, undefined, new MemorySink());
    }, { enabled: true });
    expect(tags).toEqual([
      { kind: 'Compiled', instrs: 2, loops: 0 },
      { kind: 'EmptyPop', pc: 0 },
      { kind: 'Halt', steps: 2, accumulator: 0, stackDepth: 0 },
    ]);
  });

  it('records a refutation for a compile failure', async () => {
    const { result, tags } = await withTraceLog(() => compile('[]]'), { enabled: true });
    expect(result.ok).toBe(false);
    expect(tags).toEqual([{ kind: 'Refutation', code: 'E_FLUX_UNMATCHED_CLOSE', position: 2 }]);
  });

  it('records I/O failures', async () => {
    const program = compileOrThrow('.');
    const { tags } = await withTraceLog(
      () => run(program, undefined, { write: () => { throw new Error('closed'); } }),
      { enabled: true }
    );
    expect(tags).toEqual([{ kind: 'IoFailure', op: 'OUT_CHAR', pc: 0, message: 'closed' }]);
  });

  it('forwards tags to onTag while the program is still running', async () => {
    const seen: TraceTag[] = [];
    const kindsAtOutput: string[][] = [];
    const program = compileOrThrow('/.');
    const { result, tags } = await withTraceLog(
      () => run(program, undefined, { write: () => { kindsAtOutput.push(seen.map((tag) => tag.kind)); } }),
      { enabled: true, onTag: (tag) => { seen.push(tag); } }
    );
    expect(result.ok).toBe(true);
    expect(kindsAtOutput).toEqual([['EmptyPop']]);
    expect(seen.map((tag) => tag.kind)).toEqual(['EmptyPop', 'Halt']);
    expect(tags).toEqual([]);
  });

  it('collects nothing when disabled', async () => {
    const { result, tags } = await withTraceLog(() => compile('+[-]'), { enabled: false });
    expect(result.ok).toBe(true);
    expect(tags).toEqual([]);
  });

  it('reads FLUX_TRACE once and caches it', () => {
    process.env.FLUX_TRACE = 'true';
    trace.resetTraceFlagForTest();
    expect(trace.traceEnabled()).toBe(true);
    process.env.FLUX_TRACE = '0';
    expect(trace.traceEnabled()).toBe(true);
    trace.resetTraceFlagForTest();
    expect(trace.traceEnabled()).toBe(false);
  });

  it('keeps concurrent scopes apart', async () => {
    const [a, b] = await Promise.all([
      withTraceLog(() => compile('+'), { enabled: true }),
      withTraceLog(() => compile('[+][-]'), { enabled: true }),
    ]);
    expect(a.tags).toEqual([{ kind: 'Compiled', instrs: 1, loops: 0 }]);
    expect(b.tags).toEqual([{ kind: 'Compiled', instrs: 6, loops: 2 }]);
  });
});
