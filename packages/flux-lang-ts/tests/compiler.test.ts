import { describe, it, expect } from 'vitest';
import {
  compile,
  compileOrThrow,
  formatCompileError,
  FluxCompileError,
  OPCODE_SYMBOL,
  symbolOpcode,
  type Instr,
} from '../src/index.js';

function instrsOf(source: string): readonly Instr[] {
  const result = compile(source);
  if (!result.ok) throw new Error(`unexpected compile failure for ${source}`);
  return result.program.instrs;
}

/** Walks the program pairing brackets the way a reader would. */
function pairs(instrs: readonly Instr[]): Array<[number, number]> {
  const open: number[] = [];
  const out: Array<[number, number]> = [];
  instrs.forEach((ins, i) => {
    if (ins.op === 'LOOP_START') open.push(i);
    if (ins.op === 'LOOP_END') {
      const start = open.pop();
      if (start === undefined) throw new Error('unbalanced');
      out.push([start, i]);
    }
  });
  return out;
}

describe('compile', () => {
  it('maps every significant character to one instruction', () => {
    expect(instrsOf('+-*/.,#').map(i => i.op)).toEqual([
      'INC', 'DEC', 'PUSH', 'POP', 'OUT_CHAR', 'IN_CHAR', 'OUT_NUM',
    ]);
  });

  it('skips whitespace and comment characters', () => {
    expect(instrsOf('a + b\n\t-\r c')).toEqual([{ op: 'INC' }, { op: 'DEC' }]);
  });

  it('compiles empty source to an empty program', () => {
    const result = compile('');
    expect(result).toEqual({ ok: true, program: { version: 'flux/1', instrs: [] } });
  });

  it('resolves nested loop targets', () => {
    expect(instrsOf('+[-[+]#]')).toEqual([
      { op: 'INC' },
      { op: 'LOOP_START', arg: 8 },
      { op: 'DEC' },
      { op: 'LOOP_START', arg: 6 },
      { op: 'INC' },
      { op: 'LOOP_END', arg: 3 },
      { op: 'OUT_NUM' },
      { op: 'LOOP_END', arg: 1 },
    ]);
  });

  it('points each LOOP_START past its LOOP_END and each LOOP_END at its LOOP_START', () => {
    const sources = ['[]', '[][]', '[[]]', '+[[-]*[/]]#', '[[[[]]][[]]]', 'x[ y [ z ] ]'];
    for (const source of sources) {
      const instrs = instrsOf(source);
      const found = pairs(instrs);
      expect(found.length).toBe((source.match(/\[/g) ?? []).length);
      for (const [start, end] of found) {
        expect(instrs[start]).toEqual({ op: 'LOOP_START', arg: end + 1 });
        expect(instrs[end]).toEqual({ op: 'LOOP_END', arg: start });
      }
    }
  });

  it('emits instructions in the order of significant characters', () => {
    const source = 'Hello, world! [+.] # done/';
    const significant = [...source].filter(ch => symbolOpcode(ch) !== undefined).join('');
    const emitted = instrsOf(source).map(i => OPCODE_SYMBOL[i.op]).join('');
    expect(emitted).toBe(significant);
    expect(emitted).toBe(',[+.]#/');
  });

  it('rejects a lone closing bracket at position 0', () => {
    expect(compile(']')).toEqual({
      ok: false,
      error: { kind: 'UnmatchedCloseBracket', code: 'E_FLUX_UNMATCHED_CLOSE', position: 0 },
    });
  });

  it('reports the source position of the first unmatched closing bracket', () => {
    const a = compile('ab ]');
    const b = compile('[]]');
    expect(a.ok ? null : a.error).toMatchObject({ kind: 'UnmatchedCloseBracket', position: 3 });
    expect(b.ok ? null : b.error).toMatchObject({ kind: 'UnmatchedCloseBracket', position: 2 });
  });

  it('counts unclosed opening brackets', () => {
    expect(compile('[[')).toEqual({
      ok: false,
      error: { kind: 'UnmatchedOpenBracket', code: 'E_FLUX_UNMATCHED_OPEN', count: 2 },
    });
    const nested = compile('[[[]');
    expect(nested.ok ? null : nested.error).toMatchObject({ count: 2 });
  });

  it('formats compile errors', () => {
    expect(formatCompileError({ kind: 'UnmatchedCloseBracket', code: 'E_FLUX_UNMATCHED_CLOSE', position: 7 }))
      .toBe("unmatched ']' at position 7");
    expect(formatCompileError({ kind: 'UnmatchedOpenBracket', code: 'E_FLUX_UNMATCHED_OPEN', count: 3 }))
      .toBe("3 unmatched '[' bracket(s) in source code");
  });

  it('compileOrThrow raises FluxCompileError carrying the error value', () => {
    expect(() => compileOrThrow('[')).toThrowError(
      "E_FLUX_UNMATCHED_OPEN: 1 unmatched '[' bracket(s) in source code"
    );
    expect(() => compileOrThrow(']')).toThrowError(FluxCompileError);
  });
});
