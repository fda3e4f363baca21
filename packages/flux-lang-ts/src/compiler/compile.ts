import { BYTECODE_VERSION, type Instr, type Program } from '../model/bytecode.js';
import { symbolOpcode } from '../model/opcode.js';
import { emit } from '../trace/log.js';
import { FluxCompileError, type CompileError } from './errors.js';

export type CompileResult =
  | { ok: true; program: Program }
  | { ok: false; error: CompileError };

/**
 * Single left-to-right pass over `source`. Loop targets are resolved as the
 * closing bracket is reached: the `LOOP_END` points back at its `LOOP_START`,
 * and the `LOOP_START` is patched in place to point just past the `LOOP_END`.
 * Characters outside `+ - * / [ ] . , #` are skipped.
 */
export function compile(source: string): CompileResult {
  const instrs: Instr[] = [];
  const pending: number[] = [];
  let loops = 0;

  for (let position = 0; position < source.length; position += 1) {
    const op = symbolOpcode(source[position]);
    if (op === undefined) continue;

    switch (op) {
      case 'LOOP_START': {
        pending.push(instrs.length);
        instrs.push({ op: 'LOOP_START', arg: 0 });
        break;
      }
      case 'LOOP_END': {
        const start = pending.pop();
        if (start === undefined) {
          return fail({ kind: 'UnmatchedCloseBracket', code: 'E_FLUX_UNMATCHED_CLOSE', position });
        }
        const end = instrs.length;
        instrs.push({ op: 'LOOP_END', arg: start });
        instrs[start] = { op: 'LOOP_START', arg: end + 1 };
        loops += 1;
        break;
      }
      default:
        instrs.push({ op });
    }
  }

  if (pending.length > 0) {
    return fail({ kind: 'UnmatchedOpenBracket', code: 'E_FLUX_UNMATCHED_OPEN', count: pending.length });
  }

  emit({ kind: 'Compiled', instrs: instrs.length, loops });
  return { ok: true, program: { version: BYTECODE_VERSION, instrs } };
}

function fail(error: CompileError): CompileResult {
  emit(
    error.kind === 'UnmatchedCloseBracket'
      ? { kind: 'Refutation', code: error.code, position: error.position }
      : { kind: 'Refutation', code: error.code, count: error.count }
  );
  return { ok: false, error };
}

export function compileOrThrow(source: string): Program {
  const result = compile(source);
  if (!result.ok) throw new FluxCompileError(result.error);
  return result.program;
}
