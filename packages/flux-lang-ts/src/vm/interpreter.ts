import type { Program } from '../model/bytecode.js';
import type { IoOpcode } from '../model/opcode.js';
import type { ByteSink, ByteSource } from '../io/ports.js';
import { EmptySource } from '../io/memory.js';
import { emit } from '../trace/log.js';
import { causeMessage, type RuntimeError } from './errors.js';

export interface VMStreams {
  input?: ByteSource;
  output: ByteSink;
}

export type RunResult =
  | { ok: true; steps: number; accumulator: number; stackDepth: number }
  | { ok: false; error: RuntimeError };

type VMState = 'ready' | 'running' | 'halted';

const encoder = new TextEncoder();

/** Values wrap as 32-bit signed integers. */
function wrap(n: number): number {
  return n | 0;
}

/** Reduces any accumulator value into 0..255, negatives included. */
export function toByte(n: number): number {
  return ((n % 256) + 256) % 256;
}

class IoAbort extends Error {
  constructor(readonly op: IoOpcode, readonly reason: unknown) {
    super(causeMessage(reason));
  }
}

/**
 * One execution of one program. Accumulator, stack and program counter live
 * on the instance; build a new VM for every run.
 */
export class VM {
  accumulator = 0;
  readonly stack: number[] = [];
  pc = 0;
  steps = 0;
  private state: VMState = 'ready';
  private readonly input: ByteSource;
  private readonly output: ByteSink;

  constructor(readonly program: Program, streams: VMStreams) {
    this.input = streams.input ?? EmptySource;
    this.output = streams.output;
  }

  get halted(): boolean {
    return this.state === 'halted';
  }

  async run(): Promise<RunResult> {
    if (this.state !== 'ready') {
      throw new Error('VM instances run once; construct a new VM per run');
    }
    this.state = 'running';
    const { instrs } = this.program;

    try {
      while (this.pc < instrs.length) {
        const ins = instrs[this.pc];
        let next = this.pc + 1;

        switch (ins.op) {
          case 'INC': this.accumulator = wrap(this.accumulator + 1); break;
          case 'DEC': this.accumulator = wrap(this.accumulator - 1); break;
          case 'PUSH': this.stack.push(this.accumulator); break;
          case 'POP': {
            const top = this.stack.pop();
            if (top === undefined) {
              emit({ kind: 'EmptyPop', pc: this.pc });
            }
            this.accumulator = top ?? 0;
            break;
          }
          case 'LOOP_START': {
            if (this.accumulator === 0) next = ins.arg;
            break;
          }
          case 'LOOP_END': {
            if (this.accumulator !== 0) next = ins.arg;
            break;
          }
          case 'OUT_CHAR': {
            await this.write('OUT_CHAR', Uint8Array.of(toByte(this.accumulator)));
            break;
          }
          case 'IN_CHAR': {
            this.accumulator = await this.readByte();
            break;
          }
          case 'OUT_NUM': {
            await this.write('OUT_NUM', encoder.encode(String(this.accumulator)));
            break;
          }
          default: {
            const _: never = ins;
            throw new Error(`internal error: invalid opcode at address ${this.pc}`);
          }
        }

        this.pc = next;
        this.steps += 1;
      }
    } catch (err) {
      if (!(err instanceof IoAbort)) throw err;
      this.state = 'halted';
      emit({ kind: 'IoFailure', op: err.op, pc: this.pc, message: err.message });
      return {
        ok: false,
        error: { kind: 'IOFailure', code: 'E_FLUX_IO', op: err.op, pc: this.pc, cause: err.reason },
      };
    }

    this.state = 'halted';
    emit({ kind: 'Halt', steps: this.steps, accumulator: this.accumulator, stackDepth: this.stack.length });
    return { ok: true, steps: this.steps, accumulator: this.accumulator, stackDepth: this.stack.length };
  }

  private async write(op: IoOpcode, bytes: Uint8Array): Promise<void> {
    try {
      await this.output.write(bytes);
    } catch (err) {
      throw new IoAbort(op, err);
    }
  }

  private async readByte(): Promise<number> {
    let byte: number | null;
    try {
      byte = await this.input.read();
    } catch (err) {
      throw new IoAbort('IN_CHAR', err);
    }
    if (byte === null) return 0;
    if (!Number.isInteger(byte) || byte < 0 || byte > 255) {
      throw new IoAbort('IN_CHAR', new RangeError(`input source yielded non-byte value ${byte}`));
    }
    return byte;
  }
}

/** Runs `program` on a fresh VM. Input defaults to an exhausted source. */
export async function run(
  program: Program,
  input: ByteSource | undefined,
  output: ByteSink
): Promise<RunResult> {
  return new VM(program, { input, output }).run();
}
