export const BYTECODE_VERSION = 'flux/1';

export type Instr =
  | { op: 'INC' }
  | { op: 'DEC' }
  | { op: 'PUSH' }
  | { op: 'POP' }
  // arg: address just past the matching LOOP_END
  | { op: 'LOOP_START', arg: number }
  // arg: address of the matching LOOP_START
  | { op: 'LOOP_END', arg: number }
  | { op: 'OUT_CHAR' }
  | { op: 'IN_CHAR' }
  | { op: 'OUT_NUM' };

export interface Program {
  version: typeof BYTECODE_VERSION;
  instrs: readonly Instr[];
}
