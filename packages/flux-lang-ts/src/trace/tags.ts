import type { IoOpcode } from '../model/opcode.js';

export interface Compiled {
  kind: 'Compiled';
  instrs: number;
  loops: number;
}

export interface Refutation {
  kind: 'Refutation';
  code: string;
  position?: number;
  count?: number;
}

export interface EmptyPop {
  kind: 'EmptyPop';
  pc: number;
}

export interface IoFailure {
  kind: 'IoFailure';
  op: IoOpcode;
  pc: number;
  message: string;
}

export interface Halt {
  kind: 'Halt';
  steps: number;
  accumulator: number;
  stackDepth: number;
}

export type TraceTag =
  | Compiled
  | Refutation
  | EmptyPop
  | IoFailure
  | Halt;
