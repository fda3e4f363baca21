import type { IoOpcode } from '../model/opcode.js';

export interface IOFailure {
  kind: 'IOFailure';
  code: 'E_FLUX_IO';
  op: IoOpcode;
  /** Address of the instruction whose I/O failed. */
  pc: number;
  cause: unknown;
}

export type RuntimeError = IOFailure;

export function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function formatRuntimeError(error: RuntimeError): string {
  const side = error.op === 'IN_CHAR' ? 'input' : 'output';
  return `${side} error: ${causeMessage(error.cause)}`;
}
