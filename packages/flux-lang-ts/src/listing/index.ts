import type { Instr, Program } from '../model/bytecode.js';
import { OPCODES, type Opcode } from '../model/opcode.js';

export interface ListingRow {
  address: number;
  op: Opcode;
  arg?: number;
}

function row(ins: Instr, address: number): ListingRow {
  if (ins.op === 'LOOP_START' || ins.op === 'LOOP_END') {
    return { address, op: ins.op, arg: ins.arg };
  }
  return { address, op: ins.op };
}

export function listing(program: Program): ListingRow[] {
  return program.instrs.map(row);
}

export function formatRow(r: ListingRow): string {
  const address = String(r.address).padStart(4, '0');
  if (r.arg === undefined) return `${address}  ${r.op}`;
  return `${address}  ${r.op.padEnd(10)}  -> ${r.arg}`;
}

export function formatListing(program: Program): string {
  return listing(program).map(formatRow).join('\n');
}

/** Non-zero opcode counts, in opcode order. */
export function opcodeCounts(program: Program): Partial<Record<Opcode, number>> {
  const counts = new Map<Opcode, number>();
  for (const ins of program.instrs) {
    counts.set(ins.op, (counts.get(ins.op) ?? 0) + 1);
  }
  const result: Partial<Record<Opcode, number>> = {};
  for (const op of OPCODES) {
    const n = counts.get(op);
    if (n !== undefined) result[op] = n;
  }
  return result;
}
