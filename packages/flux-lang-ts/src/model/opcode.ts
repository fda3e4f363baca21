export const OPCODES = [
  'INC',
  'DEC',
  'PUSH',
  'POP',
  'LOOP_START',
  'LOOP_END',
  'OUT_CHAR',
  'IN_CHAR',
  'OUT_NUM',
] as const;

export type Opcode = (typeof OPCODES)[number];

export type IoOpcode = 'OUT_CHAR' | 'IN_CHAR' | 'OUT_NUM';

export const OPCODE_SYMBOL: Readonly<Record<Opcode, string>> = {
  INC: '+',
  DEC: '-',
  PUSH: '*',
  POP: '/',
  LOOP_START: '[',
  LOOP_END: ']',
  OUT_CHAR: '.',
  IN_CHAR: ',',
  OUT_NUM: '#',
};

const SYMBOL_OPCODE: ReadonlyMap<string, Opcode> = new Map(
  OPCODES.map((op) => [OPCODE_SYMBOL[op], op] as const)
);

/** Opcode for a significant source character; undefined for whitespace and comments. */
export function symbolOpcode(ch: string): Opcode | undefined {
  return SYMBOL_OPCODE.get(ch);
}
