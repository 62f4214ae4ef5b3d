import type { Opcode, Register } from '../frontend/ast.js';
import { Opcodes, Registers } from '../frontend/ast.js';

export const INSTRUCTION_MEMORY_SIZE_BYTES = 64;
export const INSTRUCTION_SIZE_BYTES = 2;
export const MAX_NUM_INSTRUCTIONS = INSTRUCTION_MEMORY_SIZE_BYTES / INSTRUCTION_SIZE_BYTES;

/** Largest value an `in`/`out` port operand may take (4-bit field). */
export const MAX_PORT = 0b1111;

/**
 * High-nibble opcode encodings. Value 4 is reserved and has no mnemonic.
 */
const OPCODE_ENCODING: Readonly<Record<Opcode, number>> = Object.freeze({
  Nop: 0,
  Add: 1,
  Ldi: 2,
  Sub: 3,
  And: 5,
  Or: 6,
  Inv: 7,
  Xor: 8,
  Sr: 9,
  Sl: 10,
  In: 11,
  Out: 12,
  Jz: 13,
  Jlt: 14,
  J: 15,
});

const REGISTER_ENCODING: Readonly<Record<Register, number>> = Object.freeze({
  R0: 0,
  R1: 1,
  R2: 2,
  R3: 3,
  R4: 4,
  R5: 5,
  R6: 6,
  R7: 7,
  R8: 8,
  R9: 9,
  R10: 10,
  R11: 11,
  R12: 12,
  R13: 13,
  R14: 14,
  R15: 15,
});

const OPCODE_BY_MNEMONIC: ReadonlyMap<string, Opcode> = new Map(
  Opcodes.map((op) => [op.toLowerCase(), op] as const),
);

const REGISTER_BY_NAME: ReadonlyMap<string, Register> = new Map(
  Registers.map((r) => [r.toLowerCase(), r] as const),
);

export function encodeOpcode(opcode: Opcode): number {
  return OPCODE_ENCODING[opcode];
}

export function encodeRegister(register: Register): number {
  return REGISTER_ENCODING[register];
}

/**
 * Case-insensitive mnemonic lookup (`LDI`, `ldi`, `Ldi` all map to `Ldi`).
 */
export function opcodeFromMnemonic(text: string): Opcode | undefined {
  return OPCODE_BY_MNEMONIC.get(text.toLowerCase());
}

/**
 * Case-insensitive register lookup for `r0`..`r15`.
 */
export function registerFromName(text: string): Register | undefined {
  return REGISTER_BY_NAME.get(text.toLowerCase());
}
