/**
 * Frontend contracts for the nibasm assembler.
 *
 * This module defines types and the fixed register/opcode vocabularies only; lexing and parsing live in
 * `lexer.ts` and `parser.ts`.
 */

/**
 * Half-open range `[offset, offset + length)` into the source text that produced it.
 */
export interface Span {
  /** 0-based string index of the first character. */
  readonly offset: number;
  readonly length: number;
}

export type TokenKind =
  | 'Identifier'
  | 'Label'
  | 'Comma'
  | 'Integer'
  | 'Newline'
  | 'Comment'
  | 'InvalidToken'
  | 'InvalidInteger';

export interface Token {
  readonly kind: TokenKind;
  readonly span: Span;
}

export const Registers = [
  'R0',
  'R1',
  'R2',
  'R3',
  'R4',
  'R5',
  'R6',
  'R7',
  'R8',
  'R9',
  'R10',
  'R11',
  'R12',
  'R13',
  'R14',
  'R15',
] as const;

export type Register = (typeof Registers)[number];

export const Opcodes = [
  'Nop',
  'Add',
  'Ldi',
  'Sub',
  'And',
  'Or',
  'Inv',
  'Xor',
  'Sr',
  'Sl',
  'In',
  'Out',
  'Jz',
  'Jlt',
  'J',
] as const;

export type Opcode = (typeof Opcodes)[number];

/**
 * Operand categories an instruction slot can accept.
 */
export type OperandKind = 'Register' | 'Integer' | 'Label';

/**
 * Stable index into the label table arena.
 */
export type LabelId = number;

export interface RegisterOperand {
  kind: 'Register';
  value: Register;
  span: Span;
}

export interface IntegerOperand {
  kind: 'Integer';
  /** Signed 8-bit value (-128..127). */
  value: number;
  span: Span;
}

export interface LabelOperand {
  kind: 'Label';
  id: LabelId;
  span: Span;
}

export type Operand = RegisterOperand | IntegerOperand | LabelOperand;

export interface NoOperandInstruction {
  kind: 'NoOperand';
  opcode: Opcode;
}

export interface SingleOperandInstruction {
  kind: 'SingleOperand';
  opcode: Opcode;
  operand: Operand;
}

export interface DoubleOperandInstruction {
  kind: 'DoubleOperand';
  opcode: Opcode;
  first: Operand;
  second: Operand;
}

export type Instruction =
  | NoOperandInstruction
  | SingleOperandInstruction
  | DoubleOperandInstruction;

export interface LabelItem {
  kind: 'Label';
  id: LabelId;
}

export interface InstructionItem {
  kind: 'Instruction';
  instruction: Instruction;
}

/**
 * Parser output element. Item order determines instruction slots.
 */
export type Item = LabelItem | InstructionItem;
