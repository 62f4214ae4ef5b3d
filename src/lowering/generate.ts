import type {
  DoubleOperandInstruction,
  Instruction,
  Item,
  LabelOperand,
  Opcode,
  Operand,
  Register,
  SingleOperandInstruction,
  Span,
} from '../frontend/ast.js';
import type { LabelTable } from '../frontend/labels.js';
import { InternalAssemblerError } from '../diagnostics/internal.js';
import {
  MAX_NUM_INSTRUCTIONS,
  MAX_PORT,
  encodeOpcode,
  encodeRegister,
} from '../isa/encoding.js';

/**
 * Layout / encoding failures. Generation stops at the first one.
 */
export type GeneratorError =
  | { kind: 'MaximumInstructionsError' }
  | { kind: 'DanglingLabelError'; span: Span }
  | { kind: 'UndefinedLabelError'; span: Span }
  | { kind: 'JumpDestinationRangeError'; span: Span }
  | { kind: 'SourceOrSinkRangeError'; span: Span };

export type GenerateResult =
  | { kind: 'ok'; bytes: Uint8Array; instructionCount: number }
  | { kind: 'error'; error: GeneratorError };

class GenerateAbort extends Error {
  constructor(readonly error: GeneratorError) {
    super(error.kind);
    this.name = 'GenerateAbort';
  }
}

function unsupported(instruction: Instruction): never {
  throw new InternalAssemblerError(`no encoding for ${instruction.kind} ${instruction.opcode}`);
}

function pack(opcode: Opcode, register: Register, low: number): [number, number] {
  return [((encodeOpcode(opcode) << 4) | encodeRegister(register)) & 0xff, low & 0xff];
}

function registerOf(operand: Operand, instruction: Instruction): Register {
  if (operand.kind !== 'Register') unsupported(instruction);
  return operand.value;
}

function labelValue(labels: LabelTable, operand: LabelOperand): number {
  const value = labels.valueOf(operand.id);
  if (value === undefined) throw new GenerateAbort({ kind: 'UndefinedLabelError', span: operand.span });
  return value;
}

/**
 * Pass 1: bind every label to the slot of the instruction after it and count instructions.
 */
function layoutItems(items: readonly Item[], labels: LabelTable): number {
  let counter = 0;
  let trailingLabel: number | undefined;

  for (const item of items) {
    if (item.kind === 'Label') {
      labels.setValue(item.id, counter);
      trailingLabel = item.id;
      continue;
    }
    trailingLabel = undefined;
    counter++;
    if (counter > MAX_NUM_INSTRUCTIONS) {
      throw new GenerateAbort({ kind: 'MaximumInstructionsError' });
    }
  }

  if (trailingLabel !== undefined) {
    const span = labels.spanOf(trailingLabel);
    if (!span) {
      throw new InternalAssemblerError(`label "${labels.nameOf(trailingLabel)}" has no definition span`);
    }
    throw new GenerateAbort({ kind: 'DanglingLabelError', span });
  }
  return counter;
}

function encodeSingle(ins: SingleOperandInstruction, labels: LabelTable): [number, number] {
  const { opcode, operand } = ins;
  if (opcode === 'Inv') return pack(opcode, registerOf(operand, ins), 0);
  if (opcode === 'J') {
    // The register field is unused by `j`.
    if (operand.kind === 'Integer') return pack(opcode, 'R0', operand.value);
    if (operand.kind === 'Label') return pack(opcode, 'R0', labelValue(labels, operand));
  }
  return unsupported(ins);
}

function encodeDouble(ins: DoubleOperandInstruction, labels: LabelTable): [number, number] {
  const { opcode, first, second } = ins;
  switch (opcode) {
    case 'Add':
    case 'Sub':
    case 'And':
    case 'Or':
    case 'Xor':
    case 'Sr':
    case 'Sl':
      return pack(opcode, registerOf(first, ins), encodeRegister(registerOf(second, ins)) << 4);
    case 'Jz':
    case 'Jlt': {
      const register = registerOf(first, ins);
      if (second.kind === 'Label') return pack(opcode, register, labelValue(labels, second));
      if (second.kind === 'Integer') {
        if (second.value >= MAX_NUM_INSTRUCTIONS) {
          throw new GenerateAbort({ kind: 'JumpDestinationRangeError', span: second.span });
        }
        return pack(opcode, register, second.value);
      }
      return unsupported(ins);
    }
    case 'Ldi': {
      const register = registerOf(first, ins);
      if (second.kind !== 'Integer') return unsupported(ins);
      return pack(opcode, register, second.value);
    }
    case 'In':
    case 'Out': {
      const register = registerOf(first, ins);
      if (second.kind !== 'Integer') return unsupported(ins);
      const port = second.value & 0xff;
      if (port > MAX_PORT) {
        throw new GenerateAbort({ kind: 'SourceOrSinkRangeError', span: second.span });
      }
      return pack(opcode, register, port << 4);
    }
    default:
      return unsupported(ins);
  }
}

function encodeInstruction(ins: Instruction, labels: LabelTable): [number, number] {
  switch (ins.kind) {
    case 'NoOperand':
      return ins.opcode === 'Nop' ? pack(ins.opcode, 'R0', 0) : unsupported(ins);
    case 'SingleOperand':
      return encodeSingle(ins, labels);
    case 'DoubleOperand':
      return encodeDouble(ins, labels);
  }
}

/**
 * Pass 2: two bytes per instruction, labels emit nothing.
 */
function encodeItems(items: readonly Item[], labels: LabelTable, count: number): Uint8Array {
  const out = new Uint8Array(count * 2);
  let at = 0;
  for (const item of items) {
    if (item.kind === 'Label') continue;
    out.set(encodeInstruction(item.instruction, labels), at);
    at += 2;
  }
  return out;
}

/**
 * Encode parsed items into machine code (unpadded, two bytes per instruction).
 *
 * Label values written by the layout pass are instruction slots (0..31), which is also what `j`, `jz` and `jlt`
 * take as an immediate destination.
 */
export function generateProgram(items: readonly Item[], labels: LabelTable): GenerateResult {
  try {
    const instructionCount = layoutItems(items, labels);
    const bytes = encodeItems(items, labels, instructionCount);
    return { kind: 'ok', bytes, instructionCount };
  } catch (err) {
    if (err instanceof GenerateAbort) return { kind: 'error', error: err.error };
    throw err;
  }
}
