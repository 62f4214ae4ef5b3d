import type { Opcode, OperandKind } from '../frontend/ast.js';

/**
 * Set of operand kinds accepted at one operand position.
 */
export type OperandRule = readonly OperandKind[];

const REG: OperandRule = Object.freeze(['Register'] as const);
const INT: OperandRule = Object.freeze(['Integer'] as const);
const TARGET: OperandRule = Object.freeze(['Integer', 'Label'] as const);

const REG_REG = Object.freeze([REG, REG]);
const REG_INT = Object.freeze([REG, INT]);
const REG_TARGET = Object.freeze([REG, TARGET]);

/**
 * Operand arity and accepted kinds per opcode.
 */
const OPERAND_RULES: Readonly<Record<Opcode, readonly OperandRule[]>> = Object.freeze({
  Nop: Object.freeze([]),
  Add: REG_REG,
  Ldi: REG_INT,
  Sub: REG_REG,
  And: REG_REG,
  Or: REG_REG,
  Inv: Object.freeze([REG]),
  Xor: REG_REG,
  Sr: REG_REG,
  Sl: REG_REG,
  In: REG_INT,
  Out: REG_INT,
  Jz: REG_TARGET,
  Jlt: REG_TARGET,
  J: Object.freeze([TARGET]),
});

export function operandRulesFor(opcode: Opcode): readonly OperandRule[] {
  return OPERAND_RULES[opcode];
}

/**
 * Human-readable list of accepted kinds, e.g. `register` or `integer or label`.
 */
export function describeOperandRule(rule: OperandRule): string {
  const names = rule.map((k) => k.toLowerCase());
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} or ${names[names.length - 1] ?? ''}`;
}
