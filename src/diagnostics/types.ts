import type { Span } from '../frontend/ast.js';

/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error';

/**
 * An assembler diagnostic with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `ASM203`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** Offending range, used for the caret underline. */
  span?: Span;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based rendered column, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * One ID per error kind; the hundreds digit groups the stage that raised it.
 */
export const DiagnosticIds = {
  /** Failed to read the source file from disk. */
  IoReadFailed: 'ASM001',

  /** Character that starts no token. */
  InvalidToken: 'ASM100',
  /** Digit run containing letters, e.g. `12ab`. */
  InvalidInteger: 'ASM101',

  UnexpectedToken: 'ASM200',
  MissingToken: 'ASM201',
  InvalidInstruction: 'ASM202',
  DuplicateLabel: 'ASM203',
  /** Two label definitions with no instruction between them. */
  ExpectedInstructionBeforeLabel: 'ASM204',
  ExpectedInstruction: 'ASM205',
  ExpectedNoOperands: 'ASM206',
  ExpectedOperandFoundEOF: 'ASM207',
  ExpectedOperand: 'ASM208',
  ExpectedRegister: 'ASM209',
  IntegerOutOfRange: 'ASM210',

  MaximumInstructions: 'ASM300',
  DanglingLabel: 'ASM301',
  UndefinedLabel: 'ASM302',
  JumpDestinationRange: 'ASM303',
  SourceOrSinkRange: 'ASM304',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
