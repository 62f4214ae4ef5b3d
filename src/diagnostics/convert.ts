import type { Span, Token, TokenKind } from '../frontend/ast.js';
import type { LexError } from '../frontend/lexer.js';
import type { ParseError } from '../frontend/parser.js';
import type { SourceFile } from '../frontend/source.js';
import { lineOf, textOf } from '../frontend/source.js';
import { MAX_NUM_INSTRUCTIONS, MAX_PORT } from '../isa/encoding.js';
import { describeOperandRule } from '../isa/rules.js';
import type { GeneratorError } from '../lowering/generate.js';
import type { Diagnostic, DiagnosticId } from './types.js';
import { DiagnosticIds } from './types.js';

function diag(file: SourceFile, id: DiagnosticId, message: string, span?: Span): Diagnostic {
  if (!span) return { id, severity: 'error', message, file: file.path };
  const where = lineOf(file, span);
  return {
    id,
    severity: 'error',
    message,
    file: file.path,
    span,
    line: where.line,
    column: where.column,
  };
}

function kindName(kind: TokenKind): string {
  switch (kind) {
    case 'Comma':
      return '`,`';
    case 'Newline':
      return 'end of line';
    default:
      return kind.toLowerCase();
  }
}

function quoted(file: SourceFile, span: Span): string {
  return `\`${textOf(file, span)}\``;
}

function found(file: SourceFile, token: Token): string {
  return token.kind === 'Newline' ? 'end of line' : quoted(file, token.span);
}

export function lexErrorToDiagnostic(error: LexError, file: SourceFile): Diagnostic {
  const { span } = error.token;
  if (error.kind === 'InvalidToken') {
    return diag(file, DiagnosticIds.InvalidToken, `Invalid token ${quoted(file, span)}`, span);
  }
  return diag(file, DiagnosticIds.InvalidInteger, `Invalid integer value ${quoted(file, span)}`, span);
}

export function parseErrorToDiagnostic(error: ParseError, file: SourceFile): Diagnostic {
  switch (error.kind) {
    case 'UnexpectedToken':
      return diag(
        file,
        DiagnosticIds.UnexpectedToken,
        `Expected ${kindName(error.expected)}, found ${found(file, error.token)}`,
        error.token.span,
      );
    case 'MissingToken':
      return diag(
        file,
        DiagnosticIds.MissingToken,
        `Expected ${kindName(error.expected)}, found the end of file`,
      );
    case 'InvalidInstruction':
      return diag(
        file,
        DiagnosticIds.InvalidInstruction,
        `${quoted(file, error.token.span)} is not a valid instruction`,
        error.token.span,
      );
    case 'ExpectedInstructionBeforeLabel':
      return diag(
        file,
        DiagnosticIds.ExpectedInstructionBeforeLabel,
        `Expected instruction after label, found second label ${quoted(file, error.token.span)}`,
        error.token.span,
      );
    case 'DuplicateLabel':
      return diag(
        file,
        DiagnosticIds.DuplicateLabel,
        `Duplicate label ${quoted(file, error.token.span)}`,
        error.token.span,
      );
    case 'ExpectedInstruction':
      return diag(
        file,
        DiagnosticIds.ExpectedInstruction,
        `Expected an instruction, found ${found(file, error.token)}`,
        error.token.span,
      );
    case 'ExpectedNoOperands':
      return diag(
        file,
        DiagnosticIds.ExpectedNoOperands,
        `Instruction takes no operands, found ${found(file, error.token)}`,
        error.token.span,
      );
    case 'ExpectedOperandFoundEOF':
      return diag(
        file,
        DiagnosticIds.ExpectedOperandFoundEOF,
        `Expected instruction operand for ${quoted(file, error.token.span)}, found end of file`,
        error.token.span,
      );
    case 'ExpectedOperand':
      return diag(
        file,
        DiagnosticIds.ExpectedOperand,
        `Expected instruction operand (${describeOperandRule(error.expected)}), found ${found(
          file,
          error.token,
        )}`,
        error.token.span,
      );
    case 'ExpectedRegister':
      return diag(
        file,
        DiagnosticIds.ExpectedRegister,
        `Expected register for instruction operand, found ${quoted(file, error.token.span)}`,
        error.token.span,
      );
    case 'IntegerOutOfRange':
      return diag(
        file,
        DiagnosticIds.IntegerOutOfRange,
        `Value ${quoted(file, error.token.span)} is out of range for an 8-bit signed integer`,
        error.token.span,
      );
  }
}

export function generatorErrorToDiagnostic(error: GeneratorError, file: SourceFile): Diagnostic {
  switch (error.kind) {
    case 'MaximumInstructionsError':
      return diag(
        file,
        DiagnosticIds.MaximumInstructions,
        `Maximum number of instructions reached (${MAX_NUM_INSTRUCTIONS})`,
      );
    case 'DanglingLabelError':
      return diag(
        file,
        DiagnosticIds.DanglingLabel,
        `Dangling label ${quoted(file, error.span)}`,
        error.span,
      );
    case 'UndefinedLabelError':
      return diag(
        file,
        DiagnosticIds.UndefinedLabel,
        `Label ${quoted(file, error.span)} is undefined`,
        error.span,
      );
    case 'JumpDestinationRangeError':
      return diag(
        file,
        DiagnosticIds.JumpDestinationRange,
        `Jump destination must be in the range of 0-${MAX_NUM_INSTRUCTIONS - 1}, found ${quoted(
          file,
          error.span,
        )}`,
        error.span,
      );
    case 'SourceOrSinkRangeError':
      return diag(
        file,
        DiagnosticIds.SourceOrSinkRange,
        `Source or sink must be in the range of 0-${MAX_PORT}, found ${quoted(file, error.span)}`,
        error.span,
      );
  }
}
