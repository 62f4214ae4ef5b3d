import type {
  Instruction,
  Item,
  Operand,
  Token,
  TokenKind,
} from './ast.js';
import { LabelTable } from './labels.js';
import type { SourceFile } from './source.js';
import { textOf } from './source.js';
import { opcodeFromMnemonic, registerFromName } from '../isa/encoding.js';
import type { OperandRule } from '../isa/rules.js';
import { operandRulesFor } from '../isa/rules.js';
import { InternalAssemblerError } from '../diagnostics/internal.js';

/**
 * Syntax / static-semantics failures. The parser stops at the first one.
 */
export type ParseError =
  | { kind: 'UnexpectedToken'; expected: TokenKind; token: Token }
  | { kind: 'MissingToken'; expected: TokenKind }
  | { kind: 'InvalidInstruction'; token: Token }
  | { kind: 'ExpectedInstructionBeforeLabel'; token: Token }
  | { kind: 'DuplicateLabel'; token: Token }
  | { kind: 'ExpectedInstruction'; token: Token }
  | { kind: 'ExpectedNoOperands'; token: Token }
  /** `token` is the instruction mnemonic whose operand is missing. */
  | { kind: 'ExpectedOperandFoundEOF'; token: Token }
  | { kind: 'ExpectedOperand'; token: Token; expected: OperandRule }
  | { kind: 'ExpectedRegister'; token: Token }
  | { kind: 'IntegerOutOfRange'; token: Token };

export type ParseResult =
  | { kind: 'ok'; items: Item[]; labels: LabelTable }
  | { kind: 'error'; error: ParseError };

const I8_MAX = 127;

class ParseAbort extends Error {
  constructor(readonly error: ParseError) {
    super(error.kind);
    this.name = 'ParseAbort';
  }
}

class Parser {
  private pos = 0;
  /** A label has been defined and no instruction has followed it yet. */
  private pendingLabel = false;
  readonly labels = new LabelTable();

  constructor(
    private readonly tokens: readonly Token[],
    private readonly file: SourceFile,
  ) {}

  parse(): Item[] {
    const items: Item[] = [];
    while (this.peek()) {
      this.parseLine(items);
    }
    return items;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token | undefined {
    const t = this.tokens[this.pos];
    if (t) this.pos++;
    return t;
  }

  private atLineEnd(): boolean {
    const t = this.peek();
    return t === undefined || t.kind === 'Newline';
  }

  private text(t: Token): string {
    return textOf(this.file, t.span);
  }

  private parseLine(items: Item[]): void {
    const first = this.peek();
    if (!first) return;

    if (first.kind === 'Newline') {
      this.next();
      return;
    }

    let parseInstruction = true;
    if (first.kind === 'Label') {
      items.push({ kind: 'Label', id: this.defineLabel(first) });
      this.next();
      parseInstruction = !this.atLineEnd();
    }

    if (parseInstruction) {
      items.push({ kind: 'Instruction', instruction: this.parseInstruction() });
      this.pendingLabel = false;
    }

    const end = this.next();
    if (end && end.kind !== 'Newline') {
      throw new ParseAbort({ kind: 'UnexpectedToken', expected: 'Newline', token: end });
    }
  }

  private defineLabel(t: Token): number {
    if (this.pendingLabel) {
      throw new ParseAbort({ kind: 'ExpectedInstructionBeforeLabel', token: t });
    }
    this.pendingLabel = true;

    const name = this.text(t).slice(0, -1);
    const existing = this.labels.idOf(name);
    if (existing === undefined) {
      const id = this.labels.insertUnique(name, t.span);
      if (id === undefined) throw new ParseAbort({ kind: 'DuplicateLabel', token: t });
      return id;
    }
    if (this.labels.spanOf(existing)) {
      throw new ParseAbort({ kind: 'DuplicateLabel', token: t });
    }
    this.labels.setSpan(existing, t.span);
    return existing;
  }

  private parseInstruction(): Instruction {
    const head = this.next();
    if (!head) {
      throw new InternalAssemblerError('attempted to parse an instruction from an empty token stream');
    }
    if (head.kind !== 'Identifier') {
      throw new ParseAbort({ kind: 'ExpectedInstruction', token: head });
    }

    const opcode = opcodeFromMnemonic(this.text(head));
    if (!opcode) throw new ParseAbort({ kind: 'InvalidInstruction', token: head });

    const rules = operandRulesFor(opcode);
    const [firstRule, secondRule] = rules;

    if (!firstRule) {
      if (this.atLineEnd()) return { kind: 'NoOperand', opcode };
      const extra = this.next();
      if (!extra) throw new InternalAssemblerError('token stream ended after a lookahead');
      throw new ParseAbort({ kind: 'ExpectedNoOperands', token: extra });
    }

    const first = this.parseOperand(head, firstRule);
    if (!secondRule) return { kind: 'SingleOperand', opcode, operand: first };

    const comma = this.next();
    if (!comma) throw new ParseAbort({ kind: 'MissingToken', expected: 'Comma' });
    if (comma.kind !== 'Comma') {
      throw new ParseAbort({ kind: 'UnexpectedToken', expected: 'Comma', token: comma });
    }

    const second = this.parseOperand(head, secondRule);
    return { kind: 'DoubleOperand', opcode, first, second };
  }

  private parseOperand(head: Token, rule: OperandRule): Operand {
    const t = this.next();
    if (!t) throw new ParseAbort({ kind: 'ExpectedOperandFoundEOF', token: head });

    const wantsIdentifier = rule.includes('Register') || rule.includes('Label');
    const wantsInteger = rule.includes('Integer');

    if (t.kind === 'Identifier' && wantsIdentifier) {
      const text = this.text(t);
      if (rule.includes('Register')) {
        const register = registerFromName(text);
        if (register) return { kind: 'Register', value: register, span: t.span };
      }
      if (rule.includes('Label')) {
        return { kind: 'Label', id: this.labels.getOrInsertReference(text), span: t.span };
      }
      throw new ParseAbort({ kind: 'ExpectedRegister', token: t });
    }

    if (t.kind === 'Integer' && wantsInteger) {
      const text = this.text(t);
      const value = /^[0-9]+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;
      if (!Number.isSafeInteger(value) || value > I8_MAX) {
        throw new ParseAbort({ kind: 'IntegerOutOfRange', token: t });
      }
      return { kind: 'Integer', value, span: t.span };
    }

    throw new ParseAbort({ kind: 'ExpectedOperand', token: t, expected: rule });
  }
}

/**
 * Parse a filtered token stream (no comments, no lexical error tokens) into items plus the label table.
 *
 * Each line is blank, a label, an instruction, or a label followed by an instruction. Labels may be referenced
 * before they are defined; resolution happens in the generator.
 */
export function parseProgram(tokens: readonly Token[], file: SourceFile): ParseResult {
  const parser = new Parser(tokens, file);
  try {
    const items = parser.parse();
    return { kind: 'ok', items, labels: parser.labels };
  } catch (err) {
    if (err instanceof ParseAbort) return { kind: 'error', error: err.error };
    throw err;
  }
}
