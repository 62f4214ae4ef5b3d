import { generatorErrorToDiagnostic, lexErrorToDiagnostic, parseErrorToDiagnostic } from './diagnostics/convert.js';
import type { LabelTable } from './frontend/labels.js';
import { filterTokens, lex } from './frontend/lexer.js';
import { parseProgram } from './frontend/parser.js';
import type { SourceFile } from './frontend/source.js';
import { lineOf, makeSourceFile } from './frontend/source.js';
import type { SymbolEntry } from './formats/types.js';
import { INSTRUCTION_MEMORY_SIZE_BYTES, INSTRUCTION_SIZE_BYTES } from './isa/encoding.js';
import { generateProgram } from './lowering/generate.js';
import type { AssembleResult, AssemblerOptions } from './pipeline.js';

export const DEFAULT_FILE_NAME = '<source>';

function collectSymbols(labels: LabelTable, file: SourceFile): SymbolEntry[] {
  const out: SymbolEntry[] = [];
  for (const rec of labels.entries()) {
    if (rec.value === undefined) continue;
    out.push({
      kind: 'label',
      name: rec.name,
      slot: rec.value,
      address: rec.value * INSTRUCTION_SIZE_BYTES,
      ...(rec.span ? { line: lineOf(file, rec.span).line } : {}),
    });
  }
  return out;
}

/**
 * Assemble one source unit into the 64-byte instruction image.
 *
 * Stops at the first lexical, parse or generation error and reports only that one. The image is the encoded
 * instructions in source order followed by zero bytes (which read back as `nop`).
 */
export function assemble(text: string, options: AssemblerOptions = {}): AssembleResult {
  const source = makeSourceFile(options.fileName ?? DEFAULT_FILE_NAME, text);

  const filtered = filterTokens(lex(text));
  if (filtered.kind === 'error') {
    return { ok: false, source, diagnostic: lexErrorToDiagnostic(filtered.error, source) };
  }

  const parsed = parseProgram(filtered.tokens, source);
  if (parsed.kind === 'error') {
    return { ok: false, source, diagnostic: parseErrorToDiagnostic(parsed.error, source) };
  }

  const generated = generateProgram(parsed.items, parsed.labels);
  if (generated.kind === 'error') {
    return { ok: false, source, diagnostic: generatorErrorToDiagnostic(generated.error, source) };
  }

  const bytes = new Uint8Array(INSTRUCTION_MEMORY_SIZE_BYTES);
  bytes.set(generated.bytes);
  return {
    ok: true,
    source,
    bytes,
    instructionCount: generated.instructionCount,
    symbols: collectSymbols(parsed.labels, source),
  };
}
