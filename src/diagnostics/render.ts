import type { SourceFile } from '../frontend/source.js';
import { expandTabs, lineOf } from '../frontend/source.js';
import type { Diagnostic } from './types.js';

/**
 * Render a diagnostic as terminal text.
 *
 * Without a span this is the single `error: <message>` line. With one, a locator, the offending source line
 * (tabs expanded) and a caret underline the length of the span follow:
 *
 * ```text
 * error: Label `missing` is undefined
 *    --> prog.asm:1:3
 *  1 | j missing
 *        ^^^^^^^
 * ```
 */
export function renderDiagnostic(diagnostic: Diagnostic, source: SourceFile): string {
  const lines = [`${diagnostic.severity}: ${diagnostic.message}`];
  const { span } = diagnostic;

  if (span) {
    const where = lineOf(source, span);
    const lineNumber = String(where.line);
    const gutter = ' '.repeat(lineNumber.length);

    lines.push(` ${gutter} --> ${source.path}:${where.line}:${where.column}`);
    lines.push(` ${lineNumber} | ${expandTabs(where.text)}`);
    lines.push(`${gutter}${' '.repeat(where.column - 1 + 4)}${'^'.repeat(Math.max(1, span.length))}`);
  }

  return lines.join('\n') + '\n';
}
