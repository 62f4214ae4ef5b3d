import type { Span } from './ast.js';
import { InternalAssemblerError } from '../diagnostics/internal.js';

/** Columns a tab advances when a source line is rendered. */
export const TAB_WIDTH = 4;

/**
 * Source file + precomputed line-start offsets, used to map spans back to lines and columns.
 */
export interface SourceFile {
  path: string;
  text: string;
  /**
   * 0-based offsets for the start of each line. The first entry is always 0.
   */
  lineStarts: number[];
}

/**
 * A span resolved against its source line, ready for display.
 */
export interface SpanLine {
  /** The full line containing the span start, without its line terminator. */
  text: string;
  /** 1-based line number. */
  line: number;
  /** 1-based column of the span start, with tabs expanded to {@link TAB_WIDTH}. */
  column: number;
}

/**
 * Build a {@link SourceFile} from a path and source text.
 */
export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }
  return { path, text, lineStarts };
}

function lineIndexAt(file: SourceFile, offset: number): number {
  let lo = 0;
  let hi = file.lineStarts.length - 1;
  while (lo < hi) {
    const mid = Math.floor((lo + hi + 1) / 2);
    const midStart = file.lineStarts[mid] ?? 0;
    if (midStart <= offset) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo;
}

function assertInBounds(file: SourceFile, span: Span): void {
  if (span.offset < 0 || span.length < 0 || span.offset + span.length > file.text.length) {
    throw new InternalAssemblerError(
      `span ${span.offset}+${span.length} is outside "${file.path}" (${file.text.length} chars)`,
    );
  }
}

/**
 * Return the exact source text covered by `span`.
 */
export function textOf(file: SourceFile, span: Span): string {
  assertInBounds(file, span);
  return file.text.slice(span.offset, span.offset + span.length);
}

/**
 * Expand tabs in `text` to {@link TAB_WIDTH} spaces each.
 */
export function expandTabs(text: string): string {
  return text.replace(/\t/g, ' '.repeat(TAB_WIDTH));
}

/**
 * Resolve the line containing the start of `span`.
 */
export function lineOf(file: SourceFile, span: Span): SpanLine {
  assertInBounds(file, span);
  const index = lineIndexAt(file, span.offset);
  const lineStart = file.lineStarts[index] ?? 0;
  const nextStart = file.lineStarts[index + 1];
  let lineEnd = nextStart === undefined ? file.text.length : nextStart - 1;
  if (lineEnd > lineStart && file.text[lineEnd - 1] === '\r') lineEnd--;

  const text = file.text.slice(lineStart, lineEnd);
  // A span on the line terminator itself sits just past the echoed text.
  const before = file.text.slice(lineStart, Math.min(span.offset, lineEnd));
  return { text, line: index + 1, column: expandTabs(before).length + 1 };
}
