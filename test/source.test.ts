import { describe, expect, it } from 'vitest';

import { InternalAssemblerError } from '../src/diagnostics/internal.js';
import { expandTabs, lineOf, makeSourceFile, textOf } from '../src/frontend/source.js';

const file = makeSourceFile('p.asm', 'nop\n\tadd r1, r2\r\nj x');

describe('source index', () => {
  it('records line starts', () => {
    expect(file.lineStarts).toEqual([0, 4, 17]);
  });

  it('returns span text', () => {
    expect(textOf(file, { offset: 5, length: 3 })).toBe('add');
  });

  it('rejects spans outside the text', () => {
    expect(() => textOf(file, { offset: 18, length: 5 })).toThrow(InternalAssemblerError);
  });

  it('resolves line text, number and tab-expanded column', () => {
    expect(lineOf(file, { offset: 9, length: 2 })).toEqual({
      text: '\tadd r1, r2',
      line: 2,
      column: 9,
    });
    expect(lineOf(file, { offset: 19, length: 1 })).toEqual({ text: 'j x', line: 3, column: 3 });
    expect(lineOf(file, { offset: 0, length: 3 })).toEqual({ text: 'nop', line: 1, column: 1 });
  });

  it('places a span on a CRLF terminator just past the line text', () => {
    const crlf = makeSourceFile('c.asm', 'add r1\r\nnop');
    expect(lineOf(crlf, { offset: 7, length: 1 })).toEqual({ text: 'add r1', line: 1, column: 7 });
  });

  it('expands tabs to four spaces', () => {
    expect(expandTabs('\ta\tb')).toBe('    a    b');
  });
});
