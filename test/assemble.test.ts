import { describe, expect, it } from 'vitest';

import { assemble, DEFAULT_FILE_NAME } from '../src/assemble.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { nops } from './helpers/program.js';

function imageOf(text: string): number[] {
  const res = assemble(text);
  if (!res.ok) throw new Error(`unexpected diagnostic: ${res.diagnostic.message}`);
  return Array.from(res.bytes);
}

function zeros(count: number): number[] {
  return new Array<number>(count).fill(0);
}

describe('assemble', () => {
  it('produces a zero-padded 64-byte image', () => {
    expect(imageOf('add r1, r2')).toEqual([0x11, 0x20, ...zeros(62)]);
  });

  it('encodes nop as two zero bytes', () => {
    expect(imageOf('nop')).toEqual(zeros(64));
    expect(imageOf(nops(32))).toEqual(zeros(64));
  });

  it('produces an all-zero image for an empty program', () => {
    const res = assemble('; nothing here\n\n');
    expect(res.ok && res.instructionCount).toBe(0);
    expect(imageOf('')).toEqual(zeros(64));
  });

  it('ignores comments, blank lines and CRLF endings', () => {
    expect(imageOf('; header\r\n\r\nnop ; idle\r\nadd r1, r2\r\n')).toEqual([0, 0, 0x11, 0x20, ...zeros(60)]);
  });

  it('matches mnemonics and registers in any case', () => {
    expect(imageOf('ADD R1, r2')).toEqual(imageOf('add r1, r2'));
  });

  it('resolves a forward reference to the next slot', () => {
    expect(imageOf('j target\ntarget: nop')).toEqual([0xf0, 0x01, ...zeros(62)]);
  });

  it('resolves a label defined on the first instruction to slot 0', () => {
    expect(imageOf('target: nop\nj target')).toEqual([0, 0, 0xf0, 0x00, ...zeros(60)]);
  });

  it('accepts labels spelled with astral-plane letters', () => {
    expect(imageOf('𝑥: nop\nj 𝑥')).toEqual([0, 0, 0xf0, 0x00, ...zeros(60)]);
  });

  it('is deterministic', () => {
    const text = 'loop: ldi r1, 3\nout r1, 0\njlt r1, loop\n';
    expect(imageOf(text)).toEqual(imageOf(text));
  });

  it('collects defined labels as symbols', () => {
    const res = assemble('start: nop\nloop: j loop');
    expect(res.ok && res.symbols).toEqual([
      { kind: 'label', name: 'start', slot: 0, address: 0, line: 1 },
      { kind: 'label', name: 'loop', slot: 1, address: 2, line: 2 },
    ]);
  });

  it('reports the first failure and no image', () => {
    const res = assemble(nops(33));
    expect(res.ok).toBe(false);
    expect(res.ok ? undefined : res.diagnostic.id).toBe(DiagnosticIds.MaximumInstructions);
    expect('bytes' in res).toBe(false);
  });

  it('rejects each out-of-range operand', () => {
    const ids = ['in r0, 16', 'jz r0, 32', 'ldi r0, 200'].map((text) => {
      const res = assemble(text);
      return res.ok ? undefined : res.diagnostic.id;
    });
    expect(ids).toEqual([
      DiagnosticIds.SourceOrSinkRange,
      DiagnosticIds.JumpDestinationRange,
      DiagnosticIds.IntegerOutOfRange,
    ]);
  });

  it('names the source in diagnostics', () => {
    const unnamed = assemble('j missing');
    expect(unnamed.ok ? undefined : unnamed.diagnostic.file).toBe(DEFAULT_FILE_NAME);
    const named = assemble('j missing', { fileName: 'prog.asm' });
    expect(named.ok ? undefined : named.diagnostic.file).toBe('prog.asm');
    expect(named.source.path).toBe('prog.asm');
  });
});
