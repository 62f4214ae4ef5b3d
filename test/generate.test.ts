import { describe, expect, it } from 'vitest';

import { InternalAssemblerError } from '../src/diagnostics/internal.js';
import { LabelTable } from '../src/frontend/labels.js';
import { generateProgram } from '../src/lowering/generate.js';
import { nops, parseOk } from './helpers/program.js';

function generate(text: string) {
  const { items, labels } = parseOk(text);
  return generateProgram(items, labels);
}

function hexBytes(text: string): string[] {
  const res = generate(text);
  if (res.kind === 'error') throw new Error(`unexpected generator error: ${res.error.kind}`);
  return Array.from(res.bytes, (b) => b.toString(16).toUpperCase().padStart(2, '0'));
}

describe('generateProgram', () => {
  it('encodes every opcode', () => {
    const program = [
      'nop',
      'add r1, r2',
      'ldi r3, 100',
      'sub r4, r5',
      'and r6, r7',
      'or r8, r9',
      'inv r10',
      'xor r11, r12',
      'sr r13, r14',
      'sl r15, r0',
      'in r1, 3',
      'out r2, 15',
      'jz r3, 5',
      'jlt r4, 31',
      'j 0',
    ].join('\n');
    expect(hexBytes(program)).toEqual([
      '00', '00',
      '11', '20',
      '23', '64',
      '34', '50',
      '56', '70',
      '68', '90',
      '7A', '00',
      '8B', 'C0',
      '9D', 'E0',
      'AF', '00',
      'B1', '30',
      'C2', 'F0',
      'D3', '05',
      'E4', '1F',
      'F0', '00',
    ]);
  });

  it('resolves labels to instruction slots', () => {
    const text = [
      'start: ldi r1, 1',
      'loop:  sub r1, r2',
      '       jz r1, done',
      '       j loop',
      'done:  nop',
    ].join('\n');
    const { items, labels } = parseOk(text);
    const res = generateProgram(items, labels);
    expect(res).toEqual({
      kind: 'ok',
      bytes: Uint8Array.from([0x21, 0x01, 0x31, 0x20, 0xd1, 0x04, 0xf0, 0x01, 0x00, 0x00]),
      instructionCount: 5,
    });
    expect([0, 1, 2].map((id) => [labels.nameOf(id), labels.valueOf(id)])).toEqual([
      ['start', 0],
      ['loop', 1],
      ['done', 4],
    ]);
  });

  it('resolves a forward jump', () => {
    expect(hexBytes('j target\ntarget: nop')).toEqual(['F0', '01', '00', '00']);
  });

  it('binds a label on its own line to the next instruction', () => {
    expect(hexBytes('nop\nhere:\n\nj here')).toEqual(['00', '00', 'F0', '01']);
  });

  it('fills all 32 slots', () => {
    const res = generate(nops(32));
    expect(res.kind === 'ok' && res.instructionCount).toBe(32);
  });

  it('rejects a 33rd instruction', () => {
    expect(generate(nops(33))).toEqual({
      kind: 'error',
      error: { kind: 'MaximumInstructionsError' },
    });
  });

  it('rejects a label with no instruction after it', () => {
    expect(generate('nop\nend:')).toEqual({
      kind: 'error',
      error: { kind: 'DanglingLabelError', span: { offset: 4, length: 4 } },
    });
    expect(generate('j end\nend:')).toEqual({
      kind: 'error',
      error: { kind: 'DanglingLabelError', span: { offset: 6, length: 4 } },
    });
  });

  it('rejects references to undefined labels', () => {
    expect(generate('j missing')).toEqual({
      kind: 'error',
      error: { kind: 'UndefinedLabelError', span: { offset: 2, length: 7 } },
    });
  });

  it('checks immediate jump destinations', () => {
    expect(hexBytes('jz r0, 31')).toEqual(['D0', '1F']);
    expect(generate('jz r0, 32')).toEqual({
      kind: 'error',
      error: { kind: 'JumpDestinationRangeError', span: { offset: 7, length: 2 } },
    });
  });

  it('checks port numbers', () => {
    expect(generate('in r0, 16')).toEqual({
      kind: 'error',
      error: { kind: 'SourceOrSinkRangeError', span: { offset: 7, length: 2 } },
    });
  });

  it('throws an internal error for instruction shapes the parser never produces', () => {
    const labels = new LabelTable();
    expect(() =>
      generateProgram([{ kind: 'Instruction', instruction: { kind: 'NoOperand', opcode: 'Add' } }], labels),
    ).toThrow(InternalAssemblerError);
    expect(() =>
      generateProgram(
        [
          {
            kind: 'Instruction',
            instruction: {
              kind: 'DoubleOperand',
              opcode: 'Ldi',
              first: { kind: 'Register', value: 'R1', span: { offset: 0, length: 2 } },
              second: { kind: 'Register', value: 'R2', span: { offset: 4, length: 2 } },
            },
          },
        ],
        labels,
      ),
    ).toThrow(InternalAssemblerError);
  });
});
