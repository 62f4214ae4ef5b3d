import { describe, expect, it } from 'vitest';

import { InternalAssemblerError } from '../src/diagnostics/internal.js';
import { LabelTable } from '../src/frontend/labels.js';

describe('LabelTable', () => {
  it('allocates ids in first-seen order', () => {
    const labels = new LabelTable();
    expect(labels.insertUnique('start', { offset: 0, length: 6 })).toBe(0);
    expect(labels.getOrInsertReference('end')).toBe(1);
    expect(labels.getOrInsertReference('start')).toBe(0);
    expect(labels.size).toBe(2);
  });

  it('refuses a second row for the same name', () => {
    const labels = new LabelTable();
    labels.getOrInsertReference('loop');
    expect(labels.insertUnique('loop', { offset: 4, length: 5 })).toBeUndefined();
  });

  it('fills a forward reference with its definition span', () => {
    const labels = new LabelTable();
    const id = labels.getOrInsertReference('done');
    expect(labels.spanOf(id)).toBeUndefined();
    labels.setSpan(id, { offset: 10, length: 5 });
    expect(labels.spanOf(id)).toEqual({ offset: 10, length: 5 });
    expect(() => labels.setSpan(id, { offset: 20, length: 5 })).toThrow(InternalAssemblerError);
  });

  it('stores resolved values', () => {
    const labels = new LabelTable();
    const id = labels.insertUnique('a', { offset: 0, length: 2 });
    expect(id).toBe(0);
    labels.setValue(0, 3);
    expect(labels.valueOf(0)).toBe(3);
    expect(labels.entries()).toEqual([
      { id: 0, name: 'a', span: { offset: 0, length: 2 }, value: 3 },
    ]);
  });

  it('keeps names case-sensitive', () => {
    const labels = new LabelTable();
    labels.getOrInsertReference('Loop');
    expect(labels.idOf('loop')).toBeUndefined();
  });

  it('rejects unknown ids', () => {
    expect(() => new LabelTable().nameOf(0)).toThrow(InternalAssemblerError);
  });
});
