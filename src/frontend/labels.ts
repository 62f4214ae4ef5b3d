import type { LabelId, Span } from './ast.js';
import { InternalAssemblerError } from '../diagnostics/internal.js';

/**
 * One row in the label arena.
 *
 * `span` is set once the definition is parsed; `value` is set by the generator's layout pass.
 */
export interface LabelRecord {
  readonly name: string;
  span?: Span;
  /** Instruction slot the label binds to. */
  value?: number;
}

/**
 * Label names, definitions and resolved slots for one assembly.
 *
 * Records live in an arena indexed by {@link LabelId}; ids are allocated in first-seen order and never reused.
 * Names are case-sensitive.
 */
export class LabelTable {
  private readonly records: LabelRecord[] = [];
  private readonly byName = new Map<string, LabelId>();

  get size(): number {
    return this.records.length;
  }

  idOf(name: string): LabelId | undefined {
    return this.byName.get(name);
  }

  /**
   * Insert a label seen for the first time at its definition.
   *
   * Returns `undefined` when the name already has a row.
   */
  insertUnique(name: string, span: Span): LabelId | undefined {
    if (this.byName.has(name)) return undefined;
    return this.allocate({ name, span });
  }

  /**
   * Look up a label used as an operand, inserting a forward reference when it is not known yet.
   */
  getOrInsertReference(name: string): LabelId {
    return this.byName.get(name) ?? this.allocate({ name });
  }

  nameOf(id: LabelId): string {
    return this.record(id).name;
  }

  spanOf(id: LabelId): Span | undefined {
    return this.record(id).span;
  }

  setSpan(id: LabelId, span: Span): void {
    const rec = this.record(id);
    if (rec.span) {
      throw new InternalAssemblerError(`label "${rec.name}" is already defined`);
    }
    rec.span = span;
  }

  valueOf(id: LabelId): number | undefined {
    return this.record(id).value;
  }

  setValue(id: LabelId, value: number): void {
    this.record(id).value = value;
  }

  /**
   * Snapshot of all rows in id order.
   */
  entries(): Array<{ id: LabelId } & Readonly<LabelRecord>> {
    return this.records.map((rec, id) => ({ id, ...rec }));
  }

  private allocate(rec: LabelRecord): LabelId {
    const id = this.records.length;
    this.records.push(rec);
    this.byName.set(rec.name, id);
    return id;
  }

  private record(id: LabelId): LabelRecord {
    const rec = this.records[id];
    if (!rec) throw new InternalAssemblerError(`unknown label id ${id}`);
    return rec;
  }
}
