/**
 * Primary keys accepted so far, per table, used to resolve foreign keys.
 *
 * The base dictionary index lives for the whole run. Each data batch works on
 * an `extend()`ed layer over it, so parents accepted earlier in the batch
 * resolve their children without the run-wide index growing with every
 * session ever seen.
 *
 * Keys are taken back out (`remove`, `drop`) when the rows they stand for
 * never reach the sink, so nothing loaded later resolves against them.
 */
import type { ColumnValue } from '@domain/entities/NormalizedRow';

export function keyOf(values: readonly ColumnValue[]): string {
  return JSON.stringify(values);
}

export class KeyIndex {
  private readonly keys = new Map<string, Set<string>>();

  constructor(private readonly parent: KeyIndex | null = null) {}

  add(table: string, values: readonly ColumnValue[]): void {
    let set = this.keys.get(table);
    if (!set) {
      set = new Set();
      this.keys.set(table, set);
    }
    set.add(keyOf(values));
  }

  remove(table: string, values: readonly ColumnValue[]): void {
    this.keys.get(table)?.delete(keyOf(values));
  }

  /** Forgets every key of `table` held by this layer. */
  drop(table: string): void {
    this.keys.delete(table);
  }

  has(table: string, values: readonly ColumnValue[]): boolean {
    return this.hasKey(table, keyOf(values));
  }

  extend(): KeyIndex {
    return new KeyIndex(this);
  }

  private hasKey(table: string, key: string): boolean {
    if (this.keys.get(table)?.has(key)) return true;
    return this.parent ? this.parent.hasKey(table, key) : false;
  }
}
