import { compareKeys, type TimestampKey } from './key';
import { createRow, type FieldValue, type Row } from './row';
import { createSchema, indexSchema, type Schema } from './schema';

export type DuplicateKey = {
  key: TimestampKey;
  occurrences: number;
};

export type TableBuildResult = {
  table: Table;
  /** Keys the raw stream carried more than once; the first occurrence was kept. */
  duplicates: DuplicateKey[];
};

/**
 * Key-unique mapping from timestamp key to row. Iteration follows insertion
 * order so a table re-serializes deterministically.
 */
export class Table {
  readonly schema: Schema;
  private readonly rows = new Map<TimestampKey, Row>();
  private readonly columnIndex: Map<string, number>;

  constructor(columns: readonly string[]) {
    this.schema = createSchema(columns);
    this.columnIndex = indexSchema(this.schema);
  }

  static fromEntries(
    columns: readonly string[],
    entries: Iterable<readonly [TimestampKey, readonly FieldValue[]]>
  ): TableBuildResult {
    const table = new Table(columns);
    const seen = new Map<TimestampKey, number>();
    for (const [key, values] of entries) {
      if (!table.insert(key, values)) {
        seen.set(key, (seen.get(key) ?? 1) + 1);
      }
    }
    const duplicates = Array.from(seen, ([key, occurrences]) => ({ key, occurrences }));
    duplicates.sort((a, b) => compareKeys(a.key, b.key));
    return { table, duplicates };
  }

  get size(): number {
    return this.rows.size;
  }

  /** Adds a row unless the key is already present. Returns whether it was added. */
  insert(key: TimestampKey, values: readonly FieldValue[]): boolean {
    const row = createRow(this.schema, values);
    if (this.rows.has(key)) {
      return false;
    }
    this.rows.set(key, row);
    return true;
  }

  has(key: TimestampKey): boolean {
    return this.rows.has(key);
  }

  get(key: TimestampKey): Row | undefined {
    return this.rows.get(key);
  }

  hasColumn(column: string): boolean {
    return this.columnIndex.has(column);
  }

  indexOf(column: string): number {
    return this.columnIndex.get(column) ?? -1;
  }

  value(key: TimestampKey, column: string): FieldValue | undefined {
    const index = this.columnIndex.get(column);
    if (index === undefined) {
      return undefined;
    }
    return this.rows.get(key)?.[index];
  }

  keys(): TimestampKey[] {
    return Array.from(this.rows.keys());
  }

  sortedKeys(): TimestampKey[] {
    return this.keys().sort(compareKeys);
  }

  entries(): IterableIterator<[TimestampKey, Row]> {
    return this.rows.entries();
  }

  /** Copy with rows in ascending key order. */
  sorted(): Table {
    const copy = new Table(this.schema);
    for (const key of this.sortedKeys()) {
      const row = this.rows.get(key);
      if (row) {
        copy.insert(key, row);
      }
    }
    return copy;
  }

  /** Copy with `columns` appended, valued per row by `derive`. */
  extend(columns: readonly string[], derive: (key: TimestampKey, row: Row) => readonly FieldValue[]): Table {
    const extended = new Table([...this.schema, ...columns]);
    for (const [key, row] of this.rows) {
      extended.insert(key, [...row, ...derive(key, row)]);
    }
    return extended;
  }
}
