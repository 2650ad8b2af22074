import { compareKeys, type TimestampKey } from './key';
import { SENTINEL, type FieldValue } from './row';
import type { Schema } from './schema';
import { Table } from './table';

export type ColumnSource = 'a' | 'b' | 'unresolved';

export type SchemaDriftWarning =
  | { kind: 'missing-columns'; columns: string[] }
  | { kind: 'extra-columns'; columns: string[] };

export type ReconcileResult = {
  table: Table;
  warnings: SchemaDriftWarning[];
  columnSources: Record<string, ColumnSource>;
};

/**
 * Full outer join of two keyed tables onto `canonical`. Each canonical column
 * is taken from `a` when `a` declares it, otherwise from `b`. Columns neither
 * side declares are filled with the sentinel, and columns outside `canonical`
 * are dropped; both cases are reported as warnings.
 */
export function reconcileTables(a: Table, b: Table, canonical: Schema): ReconcileResult {
  const declared = new Set([...a.schema, ...b.schema]);
  const canonicalSet = new Set(canonical);

  const warnings: SchemaDriftWarning[] = [];
  const missing = canonical.filter((column) => !declared.has(column)).sort();
  if (missing.length > 0) {
    warnings.push({ kind: 'missing-columns', columns: missing });
  }
  const extra = Array.from(declared)
    .filter((column) => !canonicalSet.has(column))
    .sort();
  if (extra.length > 0) {
    warnings.push({ kind: 'extra-columns', columns: extra });
  }

  const columnSources: Record<string, ColumnSource> = {};
  const resolvers = canonical.map((column) => {
    if (a.hasColumn(column)) {
      columnSources[column] = 'a';
      const index = a.indexOf(column);
      return (key: TimestampKey): FieldValue => a.get(key)?.[index] ?? SENTINEL;
    }
    if (b.hasColumn(column)) {
      columnSources[column] = 'b';
      const index = b.indexOf(column);
      return (key: TimestampKey): FieldValue => b.get(key)?.[index] ?? SENTINEL;
    }
    columnSources[column] = 'unresolved';
    return (): FieldValue => SENTINEL;
  });

  const keys = Array.from(new Set([...a.keys(), ...b.keys()])).sort(compareKeys);
  const table = new Table(canonical);
  for (const key of keys) {
    table.insert(
      key,
      resolvers.map((resolve) => resolve(key))
    );
  }

  return { table, warnings, columnSources };
}

export function describeDriftWarning(warning: SchemaDriftWarning): string {
  const list = warning.columns.join(', ');
  return warning.kind === 'missing-columns'
    ? `Columns absent from both inputs were filled with blanks: ${list}`
    : `Columns outside the canonical schema were dropped: ${list}`;
}
