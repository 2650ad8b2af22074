import { readFile } from 'node:fs/promises';

import Papa from 'papaparse';

import { TableParseError } from './errors';
import type { TimestampKey } from './key';
import type { FieldValue } from './row';
import { createSchema, KEY_COLUMN, type Schema } from './schema';
import { Table, type DuplicateKey } from './table';

const NEWLINE = '\n';

export type RecordResult =
  | { ok: true; rowIndex: number; key: TimestampKey; values: string[] }
  | { ok: false; rowIndex: number; reason: string };

export type ParsedTableText = {
  keyColumn: string;
  schema: Schema;
  records: RecordResult[];
};

export type LoadedTable = {
  table: Table;
  duplicates: DuplicateKey[];
  skipped: Extract<RecordResult, { ok: false }>[];
};

export function formatDelimitedLine(fields: readonly FieldValue[]): string {
  return Papa.unparse([fields.map((field) => (typeof field === 'number' ? String(field) : field))], {
    newline: NEWLINE
  });
}

export function* serializeTableLines(table: Table): Generator<string> {
  yield formatDelimitedLine([KEY_COLUMN, ...table.schema]);
  for (const [key, row] of table.entries()) {
    yield formatDelimitedLine([key, ...row]);
  }
}

export function serializeTable(table: Table): string {
  return Array.from(serializeTableLines(table), (line) => `${line}${NEWLINE}`).join('');
}

function parseRows(text: string, source: string): string[][] {
  const normalized = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const parsed = Papa.parse<string[]>(normalized, { skipEmptyLines: true });
  if (parsed.data.length === 0) {
    throw new TableParseError(source, 'no header row');
  }
  return parsed.data;
}

/**
 * Splits delimited text into a schema and per-record results. Records whose
 * field count differs from the header, or whose key cell is blank, come back
 * as failures instead of aborting the parse.
 */
export function parseTableText(text: string, source = '<inline>'): ParsedTableText {
  const [header, ...rows] = parseRows(text, source);
  const [keyColumn, ...columns] = header.map((cell) => cell.trim());
  if (!keyColumn) {
    throw new TableParseError(source, 'header has no key column');
  }

  const records = rows.map((fields, rowIndex): RecordResult => {
    if (fields.length !== header.length) {
      return { ok: false, rowIndex, reason: `expected ${header.length} fields, found ${fields.length}` };
    }
    const [rawKey, ...values] = fields;
    const key = rawKey.trim();
    if (!key) {
      return { ok: false, rowIndex, reason: 'missing timestamp' };
    }
    return { ok: true, rowIndex, key, values };
  });

  let schema: Schema;
  try {
    schema = createSchema(columns);
  } catch (error) {
    throw new TableParseError(source, error instanceof Error ? error.message : String(error));
  }
  return { keyColumn, schema, records };
}

export async function readTableFile(filePath: string): Promise<LoadedTable> {
  const text = await readFile(filePath, 'utf8');
  const { schema, records } = parseTableText(text, filePath);

  const skipped: LoadedTable['skipped'] = [];
  const accepted: [TimestampKey, string[]][] = [];
  for (const record of records) {
    if (record.ok) {
      accepted.push([record.key, record.values]);
    } else {
      skipped.push(record);
    }
  }

  const { table, duplicates } = Table.fromEntries(schema, accepted);
  return { table, duplicates, skipped };
}

/** Every row of a delimited file as raw fields, header included. */
export async function readDelimitedRows(filePath: string): Promise<string[][]> {
  return parseRows(await readFile(filePath, 'utf8'), filePath);
}

/** First-column values of every data row, in file order and before any de-duplication. */
export async function readKeyColumn(filePath: string): Promise<string[]> {
  const text = await readFile(filePath, 'utf8');
  const [, ...rows] = parseRows(text, filePath);
  return rows.map((fields) => (fields[0] ?? '').trim());
}
