import { SchemaError } from './errors';

export const KEY_COLUMN = 'date_time';

/** Ordered value columns of a table. The key column is never part of it. */
export type Schema = readonly string[];

export function createSchema(columns: readonly string[]): Schema {
  const seen = new Set<string>();
  for (const column of columns) {
    if (column.trim().length === 0) {
      throw new SchemaError('Column names must not be empty');
    }
    if (column === KEY_COLUMN) {
      throw new SchemaError(`'${KEY_COLUMN}' is the key column and cannot be a value column`);
    }
    if (seen.has(column)) {
      throw new SchemaError(`Duplicate column '${column}'`);
    }
    seen.add(column);
  }
  return Object.freeze([...columns]);
}

export const WEATHER_COLUMNS = createSchema(['temp', 'dwpt', 'rhum', 'prcp', 'wdir', 'wspd', 'pres', 'coco']);

export const CANONICAL_SCHEMA = createSchema([
  'load',
  'is_holiday',
  'holiday_type',
  'national_event_type',
  ...WEATHER_COLUMNS,
  'forecasted_load'
]);

export function indexSchema(schema: Schema): Map<string, number> {
  return new Map(schema.map((column, index) => [column, index]));
}
