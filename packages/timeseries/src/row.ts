import { RowArityError } from './errors';
import type { Schema } from './schema';

export type FieldValue = string | number;

/** Placeholder for a column no source supplied. */
export const SENTINEL = '';

export type Row = readonly FieldValue[];

export function createRow(schema: Schema, values: readonly FieldValue[]): Row {
  if (values.length !== schema.length) {
    throw new RowArityError(schema.length, values.length);
  }
  return Object.freeze([...values]);
}
