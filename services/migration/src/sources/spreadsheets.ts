import { readFile } from 'node:fs/promises';
import type { FieldValue, TimestampKey } from '@loadgrid/timeseries';
import { cellToMeasurement, cellToTimestamp, readWorkbook, sheetRows, type SheetRows } from './cells';

const TIMESTAMP_COLUMN = 0;
const LOAD_COLUMN = 1;
const FORECAST_COLUMN = 3;

export const LOAD_COLUMNS = ['load', 'forecasted_load'] as const;

export type LoadRecord =
  | { ok: true; rowIndex: number; key: TimestampKey; row: [FieldValue, FieldValue] }
  | { ok: false; rowIndex: number; reason: LoadRecordRejection };

export type LoadRecordRejection = 'unparseable timestamp' | 'off-grid timestamp';

export type LoadSheetOptions = {
  offsetMinutes: number;
  gridStepMinutes: number;
  /** Drop rows whose wall-clock time is not a multiple of the grid step. */
  alignToGrid: boolean;
};

/**
 * Reads the timestamp (A), load (B) and forecasted load (D) columns of a load
 * sheet. The first row is a header.
 */
export function parseLoadSheet(rows: SheetRows, options: LoadSheetOptions): LoadRecord[] {
  const stepSeconds = options.gridStepMinutes * 60;
  return rows.slice(1).map((cells, rowIndex): LoadRecord => {
    const timestamp = cellToTimestamp(cells[TIMESTAMP_COLUMN], options.offsetMinutes);
    if (!timestamp) {
      return { ok: false, rowIndex, reason: 'unparseable timestamp' };
    }
    const { hour, minute, second } = timestamp.wall;
    if (options.alignToGrid && (hour * 3600 + minute * 60 + second) % stepSeconds !== 0) {
      return { ok: false, rowIndex, reason: 'off-grid timestamp' };
    }
    return {
      ok: true,
      rowIndex,
      key: timestamp.key,
      row: [cellToMeasurement(cells[LOAD_COLUMN]), cellToMeasurement(cells[FORECAST_COLUMN])]
    };
  });
}

export async function readLoadWorkbook(file: string, options: LoadSheetOptions): Promise<LoadRecord[]> {
  const workbook = readWorkbook(await readFile(file));
  const [firstSheet] = workbook.SheetNames;
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) {
    return [];
  }
  return parseLoadSheet(sheetRows(sheet), options);
}
