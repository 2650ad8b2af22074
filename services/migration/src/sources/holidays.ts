import { readFile } from 'node:fs/promises';
import { MigrationError } from '../errors';
import { cellToTimestamp, readWorkbook, sheetRows, type SheetRows } from './cells';

const DATE_COLUMN = 0;
const TYPE_COLUMN = 3;

export type HolidayCalendar = {
  /** Holiday type by calendar date (`YYYY-MM-DD`). */
  types: Map<string, number>;
  skippedRows: number;
};

export class HolidaySheetMissingError extends MigrationError {
  readonly code = 'HOLIDAY_SHEET_MISSING';

  constructor(file: string, sheetName: string) {
    super(`Sheet '${sheetName}' not found in ${file}`);
    this.name = 'HolidaySheetMissingError';
  }
}

function toHolidayType(value: unknown): number | null {
  const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;
  return typeof numeric === 'number' && Number.isFinite(numeric) ? Math.trunc(numeric) : null;
}

/** Dates come from column A, integer holiday types from column D; later rows win. */
export function parseHolidaySheet(rows: SheetRows): HolidayCalendar {
  const types = new Map<string, number>();
  let skippedRows = 0;
  for (const cells of rows.slice(1)) {
    const date = cellToTimestamp(cells[DATE_COLUMN], 0);
    const type = toHolidayType(cells[TYPE_COLUMN]);
    if (!date || type === null) {
      skippedRows += 1;
      continue;
    }
    types.set(date.key.slice(0, 10), type);
  }
  return { types, skippedRows };
}

export async function readHolidayCalendar(file: string, sheetName: string): Promise<HolidayCalendar> {
  const workbook = readWorkbook(await readFile(file));
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new HolidaySheetMissingError(file, sheetName);
  }
  return parseHolidaySheet(sheetRows(sheet));
}
