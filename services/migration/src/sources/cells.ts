import * as XLSX from 'xlsx';
import {
  canonicalizeTimestamp,
  formatTimestampKey,
  isValidWallClock,
  parseTimestampKey,
  SENTINEL,
  type FieldValue,
  type ParsedTimestamp,
  type TimestampKey
} from '@loadgrid/timeseries';

export type SheetRows = unknown[][];

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Rows of a worksheet as raw cell values, header row included. */
export function sheetRows(sheet: XLSX.WorkSheet): SheetRows {
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
}

export function readWorkbook(data: Buffer): XLSX.WorkBook {
  return XLSX.read(data, { type: 'buffer' });
}

function serialToKey(serial: number, offsetMinutes: number): TimestampKey | null {
  const code = XLSX.SSF.parse_date_code(serial);
  if (!code) {
    return null;
  }
  const wall = { year: code.y, month: code.m, day: code.d, hour: code.H, minute: code.M, second: code.S };
  return isValidWallClock(wall) ? formatTimestampKey(wall, offsetMinutes) : null;
}

/**
 * Timestamp from a spreadsheet cell: an Excel date serial or a date/time
 * string. Values without an offset are read in `offsetMinutes`.
 */
export function cellToTimestamp(value: unknown, offsetMinutes: number): ParsedTimestamp | null {
  let key: TimestampKey | null = null;
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    key = serialToKey(value, offsetMinutes);
  } else if (typeof value === 'string') {
    const text = value.trim();
    key = canonicalizeTimestamp(DATE_ONLY.test(text) ? `${text} 00:00` : text, offsetMinutes);
  }
  return key === null ? null : parseTimestampKey(key);
}

/** Numeric cell value, or the sentinel when the cell holds anything else. */
export function cellToMeasurement(value: unknown): FieldValue {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : SENTINEL;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : SENTINEL;
  }
  return SENTINEL;
}
