import { KeyFormatError, TimeseriesError } from './errors';
import { instantToKey, parseTimestampKey, type TimestampKey } from './key';

export const HOUR_MS = 60 * 60 * 1000;

/** Inclusive bounds; an omitted bound is unbounded. */
export type ValidationRange = {
  start?: string;
  end?: string;
};

export type ValidationOptions = {
  gridStepMs?: number;
  /** Keys outside this window are reported as out of range. */
  range?: ValidationRange;
};

export type DuplicateTimestamp = {
  key: TimestampKey;
  occurrences: number;
  /** Zero-based data row indices, header excluded. */
  rowIndices: number[];
};

export type InvalidTimestamp = {
  rowIndex: number;
  value: string;
};

export type ValidationReport = {
  totalRows: number;
  uniqueTimestamps: number;
  expectedCount: number;
  gridStepMs: number;
  start: TimestampKey | null;
  end: TimestampKey | null;
  duplicates: { count: number; entries: DuplicateTimestamp[] };
  missing: { count: number; keys: TimestampKey[] };
  extra: { count: number; keys: TimestampKey[] };
  outOfRange: { count: number; keys: TimestampKey[] };
  invalid: { count: number; entries: InvalidTimestamp[] };
  passed: boolean;
};

type Occurrence = {
  key: TimestampKey;
  rowIndices: number[];
};

function parseBound(value: string | undefined, label: string, unbounded: number): number {
  if (value === undefined) {
    return unbounded;
  }
  const parsed = parseTimestampKey(value);
  if (!parsed) {
    throw new KeyFormatError(value, `range ${label}`);
  }
  return parsed.epochMs;
}

function emptyReport(totalRows: number, gridStepMs: number, invalid: InvalidTimestamp[]): ValidationReport {
  return {
    totalRows,
    uniqueTimestamps: 0,
    expectedCount: 0,
    gridStepMs,
    start: null,
    end: null,
    duplicates: { count: 0, entries: [] },
    missing: { count: 0, keys: [] },
    extra: { count: 0, keys: [] },
    outOfRange: { count: 0, keys: [] },
    invalid: { count: invalid.length, entries: invalid },
    passed: true
  };
}

/**
 * Checks a raw key stream (in file order, before any de-duplication) against a
 * regular grid running from its earliest to its latest instant.
 */
export function validateTimeSeries(rawKeys: readonly string[], options: ValidationOptions = {}): ValidationReport {
  const gridStepMs = options.gridStepMs ?? HOUR_MS;
  if (!Number.isInteger(gridStepMs) || gridStepMs <= 0) {
    throw new TimeseriesError(`Grid step must be a positive whole number of milliseconds, got ${gridStepMs}`);
  }
  const range = options.range
    ? {
        start: parseBound(options.range.start, 'start', Number.NEGATIVE_INFINITY),
        end: parseBound(options.range.end, 'end', Number.POSITIVE_INFINITY)
      }
    : null;

  const invalid: InvalidTimestamp[] = [];
  const byInstant = new Map<number, Occurrence>();
  let startOffset = 0;
  let startMs = Number.POSITIVE_INFINITY;
  let endMs = Number.NEGATIVE_INFINITY;

  rawKeys.forEach((value, rowIndex) => {
    const parsed = parseTimestampKey(value);
    if (!parsed) {
      invalid.push({ rowIndex, value });
      return;
    }
    const existing = byInstant.get(parsed.epochMs);
    if (existing) {
      existing.rowIndices.push(rowIndex);
    } else {
      byInstant.set(parsed.epochMs, { key: parsed.key, rowIndices: [rowIndex] });
    }
    if (parsed.epochMs < startMs) {
      startMs = parsed.epochMs;
      startOffset = parsed.offsetMinutes;
    }
    endMs = Math.max(endMs, parsed.epochMs);
  });

  if (byInstant.size === 0) {
    return emptyReport(rawKeys.length, gridStepMs, invalid);
  }

  const instants = Array.from(byInstant.keys()).sort((a, b) => a - b);
  const keyAt = (instant: number): TimestampKey => byInstant.get(instant)?.key ?? instantToKey(instant, startOffset);

  const duplicates: DuplicateTimestamp[] = [];
  const extra: TimestampKey[] = [];
  const outOfRange: TimestampKey[] = [];
  for (const instant of instants) {
    const occurrence = byInstant.get(instant);
    if (occurrence && occurrence.rowIndices.length > 1) {
      duplicates.push({
        key: occurrence.key,
        occurrences: occurrence.rowIndices.length,
        rowIndices: occurrence.rowIndices
      });
    }
    if ((instant - startMs) % gridStepMs !== 0) {
      extra.push(keyAt(instant));
    }
    if (range && (instant < range.start || instant > range.end)) {
      outOfRange.push(keyAt(instant));
    }
  }

  const missing: TimestampKey[] = [];
  let expectedCount = 0;
  for (let instant = startMs; instant <= endMs; instant += gridStepMs) {
    expectedCount += 1;
    if (!byInstant.has(instant)) {
      missing.push(instantToKey(instant, startOffset));
    }
  }

  return {
    totalRows: rawKeys.length,
    uniqueTimestamps: instants.length,
    expectedCount,
    gridStepMs,
    start: keyAt(startMs),
    end: keyAt(endMs),
    duplicates: { count: duplicates.length, entries: duplicates },
    missing: { count: missing.length, keys: missing },
    extra: { count: extra.length, keys: extra },
    outOfRange: { count: outOfRange.length, keys: outOfRange },
    invalid: { count: invalid.length, entries: invalid },
    passed: duplicates.length === 0 && missing.length === 0
  };
}
