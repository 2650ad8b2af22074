import { KeyFormatError } from './errors';

/**
 * Canonical timestamp token, `YYYY-MM-DD HH:MM:SS+hh:mm`. Tokens that share one
 * offset sort chronologically as plain strings.
 */
export type TimestampKey = string;

export const KEY_FORMAT = 'YYYY-MM-DD HH:MM:SS+hh:mm';

export type WallClock = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

export type ParsedTimestamp = {
  key: TimestampKey;
  epochMs: number;
  offsetMinutes: number;
  wall: WallClock;
};

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;
const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;
const MAX_OFFSET_MINUTES = 14 * 60;

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

function offsetToMinutes(text: string): number | null {
  if (text === 'Z') {
    return 0;
  }
  const match = OFFSET_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [, sign, hours, minutes] = match;
  const magnitude = Number(hours) * 60 + Number(minutes);
  if (Number(minutes) >= 60 || magnitude > MAX_OFFSET_MINUTES) {
    return null;
  }
  return sign === '-' ? -magnitude : magnitude;
}

export function parseUtcOffset(text: string): number {
  const minutes = offsetToMinutes(text.trim());
  if (minutes === null) {
    throw new KeyFormatError(text, 'UTC offset (expected ±hh:mm)');
  }
  return minutes;
}

export function formatUtcOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const magnitude = Math.abs(minutes);
  return `${sign}${pad(Math.floor(magnitude / 60))}:${pad(magnitude % 60)}`;
}

export function isValidWallClock(wall: WallClock): boolean {
  const { year, month, day, hour, minute, second } = wall;
  if (hour > 23 || minute > 59 || second > 59 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

export function formatTimestampKey(wall: WallClock, offsetMinutes: number): TimestampKey {
  const date = `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`;
  const time = `${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}`;
  return `${date} ${time}${formatUtcOffset(offsetMinutes)}`;
}

/**
 * Parses a timestamp token. Accepts `T` or space separators, optional seconds
 * and fractional seconds, and `Z`/`±hhmm`/`±hh:mm` offsets; a token without an
 * offset is read as UTC wall-clock time. Returns null for anything else.
 */
export function parseTimestampKey(token: string): ParsedTimestamp | null {
  const match = TIMESTAMP_PATTERN.exec(token.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second, offset] = match;
  const wall: WallClock = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: second === undefined ? 0 : Number(second)
  };
  const offsetMinutes = offset === undefined ? 0 : offsetToMinutes(offset);
  if (offsetMinutes === null || !isValidWallClock(wall)) {
    return null;
  }

  const wallMs = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return {
    key: formatTimestampKey(wall, offsetMinutes),
    epochMs: wallMs - offsetMinutes * 60_000,
    offsetMinutes,
    wall
  };
}

export function instantToKey(epochMs: number, offsetMinutes: number): TimestampKey {
  const shifted = new Date(epochMs + offsetMinutes * 60_000);
  return formatTimestampKey(
    {
      year: shifted.getUTCFullYear(),
      month: shifted.getUTCMonth() + 1,
      day: shifted.getUTCDate(),
      hour: shifted.getUTCHours(),
      minute: shifted.getUTCMinutes(),
      second: shifted.getUTCSeconds()
    },
    offsetMinutes
  );
}

/**
 * Canonical key for `token` in `defaultOffsetMinutes`. Tokens without an offset
 * are read as wall-clock time in that offset; tokens with one are converted to
 * it, so an instant always maps to a single key.
 */
export function canonicalizeTimestamp(token: string, defaultOffsetMinutes: number): TimestampKey | null {
  const parsed = parseTimestampKey(token);
  if (!parsed) {
    return null;
  }
  if (hasExplicitOffset(token)) {
    return instantToKey(parsed.epochMs, defaultOffsetMinutes);
  }
  return formatTimestampKey(parsed.wall, defaultOffsetMinutes);
}

export function hasExplicitOffset(token: string): boolean {
  return /(?:Z|[+-]\d{2}:?\d{2})$/.test(token.trim());
}

/** Calendar date (`YYYY-MM-DD`) of a key in its own offset. */
export function calendarDateOf(key: TimestampKey): string | null {
  const parsed = parseTimestampKey(key);
  if (!parsed) {
    return null;
  }
  return parsed.key.slice(0, 10);
}

export function compareKeys(a: TimestampKey, b: TimestampKey): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
