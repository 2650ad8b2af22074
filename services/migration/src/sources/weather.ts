import { fetch as undiciFetch, Headers } from 'undici';
import { z } from 'zod';
import { RetryExhaustedError, retryWithBackoff } from '@loadgrid/shared';
import {
  canonicalizeTimestamp,
  SENTINEL,
  Table,
  WEATHER_COLUMNS,
  type FieldValue,
  type TimestampKey
} from '@loadgrid/timeseries';
import type { WeatherConfig } from '../config';
import { MigrationError, WeatherFetchError } from '../errors';
import type { Logger } from '../logger';

/** The provider serves at most this many days of hourly data per request. */
export const MAX_DAYS_PER_REQUEST = 30;
const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchLike = typeof undiciFetch;

const hourlyResponseSchema = z.object({
  data: z.array(z.object({ time: z.string() }).catchall(z.union([z.number(), z.string(), z.null()])))
});

type HourlyRecord = z.infer<typeof hourlyResponseSchema>['data'][number];

export type DateWindow = {
  start: string;
  end: string;
};

export type WeatherClientOptions = {
  config: WeatherConfig;
  offsetMinutes: number;
  logger: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  timeoutMs?: number;
};

export type WeatherFetchResult = {
  table: Table;
  /** Weather columns the provider returned for no record. */
  missingColumns: string[];
  skippedRecords: number;
  requests: number;
};

function parseDate(value: string, label: string): number {
  const epochMs = DATE_PATTERN.test(value) ? Date.parse(`${value}T00:00:00Z`) : Number.NaN;
  if (Number.isNaN(epochMs) || new Date(epochMs).toISOString().slice(0, 10) !== value) {
    throw new MigrationError(`Invalid ${label} '${value}'. Expected format: YYYY-MM-DD`);
  }
  return epochMs;
}

/** Splits an inclusive date range into windows the provider accepts. */
export function splitDateRange(startDate: string, endDate: string, maxDays = MAX_DAYS_PER_REQUEST): DateWindow[] {
  const startMs = parseDate(startDate, 'start date');
  const endMs = parseDate(endDate, 'end date');
  if (endMs < startMs) {
    throw new MigrationError(`End date ${endDate} is before start date ${startDate}`);
  }
  const windows: DateWindow[] = [];
  for (let cursor = startMs; cursor <= endMs; cursor += maxDays * DAY_MS) {
    const windowEnd = Math.min(cursor + (maxDays - 1) * DAY_MS, endMs);
    windows.push({
      start: new Date(cursor).toISOString().slice(0, 10),
      end: new Date(windowEnd).toISOString().slice(0, 10)
    });
  }
  return windows;
}

function toFieldValue(value: HourlyRecord[string] | undefined): FieldValue {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : SENTINEL;
  }
  return value ?? SENTINEL;
}

export class WeatherClient {
  private readonly config: WeatherConfig;
  private readonly offsetMinutes: number;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly timeoutMs: number;

  constructor(options: WeatherClientOptions) {
    this.config = options.config;
    this.offsetMinutes = options.offsetMinutes;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? undiciFetch;
    this.sleep = options.sleep;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Hourly observations for the configured location, in local time. */
  async fetchHourly(startDate: string, endDate: string): Promise<WeatherFetchResult> {
    const { apiKey } = this.config;
    if (!apiKey) {
      throw new MigrationError('LOADGRID_WEATHER_API_KEY is not set');
    }
    const windows = splitDateRange(startDate, endDate);
    const { latitude, longitude, altitude } = this.config;
    this.logger.info({ latitude, longitude, altitude, startDate, endDate }, 'Fetching hourly weather');

    const records: HourlyRecord[] = [];
    for (const window of windows) {
      records.push(...(await this.fetchWindowWithRetry(window, apiKey)));
    }

    const present = WEATHER_COLUMNS.filter((column) => records.some((record) => column in record));
    const missingColumns = WEATHER_COLUMNS.filter((column) => !present.includes(column));
    if (missingColumns.length > 0) {
      this.logger.warn({ missingColumns }, 'Weather provider omitted some columns');
    }

    let skippedRecords = 0;
    const entries: [TimestampKey, FieldValue[]][] = [];
    for (const record of records) {
      const key = canonicalizeTimestamp(record.time, this.offsetMinutes);
      if (!key) {
        skippedRecords += 1;
        continue;
      }
      entries.push([key, present.map((column) => toFieldValue(record[column]))]);
    }

    const { table } = Table.fromEntries(present, entries);
    this.logger.info({ rows: table.size, skippedRecords }, 'Retrieved hourly weather records');
    return { table: table.sorted(), missingColumns, skippedRecords, requests: windows.length };
  }

  private async fetchWindowWithRetry(window: DateWindow, apiKey: string): Promise<HourlyRecord[]> {
    const { retry } = this.config;
    try {
      return await retryWithBackoff(() => this.fetchWindow(window, apiKey), {
        maxAttempts: retry.attempts,
        backoff: { baseMs: retry.baseMs, factor: retry.factor, maxMs: retry.maxMs, jitterRatio: retry.jitterRatio },
        shouldRetryResult: (records) => records.length === 0,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          this.logger.warn(
            { attempt, maxAttempts, delayMs, window, reason: error instanceof Error ? error.message : String(error) },
            'Weather request failed; retrying'
          );
        },
        sleep: this.sleep
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new WeatherFetchError(
          `Weather fetch for ${window.start}..${window.end} failed: ${error.message}`,
          error.attempts,
          error
        );
      }
      throw error;
    }
  }

  private async fetchWindow(window: DateWindow, apiKey: string): Promise<HourlyRecord[]> {
    const { baseUrl, latitude, longitude, altitude, timezone } = this.config;

    const url = new URL(`${baseUrl}/point/hourly`);
    url.searchParams.set('lat', String(latitude));
    url.searchParams.set('lon', String(longitude));
    url.searchParams.set('alt', String(altitude));
    url.searchParams.set('start', window.start);
    url.searchParams.set('end', window.end);
    url.searchParams.set('tz', timezone);

    const headers = new Headers({
      Accept: 'application/json',
      'x-rapidapi-key': apiKey,
      'x-rapidapi-host': url.host
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort(new Error('Request timed out'));
    }, this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, { headers, signal: controller.signal });
      if (!response.ok) {
        throw new MigrationError(`Weather provider responded with HTTP ${response.status}`);
      }
      const parsed = hourlyResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new MigrationError(`Unexpected weather response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
      }
      return parsed.data.data;
    } finally {
      clearTimeout(timeout);
    }
  }
}
