import path from 'node:path';
import { z } from 'zod';
import { booleanVar, integerVar, loadEnvConfig, numberVar, stringVar, type EnvSource } from '@loadgrid/shared';
import { formatUtcOffset, parseUtcOffset } from '@loadgrid/timeseries';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  LOADGRID_SPREADSHEET_DIR: stringVar({ defaultValue: 'DPDC Load' }),
  LOADGRID_HOLIDAY_FILE: stringVar({ defaultValue: 'Holiday List.xlsx' }),
  LOADGRID_HOLIDAY_SHEET: stringVar({ defaultValue: 'List of Holidays' }),
  LOADGRID_WEATHER_FILE: stringVar({ defaultValue: 'dhaka_weather_data.csv' }),
  LOADGRID_WORK_DIR: stringVar({ defaultValue: '.' }),
  LOADGRID_OUTPUT_DIR: stringVar({ defaultValue: 'static' }),
  LOADGRID_OUTPUT_FILE: stringVar({ defaultValue: 'master_data_with_forecasted.csv' }),
  LOADGRID_UTC_OFFSET: stringVar({ defaultValue: '+06:00', pattern: /^(Z|[+-]\d{2}:?\d{2})$/ }),
  LOADGRID_GRID_STEP_MINUTES: integerVar({ defaultValue: 60, min: 1, max: 24 * 60 }),
  LOADGRID_ALIGN_TO_GRID: booleanVar({ defaultValue: true }),
  LOADGRID_LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true }).pipe(z.enum(LOG_LEVELS)),
  LOADGRID_WEATHER_BASE_URL: stringVar({ defaultValue: 'https://meteostat.p.rapidapi.com' }),
  LOADGRID_WEATHER_API_KEY: stringVar(),
  LOADGRID_WEATHER_LATITUDE: numberVar({ defaultValue: 23.8103, min: -90, max: 90 }),
  LOADGRID_WEATHER_LONGITUDE: numberVar({ defaultValue: 90.4125, min: -180, max: 180 }),
  LOADGRID_WEATHER_ALTITUDE: integerVar({ defaultValue: 8 }),
  LOADGRID_WEATHER_TIMEZONE: stringVar({ defaultValue: 'Asia/Dhaka' }),
  LOADGRID_WEATHER_RETRY_ATTEMPTS: integerVar({ defaultValue: 4, min: 1, max: 20 }),
  LOADGRID_WEATHER_RETRY_BASE_MS: integerVar({ defaultValue: 4_000, min: 0 }),
  LOADGRID_WEATHER_RETRY_FACTOR: numberVar({ defaultValue: 2, min: 1 }),
  LOADGRID_WEATHER_RETRY_MAX_MS: integerVar({ defaultValue: 60_000, min: 0 }),
  LOADGRID_WEATHER_RETRY_JITTER_RATIO: numberVar({ defaultValue: 0, min: 0, max: 1 })
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export type MigrationPaths = {
  spreadsheetDir: string;
  holidayFile: string;
  weatherFile: string;
  workDir: string;
  masterFile: string;
  enrichedFile: string;
  mergedFile: string;
  outputDir: string;
  finalFile: string;
};

export type WeatherConfig = {
  baseUrl: string;
  apiKey: string | null;
  latitude: number;
  longitude: number;
  altitude: number;
  timezone: string;
  retry: {
    attempts: number;
    baseMs: number;
    factor: number;
    maxMs: number;
    jitterRatio: number;
  };
};

export type MigrationConfig = {
  readonly paths: Readonly<MigrationPaths>;
  readonly holidaySheet: string;
  readonly utcOffsetMinutes: number;
  /** The same offset rendered as `±hh:mm`. */
  readonly utcOffset: string;
  readonly gridStepMinutes: number;
  readonly alignToGrid: boolean;
  readonly dryRun: boolean;
  readonly force: boolean;
  readonly logLevel: LogLevel;
  readonly weather: Readonly<WeatherConfig>;
};

/** Command-line values; any that are set win over the environment. */
export type ConfigOverrides = {
  dryRun?: boolean;
  force?: boolean;
  logLevel?: LogLevel;
  spreadsheetDir?: string;
  holidayFile?: string;
  weatherFile?: string;
  workDir?: string;
  masterFile?: string;
  enrichedFile?: string;
  mergedFile?: string;
  outputDir?: string;
  outputFile?: string;
};

const DEFAULT_MASTER_FILE = 'master-data.csv';
const DEFAULT_ENRICHED_FILE = 'master-data-enriched.csv';
const DEFAULT_MERGED_FILE = 'merged_master_weather.csv';

function required<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new Error(`Configuration value ${name} has no default`);
  }
  return value;
}

export function loadMigrationConfig(overrides: ConfigOverrides = {}, env: EnvSource = process.env): MigrationConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'migration' });

  const workDir = overrides.workDir ?? required(parsed.LOADGRID_WORK_DIR, 'LOADGRID_WORK_DIR');
  const inWorkDir = (file: string) => path.resolve(workDir, file);
  const outputDir = path.resolve(overrides.outputDir ?? required(parsed.LOADGRID_OUTPUT_DIR, 'LOADGRID_OUTPUT_DIR'));
  const utcOffsetMinutes = parseUtcOffset(required(parsed.LOADGRID_UTC_OFFSET, 'LOADGRID_UTC_OFFSET'));

  const paths: MigrationPaths = {
    spreadsheetDir: path.resolve(
      overrides.spreadsheetDir ?? required(parsed.LOADGRID_SPREADSHEET_DIR, 'LOADGRID_SPREADSHEET_DIR')
    ),
    holidayFile: path.resolve(overrides.holidayFile ?? required(parsed.LOADGRID_HOLIDAY_FILE, 'LOADGRID_HOLIDAY_FILE')),
    weatherFile: path.resolve(overrides.weatherFile ?? required(parsed.LOADGRID_WEATHER_FILE, 'LOADGRID_WEATHER_FILE')),
    workDir: path.resolve(workDir),
    masterFile: inWorkDir(overrides.masterFile ?? DEFAULT_MASTER_FILE),
    enrichedFile: inWorkDir(overrides.enrichedFile ?? DEFAULT_ENRICHED_FILE),
    mergedFile: inWorkDir(overrides.mergedFile ?? DEFAULT_MERGED_FILE),
    outputDir,
    finalFile: path.join(
      outputDir,
      overrides.outputFile ?? required(parsed.LOADGRID_OUTPUT_FILE, 'LOADGRID_OUTPUT_FILE')
    )
  };

  const weather: WeatherConfig = {
    baseUrl: required(parsed.LOADGRID_WEATHER_BASE_URL, 'LOADGRID_WEATHER_BASE_URL').replace(/\/+$/, ''),
    apiKey: parsed.LOADGRID_WEATHER_API_KEY ?? null,
    latitude: required(parsed.LOADGRID_WEATHER_LATITUDE, 'LOADGRID_WEATHER_LATITUDE'),
    longitude: required(parsed.LOADGRID_WEATHER_LONGITUDE, 'LOADGRID_WEATHER_LONGITUDE'),
    altitude: required(parsed.LOADGRID_WEATHER_ALTITUDE, 'LOADGRID_WEATHER_ALTITUDE'),
    timezone: required(parsed.LOADGRID_WEATHER_TIMEZONE, 'LOADGRID_WEATHER_TIMEZONE'),
    retry: Object.freeze({
      attempts: required(parsed.LOADGRID_WEATHER_RETRY_ATTEMPTS, 'LOADGRID_WEATHER_RETRY_ATTEMPTS'),
      baseMs: required(parsed.LOADGRID_WEATHER_RETRY_BASE_MS, 'LOADGRID_WEATHER_RETRY_BASE_MS'),
      factor: required(parsed.LOADGRID_WEATHER_RETRY_FACTOR, 'LOADGRID_WEATHER_RETRY_FACTOR'),
      maxMs: required(parsed.LOADGRID_WEATHER_RETRY_MAX_MS, 'LOADGRID_WEATHER_RETRY_MAX_MS'),
      jitterRatio: required(parsed.LOADGRID_WEATHER_RETRY_JITTER_RATIO, 'LOADGRID_WEATHER_RETRY_JITTER_RATIO')
    })
  };

  return Object.freeze({
    paths: Object.freeze(paths),
    holidaySheet: required(parsed.LOADGRID_HOLIDAY_SHEET, 'LOADGRID_HOLIDAY_SHEET'),
    utcOffsetMinutes,
    utcOffset: formatUtcOffset(utcOffsetMinutes),
    gridStepMinutes: required(parsed.LOADGRID_GRID_STEP_MINUTES, 'LOADGRID_GRID_STEP_MINUTES'),
    alignToGrid: required(parsed.LOADGRID_ALIGN_TO_GRID, 'LOADGRID_ALIGN_TO_GRID'),
    dryRun: overrides.dryRun ?? false,
    force: overrides.force ?? false,
    logLevel: overrides.logLevel ?? parsed.LOADGRID_LOG_LEVEL,
    weather: Object.freeze(weather)
  });
}
