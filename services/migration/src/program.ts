import { Command, InvalidArgumentError } from 'commander';
import pino from 'pino';
import type { EnvSource } from '@loadgrid/shared';
import {
  formatUtcOffset,
  formatValidationReport,
  parseUtcOffset,
  readKeyColumn,
  validateTimeSeries,
  writeTableAtomic
} from '@loadgrid/timeseries';
import { applyOffsetToFile } from './commands/applyOffset';
import { isLogLevel, loadMigrationConfig, type ConfigOverrides, type LogLevel, type MigrationConfig } from './config';
import { createLogger, type Logger } from './logger';
import { runMigration, type MigrationDeps } from './pipeline/migration';
import { formatRunSummary } from './pipeline/orchestrator';
import { WeatherClient, type FetchLike } from './sources/weather';

type GlobalOptions = {
  logLevel?: LogLevel;
};

type MigrateOptions = Omit<ConfigOverrides, 'logLevel'>;

type ValidateOptions = {
  stepMinutes?: number;
  start?: string;
  end?: string;
  limit: number;
  json?: boolean;
};

type FetchWeatherOptions = {
  startDate: string;
  endDate: string;
  output?: string;
};

type ApplyOffsetOptions = {
  offset?: string;
};

type CliDependencies = {
  env?: EnvSource;
  print?: (text: string) => void;
  createLogger?: (level: LogLevel) => Logger;
  setExitCode?: (code: number) => void;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  migration?: MigrationDeps;
};

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError('Expected one of fatal, error, warn, info, debug, trace, silent.');
  }
  return normalized;
}

function parseOffset(value: string): string {
  try {
    return formatUtcOffset(parseUtcOffset(value));
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function defaultLoggerFactory(level: LogLevel): Logger {
  return createLogger(level, pino.destination(2));
}

export function createInterface(deps: CliDependencies = {}): Command {
  const print = deps.print ?? ((text: string) => console.log(text));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const loggerFactory = deps.createLogger ?? defaultLoggerFactory;

  const program = new Command();
  program
    .name('loadgrid')
    .description('Build the hourly load, holiday and weather master table')
    .option('--log-level <level>', 'Log level (overrides LOADGRID_LOG_LEVEL)', parseLogLevel);

  const resolve = (overrides: ConfigOverrides = {}): { config: MigrationConfig; logger: Logger } => {
    const { logLevel } = program.opts<GlobalOptions>();
    const config = loadMigrationConfig({ ...overrides, logLevel }, deps.env);
    return { config, logger: loggerFactory(config.logLevel) };
  };

  program
    .command('migrate', { isDefault: true })
    .description('Run the migration pipeline, skipping steps whose output already exists')
    .option('--dry-run', 'Report what each step would do without writing anything')
    .option('--force', 'Rebuild outputs that already exist')
    .option('--spreadsheet-dir <dir>', 'Directory containing the load workbooks')
    .option('--holiday-file <file>', 'Holiday calendar workbook')
    .option('--weather-file <file>', 'Hourly weather table')
    .option('--work-dir <dir>', 'Directory for intermediate tables')
    .option('--master-file <name>', 'Merged load table, relative to the work directory')
    .option('--enriched-file <name>', 'Holiday-enriched table, relative to the work directory')
    .option('--merged-file <name>', 'Weather-merged table, relative to the work directory')
    .option('--output-dir <dir>', 'Directory of the published table')
    .option('--output-file <name>', 'File name of the published table')
    .action(async (options: MigrateOptions) => {
      const { config, logger } = resolve(options);
      const result = await runMigration(config, logger, deps.migration);
      print(formatRunSummary(result));
      setExitCode(result.ok ? 0 : 1);
    });

  program
    .command('validate')
    .description('Check a table for duplicate, missing and off-grid timestamps')
    .argument('<file>', 'Table whose first column holds the timestamps')
    .option('--step-minutes <minutes>', 'Expected spacing between timestamps', parsePositiveInteger)
    .option('--start <timestamp>', 'Earliest expected timestamp')
    .option('--end <timestamp>', 'Latest expected timestamp')
    .option('--limit <count>', 'Maximum entries listed per section', parsePositiveInteger, 50)
    .option('--json', 'Print the report as JSON')
    .action(async (file: string, options: ValidateOptions) => {
      const { config } = resolve();
      const stepMinutes = options.stepMinutes ?? config.gridStepMinutes;
      const range = options.start || options.end ? { start: options.start, end: options.end } : undefined;
      const report = validateTimeSeries(await readKeyColumn(file), { gridStepMs: stepMinutes * 60_000, range });
      print(options.json ? JSON.stringify(report, null, 2) : formatValidationReport(report, { limit: options.limit }));
      setExitCode(report.passed ? 0 : 1);
    });

  program
    .command('fetch-weather')
    .description('Download hourly weather observations for the configured location')
    .requiredOption('--start-date <date>', 'First day to fetch (YYYY-MM-DD)')
    .requiredOption('--end-date <date>', 'Last day to fetch (YYYY-MM-DD)')
    .option('--output <file>', 'Destination table (defaults to the configured weather file)')
    .action(async (options: FetchWeatherOptions) => {
      const { config, logger } = resolve({ weatherFile: options.output });
      const client = new WeatherClient({
        config: config.weather,
        offsetMinutes: config.utcOffsetMinutes,
        logger,
        fetch: deps.fetch,
        sleep: deps.sleep
      });
      const result = await client.fetchHourly(options.startDate, options.endDate);
      const { path, bytes } = await writeTableAtomic(config.paths.weatherFile, result.table);
      const keys = result.table.keys();
      const lines = [
        `Saved ${result.table.size} hourly record(s) to ${path} (${bytes} bytes)`,
        `Columns: ${result.table.schema.join(', ')}`
      ];
      if (keys.length > 0) {
        lines.push(`Range: ${keys[0]} to ${keys[keys.length - 1]}`);
      }
      if (result.missingColumns.length > 0) {
        lines.push(`Missing columns: ${result.missingColumns.join(', ')}`);
      }
      print(lines.join('\n'));
    });

  program
    .command('apply-offset')
    .description('Append the UTC offset to first-column timestamps that have none')
    .argument('<input>', 'Table to rewrite')
    .argument('[output]', 'Destination (defaults to rewriting the input)')
    .option('--offset <offset>', 'Offset to apply (defaults to LOADGRID_UTC_OFFSET)', parseOffset)
    .action(async (input: string, output: string | undefined, options: ApplyOffsetOptions) => {
      const { config } = resolve();
      const offsetMinutes = options.offset ? parseUtcOffset(options.offset) : config.utcOffsetMinutes;
      const result = await applyOffsetToFile(input, output ?? input, offsetMinutes);
      print(
        `Updated ${result.updated} of ${result.rows} row(s) in ${result.output}` +
          ` (${result.alreadyTagged} already had an offset, ${result.unparseable} unparseable)`
      );
    });

  return program;
}

export type { CliDependencies };
