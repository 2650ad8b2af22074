import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { TestContext } from 'node:test';
import * as XLSX from 'xlsx';
import { loadMigrationConfig, type ConfigOverrides, type MigrationConfig } from '../src/config';
import { createLogger, type Logger } from '../src/logger';

export const TEST_ENV = {
  LOADGRID_LOG_LEVEL: 'silent',
  LOADGRID_WEATHER_API_KEY: 'test-secret'
};

export function silentLogger(): Logger {
  return createLogger('silent');
}

export async function createScratchDir(t: TestContext): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), 'loadgrid-migration-'));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

export async function writeWorkbook(file: string, sheets: Record<string, unknown[][]>): Promise<void> {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, data);
}

/** Configuration rooted in `root`, laid out like a real working directory. */
export function testConfig(root: string, overrides: ConfigOverrides = {}): MigrationConfig {
  return loadMigrationConfig(
    {
      spreadsheetDir: path.join(root, 'loads'),
      holidayFile: path.join(root, 'holidays.xlsx'),
      weatherFile: path.join(root, 'weather.csv'),
      workDir: path.join(root, 'work'),
      outputDir: path.join(root, 'static'),
      ...overrides
    },
    TEST_ENV
  );
}

export const LOAD_HEADER = ['Date Time', 'Load (MW)', 'Area', 'Forecast (MW)'];
export const HOLIDAY_HEADER = ['Date', 'Holiday', 'Day', 'Type'];
