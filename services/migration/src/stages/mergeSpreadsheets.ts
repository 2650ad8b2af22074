import { compareKeys, Table, writeTableAtomic, type FieldValue, type TimestampKey } from '@loadgrid/timeseries';
import type { MigrationConfig } from '../config';
import { MigrationError } from '../errors';
import { listWorkbooks } from '../pipeline/preflight';
import type { PipelineStage, StageContext } from '../pipeline/types';
import {
  LOAD_COLUMNS,
  readLoadWorkbook,
  type LoadRecord,
  type LoadRecordRejection,
  type LoadSheetOptions
} from '../sources/spreadsheets';

const PROGRESS_EVERY = 50;

type MergeSpreadsheetsDeps = {
  listWorkbooks?: (directory: string) => Promise<string[]>;
  readWorkbook?: (file: string, options: LoadSheetOptions) => Promise<LoadRecord[]>;
};

export function createMergeSpreadsheetsStage(config: MigrationConfig, deps: MergeSpreadsheetsDeps = {}): PipelineStage {
  const findWorkbooks = deps.listWorkbooks ?? listWorkbooks;
  const readWorkbook = deps.readWorkbook ?? readLoadWorkbook;
  const { spreadsheetDir, masterFile } = config.paths;

  return {
    ordinal: 1,
    name: 'merge-spreadsheets',
    description: 'Merge load workbooks into the master table',
    inputs: [spreadsheetDir],
    output: masterFile,

    async plan() {
      const workbooks = await findWorkbooks(spreadsheetDir);
      return [`would read ${workbooks.length} workbook(s) from ${spreadsheetDir}`, `would write ${masterFile}`];
    },

    async run({ logger }: StageContext) {
      const workbooks = await findWorkbooks(spreadsheetDir);
      if (workbooks.length === 0) {
        throw new MigrationError(`No workbooks found in ${spreadsheetDir}`);
      }
      logger.info({ workbooks: workbooks.length }, 'Reading load workbooks');

      const options: LoadSheetOptions = {
        offsetMinutes: config.utcOffsetMinutes,
        gridStepMinutes: config.gridStepMinutes,
        alignToGrid: config.alignToGrid
      };
      const entries: [TimestampKey, FieldValue[]][] = [];
      const rejected = new Map<LoadRecordRejection, number>();
      const unreadable: string[] = [];

      for (const [index, file] of workbooks.entries()) {
        if ((index + 1) % PROGRESS_EVERY === 0 || index + 1 === workbooks.length) {
          logger.info(`Processing workbook ${index + 1}/${workbooks.length}`);
        }
        let records: LoadRecord[];
        try {
          records = await readWorkbook(file, options);
        } catch (err) {
          logger.warn({ path: file, err }, 'Could not read workbook; skipping it');
          unreadable.push(file);
          continue;
        }
        for (const record of records) {
          if (record.ok) {
            entries.push([record.key, record.row]);
          } else {
            rejected.set(record.reason, (rejected.get(record.reason) ?? 0) + 1);
          }
        }
      }

      if (entries.length === 0) {
        throw new MigrationError('No data extracted from the load workbooks');
      }

      entries.sort((a, b) => compareKeys(a[0], b[0]));
      const { table, duplicates } = Table.fromEntries(LOAD_COLUMNS, entries);
      await writeTableAtomic(masterFile, table);

      const warnings: string[] = [];
      for (const [reason, count] of rejected) {
        warnings.push(`Dropped ${count} row(s) with an ${reason}`);
      }
      const removed = duplicates.reduce((sum, duplicate) => sum + duplicate.occurrences - 1, 0);
      if (removed > 0) {
        warnings.push(`Removed ${removed} duplicate row(s) across ${duplicates.length} timestamp(s)`);
      }
      if (unreadable.length > 0) {
        warnings.push(`Skipped ${unreadable.length} unreadable workbook(s): ${unreadable.join(', ')}`);
      }

      const keys = table.keys();
      logger.info({ rows: table.size, first: keys[0], last: keys[keys.length - 1] }, 'Master table written');
      return { rows: table.size, warnings };
    }
  };
}

export type { MergeSpreadsheetsDeps };
