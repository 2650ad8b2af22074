import {
  CANONICAL_SCHEMA,
  canonicalizeTimestamp,
  describeDriftWarning,
  readTableFile,
  reconcileTables,
  Table,
  writeTableAtomic,
  type Row,
  type TimestampKey
} from '@loadgrid/timeseries';
import type { MigrationConfig } from '../config';
import type { PipelineStage, StageContext } from '../pipeline/types';

type RekeyResult = {
  table: Table;
  unparseable: number;
  duplicates: number;
};

/** Rewrites keys into canonical form, reading offset-less keys in `offsetMinutes`. */
function canonicalizeKeys(table: Table, offsetMinutes: number): RekeyResult {
  let unparseable = 0;
  const entries: [TimestampKey, Row][] = [];
  for (const [key, row] of table.entries()) {
    const canonical = canonicalizeTimestamp(key, offsetMinutes);
    if (canonical === null) {
      unparseable += 1;
    } else {
      entries.push([canonical, row]);
    }
  }
  const { table: rekeyed, duplicates } = Table.fromEntries(table.schema, entries);
  return { table: rekeyed, unparseable, duplicates: duplicates.length };
}

export function createMergeWeatherStage(config: MigrationConfig): PipelineStage {
  const { enrichedFile, weatherFile, mergedFile } = config.paths;

  return {
    ordinal: 3,
    name: 'merge-weather',
    description: 'Merge weather observations into the enriched table',
    inputs: [enrichedFile, weatherFile],
    output: mergedFile,

    async plan() {
      return [`would read ${enrichedFile}`, `would read ${weatherFile}`, `would write ${mergedFile}`];
    },

    async run({ logger }: StageContext) {
      const warnings: string[] = [];
      const load = async (file: string): Promise<Table> => {
        const loaded = await readTableFile(file);
        const { table, unparseable, duplicates } = canonicalizeKeys(loaded.table, config.utcOffsetMinutes);
        const dropped = loaded.skipped.length + unparseable;
        if (dropped > 0) {
          warnings.push(`Skipped ${dropped} malformed row(s) in ${file}`);
        }
        const collapsed = loaded.duplicates.length + duplicates;
        if (collapsed > 0) {
          warnings.push(`Kept the first of ${collapsed} duplicated timestamp(s) in ${file}`);
        }
        logger.info({ path: file, rows: table.size, columns: table.schema.length }, 'Loaded table');
        return table;
      };

      const enriched = await load(enrichedFile);
      const weather = await load(weatherFile);
      const result = reconcileTables(enriched, weather, CANONICAL_SCHEMA);
      for (const warning of result.warnings) {
        const message = describeDriftWarning(warning);
        logger.warn({ columns: warning.columns }, message);
        warnings.push(message);
      }

      await writeTableAtomic(mergedFile, result.table);
      logger.info({ rows: result.table.size }, 'Merged table written');
      return { rows: result.table.size, warnings };
    }
  };
}
