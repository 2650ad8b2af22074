import { calendarDateOf, readTableFile, writeTableAtomic } from '@loadgrid/timeseries';
import type { MigrationConfig } from '../config';
import type { PipelineStage, StageContext } from '../pipeline/types';
import { readHolidayCalendar, type HolidayCalendar } from '../sources/holidays';

export const HOLIDAY_COLUMNS = ['is_holiday', 'holiday_type', 'national_event_type'] as const;

type EnrichHolidaysDeps = {
  readCalendar?: (file: string, sheetName: string) => Promise<HolidayCalendar>;
};

export function createEnrichHolidaysStage(config: MigrationConfig, deps: EnrichHolidaysDeps = {}): PipelineStage {
  const readCalendar = deps.readCalendar ?? readHolidayCalendar;
  const { masterFile, holidayFile, enrichedFile } = config.paths;

  return {
    ordinal: 2,
    name: 'enrich-holidays',
    description: 'Add holiday flags to the master table',
    inputs: [masterFile, holidayFile],
    output: enrichedFile,

    async plan() {
      return [
        `would read ${masterFile}`,
        `would read holidays from sheet '${config.holidaySheet}' of ${holidayFile}`,
        `would write ${enrichedFile}`
      ];
    },

    async run({ logger }: StageContext) {
      const { table, skipped } = await readTableFile(masterFile);
      const calendar = await readCalendar(holidayFile, config.holidaySheet);
      logger.info({ holidays: calendar.types.size }, 'Loaded holiday calendar');

      let holidayRows = 0;
      const enriched = table.extend(HOLIDAY_COLUMNS, (key) => {
        const date = calendarDateOf(key);
        const type = date === null ? undefined : calendar.types.get(date);
        if (type === undefined) {
          return [0, 0, 0];
        }
        holidayRows += 1;
        return [1, type, 0];
      });
      await writeTableAtomic(enrichedFile, enriched);

      const warnings: string[] = [];
      if (skipped.length > 0) {
        warnings.push(`Skipped ${skipped.length} malformed row(s) in ${masterFile}`);
      }
      if (calendar.skippedRows > 0) {
        warnings.push(`Ignored ${calendar.skippedRows} holiday row(s) without a date or type`);
      }
      logger.info({ rows: enriched.size, holidayRows }, 'Enriched table written');
      return { rows: enriched.size, warnings };
    }
  };
}

export type { EnrichHolidaysDeps };
