import { copyFileAtomic, readKeyColumn } from '@loadgrid/timeseries';
import type { MigrationConfig } from '../config';
import type { PipelineStage, StageContext } from '../pipeline/types';

export function createFinalizeStage(config: MigrationConfig): PipelineStage {
  const { mergedFile, finalFile } = config.paths;

  return {
    ordinal: 4,
    name: 'finalize',
    description: 'Publish the merged table',
    inputs: [mergedFile],
    output: finalFile,

    async plan() {
      return [`would copy ${mergedFile} to ${finalFile}`];
    },

    async run({ logger }: StageContext) {
      const { bytes } = await copyFileAtomic(mergedFile, finalFile);
      const rows = (await readKeyColumn(finalFile)).length;
      logger.info({ path: finalFile, rows, bytes }, 'Final table published');
      return { rows };
    }
  };
}
