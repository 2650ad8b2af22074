import { performance } from 'node:perf_hooks';
import { MigrationError, PreflightError, StageFailedError } from '../errors';
import { fileSize, pathExists, runPreflightChecks, type PreflightCheck } from './preflight';
import type { ArtifactSummary, PipelineRunResult, PipelineStage, StageContext, StageReport } from './types';

export type RunPipelineOptions = {
  preflight?: readonly PreflightCheck[];
};

function initialReport(stage: PipelineStage): StageReport {
  return {
    ordinal: stage.ordinal,
    name: stage.name,
    description: stage.description,
    output: stage.output,
    status: 'pending',
    rows: null,
    plan: [],
    warnings: [],
    error: null,
    durationMs: null
  };
}

async function missingInputs(stage: PipelineStage): Promise<string[]> {
  const missing: string[] = [];
  for (const input of stage.inputs) {
    if (!(await pathExists(input))) {
      missing.push(input);
    }
  }
  return missing;
}

async function collectArtifacts(stages: readonly PipelineStage[]): Promise<ArtifactSummary[]> {
  const artifacts: ArtifactSummary[] = [];
  for (const stage of stages) {
    const bytes = await fileSize(stage.output);
    if (bytes !== null) {
      artifacts.push({ path: stage.output, bytes });
    }
  }
  return artifacts;
}

/**
 * Runs stages in order. A stage whose output already exists is skipped unless
 * `force` is set; the first failure stops the run and leaves earlier outputs
 * in place. In a dry run nothing is written and each stage reports its plan.
 */
export async function runPipeline(
  stages: readonly PipelineStage[],
  context: StageContext,
  options: RunPipelineOptions = {}
): Promise<PipelineRunResult> {
  const { config, logger } = context;
  const reports = stages.map(initialReport);
  const warnings: string[] = [];
  const result = (error: MigrationError | null, artifacts: ArtifactSummary[] = []): PipelineRunResult => ({
    ok: error === null,
    dryRun: config.dryRun,
    stages: reports,
    warnings,
    artifacts,
    error
  });

  if (config.dryRun) {
    logger.info('Dry run: no files will be written');
  }

  const problems = await runPreflightChecks(options.preflight ?? []);
  if (problems.length > 0) {
    const error = new PreflightError(problems);
    logger.error({ problems }, 'Pre-flight checks failed');
    return result(error);
  }

  for (const [index, stage] of stages.entries()) {
    const report = reports[index];
    const stageLog = logger.child({ stage: stage.name, ordinal: stage.ordinal });
    stageLog.info(`Step ${stage.ordinal}: ${stage.description}`);

    if (!config.force && (await pathExists(stage.output))) {
      report.status = 'skipped';
      stageLog.info({ path: stage.output }, 'Output already exists; skipping (use --force to rebuild)');
      continue;
    }

    if (config.dryRun) {
      report.status = 'planned';
      report.plan = await stage.plan(context);
      for (const line of report.plan) {
        stageLog.info(`[dry run] ${line}`);
      }
      continue;
    }

    const startedAt = performance.now();
    report.status = 'running';
    try {
      const missing = await missingInputs(stage);
      if (missing.length > 0) {
        throw new MigrationError(`Missing input file(s): ${missing.join(', ')}`);
      }
      const outcome = await stage.run({ config, logger: stageLog });
      report.status = 'done';
      report.rows = outcome.rows;
      report.warnings = outcome.warnings ?? [];
      warnings.push(...report.warnings.map((warning) => `Step ${stage.ordinal}: ${warning}`));
      stageLog.info({ path: stage.output, rows: outcome.rows }, 'Step complete');
    } catch (cause) {
      const error = new StageFailedError(stage.ordinal, stage.description, cause);
      report.status = 'failed';
      report.error = error.message;
      stageLog.error({ err: cause }, error.message);
      return result(error);
    } finally {
      report.durationMs = Math.round(performance.now() - startedAt);
    }
  }

  return result(null, config.dryRun ? [] : await collectArtifacts(stages));
}

export function formatRunSummary(run: PipelineRunResult): string {
  const lines = [run.dryRun ? 'Migration plan (dry run)' : 'Migration summary'];
  for (const stage of run.stages) {
    const rows = stage.rows === null ? '' : ` (${stage.rows} rows)`;
    lines.push(`  ${stage.ordinal}. ${stage.description}: ${stage.status}${rows}`);
    for (const line of stage.plan) {
      lines.push(`       ${line}`);
    }
    if (stage.error) {
      lines.push(`       ${stage.error}`);
    }
  }
  if (run.warnings.length > 0) {
    lines.push('Warnings:');
    lines.push(...run.warnings.map((warning) => `  - ${warning}`));
  }
  if (run.artifacts.length > 0) {
    lines.push('Artifacts:');
    lines.push(...run.artifacts.map((artifact) => `  ${artifact.path} (${artifact.bytes} bytes)`));
  }
  if (run.error) {
    lines.push(run.error.message);
  }
  lines.push(run.ok ? 'Result: OK' : 'Result: FAILED');
  return lines.join('\n');
}
