import type { MigrationConfig } from '../config';
import type { MigrationError } from '../errors';
import type { Logger } from '../logger';

/**
 * `pending` until visited; then `skipped` when the output already exists,
 * `planned` in a dry run, or `running` followed by `done` or `failed`.
 */
export type StageStatus = 'pending' | 'skipped' | 'planned' | 'running' | 'done' | 'failed';

export type StageDescriptor = {
  ordinal: number;
  name: string;
  description: string;
  /** Files that must exist before the stage runs. */
  inputs: readonly string[];
  /** The stage counts as complete when this file exists. */
  output: string;
};

export type StageContext = {
  config: MigrationConfig;
  logger: Logger;
};

export type StageOutcome = {
  rows: number;
  warnings?: string[];
};

export type PipelineStage = StageDescriptor & {
  /** Human-readable actions a dry run reports instead of running the stage. */
  plan(context: StageContext): Promise<string[]>;
  run(context: StageContext): Promise<StageOutcome>;
};

export type StageReport = {
  ordinal: number;
  name: string;
  description: string;
  output: string;
  status: StageStatus;
  rows: number | null;
  plan: string[];
  warnings: string[];
  error: string | null;
  durationMs: number | null;
};

export type ArtifactSummary = {
  path: string;
  bytes: number;
};

export type PipelineRunResult = {
  ok: boolean;
  dryRun: boolean;
  stages: StageReport[];
  warnings: string[];
  artifacts: ArtifactSummary[];
  error: MigrationError | null;
};
