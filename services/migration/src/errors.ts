export class MigrationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MigrationError';
  }
}

/** An external input is missing; raised before any stage runs. */
export class PreflightError extends MigrationError {
  readonly code = 'PREFLIGHT_FAILED';
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Pre-flight checks failed:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'PreflightError';
    this.problems = problems;
  }
}

export class StageFailedError extends MigrationError {
  readonly code = 'STAGE_FAILED';
  readonly ordinal: number;
  readonly description: string;

  constructor(ordinal: number, description: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Step ${ordinal} (${description}) failed: ${reason}`, { cause });
    this.name = 'StageFailedError';
    this.ordinal = ordinal;
    this.description = description;
  }
}

export class WeatherFetchError extends MigrationError {
  readonly code = 'WEATHER_FETCH_FAILED';
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'WeatherFetchError';
    this.attempts = attempts;
  }
}
