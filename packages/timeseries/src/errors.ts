export class TimeseriesError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TimeseriesError';
  }
}

export class KeyFormatError extends TimeseriesError {
  readonly code = 'KEY_FORMAT_INVALID';
  readonly value: string;

  constructor(value: string, expected: string) {
    super(`Invalid ${expected}: '${value}'`);
    this.name = 'KeyFormatError';
    this.value = value;
  }
}

export class SchemaError extends TimeseriesError {
  readonly code = 'SCHEMA_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class RowArityError extends TimeseriesError {
  readonly code = 'ROW_ARITY_MISMATCH';
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Row has ${actual} field(s) but its schema declares ${expected}`);
    this.name = 'RowArityError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class TableParseError extends TimeseriesError {
  readonly code = 'TABLE_PARSE_FAILED';
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'TableParseError';
    this.source = source;
  }
}

export class AtomicWriteError extends TimeseriesError {
  readonly code = 'ATOMIC_WRITE_FAILED';
  readonly destination: string;

  constructor(destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${destination}: ${reason}`, { cause });
    this.name = 'AtomicWriteError';
    this.destination = destination;
  }
}
