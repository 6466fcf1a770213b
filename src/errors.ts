/**
 * Error types raised by the validation pipeline.
 *
 * Schema and argument errors abort the run. DegenerateInterpolationError is
 * the one soft error: it is recorded on the interpolator and logged, and
 * every query then resolves to undefined.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ProcessFailureReason =
  | 'launch-failed'
  | 'exit-status'
  | 'signal'
  | 'missing-result'
  | 'stale-result';

export class ProcessInvocationError extends ValidationError {
  readonly reason: ProcessFailureReason;
  readonly command: string;

  constructor(reason: ProcessFailureReason, command: string, detail: string) {
    super(`${command}: ${detail}`);
    this.reason = reason;
    this.command = command;
  }
}

export class MissingColumnError extends ValidationError {
  readonly columns: readonly string[];

  constructor(columns: readonly string[], source: string) {
    super(`${source} is missing required column(s): ${columns.join(', ')}`);
    this.columns = columns;
  }
}

export class MalformedRowError extends ValidationError {
  readonly line: number;
  readonly column: string | undefined;

  constructor(line: number, column: string | undefined, detail: string) {
    super(column === undefined ? `line ${line}: ${detail}` : `line ${line}, column '${column}': ${detail}`);
    this.line = line;
    this.column = column;
  }
}

export class InvalidResolutionError extends ValidationError {
  readonly resolution: number;

  constructor(resolution: number) {
    super(`transect resolution must be an integer >= 2, got ${resolution}`);
    this.resolution = resolution;
  }
}

export class DegenerateTransectError extends ValidationError {}

export class DegenerateInterpolationError extends ValidationError {
  readonly pointCount: number;

  constructor(pointCount: number, detail: string) {
    super(`cannot triangulate ${pointCount} point(s): ${detail}`);
    this.pointCount = pointCount;
  }
}
