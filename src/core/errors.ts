/**
 * Error taxonomy of the report pipeline.
 *
 * Fatal errors abort the run with a non-zero exit code. Recoverable errors
 * only degrade the report: the pipeline logs them and substitutes a
 * placeholder for the missing content.
 */

export abstract class ReportPipelineError extends Error {
  abstract readonly fatal: boolean;

  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Metrics could not be loaded; nothing can be compared. */
export class DataLoadError extends ReportPipelineError {
  readonly fatal = true;

  constructor(
    message: string,
    public readonly path: string | null = null,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

export class NarrativeUnavailable extends ReportPipelineError {
  readonly fatal = false;

  constructor(
    message: string,
    public readonly provider: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

export class FetchUnavailable extends ReportPipelineError {
  readonly fatal = false;

  constructor(
    message: string,
    public readonly stockId: string,
    public readonly url: string | null = null,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/** The report file was not written. */
export class RenderError extends ReportPipelineError {
  readonly fatal = true;

  constructor(
    message: string,
    public readonly outputPath: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

export class ConfigError extends ReportPipelineError {
  readonly fatal = true;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
