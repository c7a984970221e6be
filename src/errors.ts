/**
 * Error taxonomy.
 * Startup and authentication errors abort the invocation; extraction and
 * submission errors are recorded against a single directory and the run goes on.
 */

export class IngestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Configuration could not be resolved. Raised before any directory is scanned. */
export class StartupConfigError extends IngestError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      problems.length === 1
        ? `Invalid configuration: ${problems[0]}`
        : `Invalid configuration:\n  - ${problems.join("\n  - ")}`
    );
    this.problems = problems;
  }
}

/** Login against the SciCat API was rejected or could not be completed. */
export class AuthenticationError extends IngestError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** An ingestor accepted a directory but failed to build its dataset record. */
export class ExtractionError extends IngestError {
  readonly directory: string;
  readonly ingestor: string;
  /** Message of the underlying failure */
  readonly reason: string;

  constructor(directory: string, ingestor: string, cause: unknown) {
    const reason = describeError(cause);
    super(`${ingestor} could not extract ${directory}: ${reason}`, { cause });
    this.directory = directory;
    this.ingestor = ingestor;
    this.reason = reason;
  }
}

/** A dataset record could not be registered with SciCat. */
export class SubmissionError extends IngestError {
  /** HTTP status when the server answered */
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** Message of an Error, or the stringified value of anything else thrown */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
