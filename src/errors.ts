/**
 * Error taxonomy for the tool.
 *
 * Codes:
 * - NOT_FOUND: the judge has no such problem or contest, or its samples do not pair up
 * - FETCH_FAILED: a page could not be fetched after retries
 * - UNSUPPORTED: the judge or language does not support the operation
 * - SOLUTION_NOT_FOUND: the source file passed to `--run` does not exist
 * - CACHE_CORRUPT: an output file has no matching input file
 * - USAGE: invalid command-line flags
 *
 * Per-case timeouts and runtime errors are verdicts, not errors, and a
 * failed compilation is a report kind.
 */
export class CpSamplesError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "CpSamplesError";
  }
}

export class NotFoundError extends CpSamplesError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class ProblemNotFoundError extends NotFoundError {
  constructor(public readonly url: string) {
    super(`Problem not found (${url})`);
    this.name = "ProblemNotFoundError";
  }
}

export class ContestNotFoundError extends NotFoundError {
  constructor(public readonly url: string) {
    super(`Contest not found (${url})`);
    this.name = "ContestNotFoundError";
  }
}

/** A page whose sample inputs and outputs cannot be paired up. */
export class MismatchedSamplesError extends NotFoundError {
  constructor(
    public readonly problem: string,
    inputs: number,
    outputs: number
  ) {
    super(`Mismatched sample cases for ${problem}: ${inputs} inputs, ${outputs} outputs`);
    this.name = "MismatchedSamplesError";
  }
}

export class FetchFailedError extends CpSamplesError {
  constructor(
    public readonly url: string,
    detail: string
  ) {
    super("FETCH_FAILED", `Could not fetch ${url}: ${detail}`);
    this.name = "FetchFailedError";
  }
}

export class UnsupportedOperationError extends CpSamplesError {
  constructor(message: string) {
    super("UNSUPPORTED", message);
    this.name = "UnsupportedOperationError";
  }
}

export class UnsupportedLanguageError extends CpSamplesError {
  constructor(public readonly extension: string) {
    super("UNSUPPORTED", `Unsupported source extension: ".${extension}"`);
    this.name = "UnsupportedLanguageError";
  }
}

export class SolutionNotFoundError extends CpSamplesError {
  constructor(public readonly path: string) {
    super("SOLUTION_NOT_FOUND", `No such file: ${path}`);
    this.name = "SolutionNotFoundError";
  }
}

export class CacheCorruptionError extends CpSamplesError {
  constructor(public readonly path: string) {
    super("CACHE_CORRUPT", `Cached output has no matching input: ${path}`);
    this.name = "CacheCorruptionError";
  }
}

export class UsageError extends CpSamplesError {
  constructor(message: string) {
    super("USAGE", message);
    this.name = "UsageError";
  }
}
