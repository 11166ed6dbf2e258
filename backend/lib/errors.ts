/**
 * Error taxonomy for highlight runs.
 * Every fatal error carries a stable `code`; front ends map codes to responses.
 */

export type HighlightErrorCode =
  | "INVALID_RANGE"
  | "EXTRACTION_FAILED"
  | "MANIFEST_WRITE_FAILED"
  | "MERGE_FAILED"
  | "TIMESTAMP_PARSE_FAILED"
  | "EVENT_PARSE_FAILED"
  | "SOURCE_VIDEO_UNAVAILABLE"
  | "INVALID_OUTPUT_PATH"
  | "WORK_DIR_IN_USE"
  | "CANCELLED";

export class HighlightError extends Error {
  readonly code: HighlightErrorCode;

  constructor(code: HighlightErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRangeError extends HighlightError {
  readonly index?: number;

  constructor(message: string, index?: number) {
    super("INVALID_RANGE", message);
    this.index = index;
  }
}

/**
 * Base for failures of the external media tool. `stderr` is the captured
 * diagnostic text, passed through untouched for the caller to present.
 */
export class ProcessFailureError extends HighlightError {
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(
    code: "EXTRACTION_FAILED" | "MERGE_FAILED",
    message: string,
    stderr: string,
    exitCode: number | null
  ) {
    super(code, message);
    this.stderr = stderr;
    this.exitCode = exitCode;
  }
}

export class ExtractionError extends ProcessFailureError {
  readonly index: number;

  constructor(index: number, stderr: string, exitCode: number | null, reason?: string) {
    super(
      "EXTRACTION_FAILED",
      `Clip ${index} extraction failed: ${reason ?? `exit code ${exitCode}`}`,
      stderr,
      exitCode
    );
    this.index = index;
  }
}

export class MergeError extends ProcessFailureError {
  constructor(stderr: string, exitCode: number | null, reason?: string) {
    super("MERGE_FAILED", `Concat merge failed: ${reason ?? `exit code ${exitCode}`}`, stderr, exitCode);
  }
}

export class ManifestWriteError extends HighlightError {
  readonly manifestPath: string;

  constructor(manifestPath: string, message: string, cause?: unknown) {
    super("MANIFEST_WRITE_FAILED", `Failed to write manifest ${manifestPath}: ${message}`, { cause });
    this.manifestPath = manifestPath;
  }
}

export class TimestampParseError extends HighlightError {
  readonly input: string;

  constructor(input: string, message: string) {
    super("TIMESTAMP_PARSE_FAILED", `Invalid timestamp "${input}": ${message}`);
    this.input = input;
  }
}

export class EventParseError extends HighlightError {
  readonly details: string[];

  constructor(message: string, details: string[] = [], cause?: unknown) {
    super("EVENT_PARSE_FAILED", message, { cause });
    this.details = details;
  }
}

export class SourceVideoError extends HighlightError {
  constructor(message: string, cause?: unknown) {
    super("SOURCE_VIDEO_UNAVAILABLE", message, { cause });
  }
}

/**
 * The requested output path would collide with the source or with the
 * run's own scratch files.
 */
export class OutputPathError extends HighlightError {
  readonly outputPath: string;

  constructor(outputPath: string, message: string) {
    super("INVALID_OUTPUT_PATH", `Invalid output path ${outputPath}: ${message}`);
    this.outputPath = outputPath;
  }
}

export class WorkDirectoryInUseError extends HighlightError {
  readonly workDir: string;

  constructor(workDir: string, message: string, cause?: unknown) {
    super("WORK_DIR_IN_USE", `Working directory ${workDir} is not available: ${message}`, { cause });
    this.workDir = workDir;
  }
}

export class HighlightCancelledError extends HighlightError {
  constructor(step: string) {
    super("CANCELLED", `Highlight run cancelled before ${step}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
