export type Env = "dev" | "stage" | "prod" | "test";

/**
 * A labelled range of the source video, in seconds.
 * Produced by the analysis collaborator; never re-sorted by the pipeline.
 */
export interface TimeRangeEvent {
  readonly start_time: number;
  readonly end_time: number;
  readonly label: string;
  readonly reason?: string;
}

export interface ClipArtifact {
  index: number;
  path: string;
  event: TimeRangeEvent;
}

export interface CleanupWarning {
  path: string;
  message: string;
}

export interface HighlightResult {
  outputPath: string;
  runId: string;
  clips: number;
  durationMs: number;
  warnings: CleanupWarning[];
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

/**
 * Anything able to run the media tool with an argument vector.
 * FFmpegRuntime is the production implementation.
 */
export interface CommandRunner {
  run(args: string[], operation: FFmpegOperation): Promise<CommandResult>;
}

export type FFmpegOperation = "ClipExtraction" | "ConcatMerge" | "RuntimeCheck";

// Raw shapes accepted from upstream collaborators
export interface RawKeyEvent {
  start_time: number;
  end_time: number;
  summary?: string;
  label?: string;
  description?: string;
  reason?: string;
}

export interface RawCaptionEvent {
  start_time?: string;
  end_time?: string;
  start?: string;
  end?: string;
  description?: string;
  caption?: string;
}
