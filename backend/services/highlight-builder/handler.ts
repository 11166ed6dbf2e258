import { v4 as uuidv4 } from "uuid";
import { loadConfig, type HighlightConfig } from "../../lib/config.js";
import { EventParseError, SourceVideoError } from "../../lib/errors.js";
import { FFmpegRuntime } from "../../lib/ffmpeg-runtime.js";
import { initObservability } from "../../lib/init-observability.js";
import { parseCaptionEvents, parseKeyEvents } from "../../lib/key-events.js";
import type { CleanupWarning, CommandRunner, TimeRangeEvent } from "../../lib/types.js";
import { LocalVideoLibrary, type VideoSource } from "../../lib/video-source.js";
import { HighlightPipeline } from "./pipeline.js";

export interface HighlightEvent {
  correlationId?: string;
  sourceVideoPath?: string;
  videoId?: string;
  /** Already structured events, in seconds */
  events?: unknown;
  /** Raw output of the key-event analysis step */
  keyEventsJson?: string;
  /** Raw captioner output with mm:ss.ff timestamps */
  captionsJson?: string;
  outputPath: string;
  workDir?: string;
}

export interface HighlightResponse {
  ok: true;
  outputPath: string;
  runId: string;
  clips: number;
  correlationId: string;
  durationMs: number;
  warnings: CleanupWarning[];
}

export interface HandlerOverrides {
  config?: HighlightConfig;
  runner?: CommandRunner;
  videoSource?: VideoSource;
  signal?: AbortSignal;
}

export function eventsFrom(event: HighlightEvent): TimeRangeEvent[] {
  if (event.events !== undefined) return parseKeyEvents(event.events);
  if (event.keyEventsJson !== undefined) return parseKeyEvents(event.keyEventsJson);
  if (event.captionsJson !== undefined) return parseCaptionEvents(event.captionsJson);
  throw new EventParseError("No events supplied: expected events, keyEventsJson or captionsJson");
}

/**
 * Single entry point for every front end that builds a highlight video.
 * Errors propagate unchanged for the caller to present.
 */
export async function handler(
  event: HighlightEvent,
  overrides: HandlerOverrides = {}
): Promise<HighlightResponse> {
  const config = overrides.config ?? loadConfig();
  const correlationId = event.correlationId || uuidv4();
  const runId = uuidv4();
  const { logger, metrics } = initObservability({
    serviceName: "HighlightBuilder",
    correlationId,
    runId,
  });

  const runner =
    overrides.runner ??
    new FFmpegRuntime(logger, metrics, {
      ffmpegPath: config.ffmpegPath,
      timeoutMs: config.ffmpegTimeoutMs,
    });

  const events = eventsFrom(event);

  let sourceVideoPath = event.sourceVideoPath;
  if (!sourceVideoPath) {
    if (!event.videoId) {
      throw new SourceVideoError("Either sourceVideoPath or videoId is required");
    }
    const source = overrides.videoSource ?? new LocalVideoLibrary(config.videoLibraryPath);
    sourceVideoPath = await source.fetch(event.videoId, config.workRoot);
    logger.info("Source video resolved", { videoId: event.videoId, sourceVideoPath });
  }

  const pipeline = new HighlightPipeline({
    runner,
    metrics,
    workRoot: config.workRoot,
    concurrency: config.concurrency,
  });

  const result = await pipeline.run(sourceVideoPath, events, event.outputPath, {
    workDir: event.workDir,
    runId,
    correlationId,
    signal: overrides.signal,
  });

  return { ok: true, correlationId, ...result };
}
