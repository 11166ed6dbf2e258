import path from "node:path";
import { ExtractionError, InvalidRangeError } from "../../lib/errors.js";
import type { LoggingWrapper } from "../../lib/logging.js";
import { eventDuration, formatSeconds } from "../../lib/time-range.js";
import type { ClipArtifact, CommandRunner, TimeRangeEvent } from "../../lib/types.js";
import { clipFileName } from "./temp-resources.js";

/**
 * Container extension for clips cut from `sourceVideoPath`: stream copy keeps
 * the source's codecs, so the clip keeps its container too.
 */
export function clipExtension(sourceVideoPath: string): string {
  const ext = path.extname(sourceVideoPath).slice(1).toLowerCase();
  return ext || "mp4";
}

export function extractionArgs(
  sourceVideoPath: string,
  event: TimeRangeEvent,
  clipPath: string
): string[] {
  return [
    "-y",
    "-ss",
    formatSeconds(event.start_time),
    "-i",
    sourceVideoPath,
    "-t",
    formatSeconds(eventDuration(event)),
    "-c",
    "copy",
    clipPath,
  ];
}

/**
 * Cuts one event out of the source video without re-encoding.
 *
 * Seeking happens before the input (`-ss` ahead of `-i`) with stream copy, so
 * ffmpeg starts each clip on the nearest preceding keyframe: a clip can begin
 * slightly earlier than `start_time`. Times past the end of the media are
 * passed through; ffmpeg's own clamping decides the result.
 */
export class ClipExtractor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger?: LoggingWrapper
  ) {}

  async extract(
    sourceVideoPath: string,
    event: TimeRangeEvent,
    ordinalIndex: number,
    workDir: string
  ): Promise<ClipArtifact> {
    const duration = eventDuration(event);
    if (!(duration > 0)) {
      throw new InvalidRangeError(
        `Event "${event.label}" (event ${ordinalIndex}) has non-positive duration ${duration}`,
        ordinalIndex
      );
    }

    const clipPath = path.resolve(workDir, clipFileName(ordinalIndex, clipExtension(sourceVideoPath)));
    this.logger?.info("Extracting clip", {
      index: ordinalIndex,
      label: event.label,
      start: event.start_time,
      duration,
    });

    const result = await this.runner.run(extractionArgs(sourceVideoPath, event, clipPath), "ClipExtraction");
    if (result.exitCode !== 0 || result.timedOut) {
      throw new ExtractionError(
        ordinalIndex,
        result.stderr,
        result.exitCode,
        result.timedOut ? "timed out" : undefined
      );
    }

    return { index: ordinalIndex, path: clipPath, event };
  }
}
