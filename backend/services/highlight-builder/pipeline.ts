import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { HighlightCancelledError, OutputPathError, errorMessage } from "../../lib/errors.js";
import { LoggingWrapper } from "../../lib/logging.js";
import type { MetricsWrapper } from "../../lib/metrics.js";
import { validateEvents } from "../../lib/time-range.js";
import type {
  ClipArtifact,
  CleanupWarning,
  CommandRunner,
  HighlightResult,
  TimeRangeEvent,
} from "../../lib/types.js";
import { assertSourceVideo } from "../../lib/video-source.js";
import { createRunWorkDir, isWithin, removeIfEmpty } from "../../lib/workspace.js";
import { ClipExtractor, clipExtension } from "./clip-extractor.js";
import { ConcatMerger } from "./concat-merger.js";
import { writeManifest } from "./manifest-writer.js";
import { TempResourceManager } from "./temp-resources.js";

export interface PipelineDependencies {
  runner: CommandRunner;
  metrics?: MetricsWrapper;
  /** Parent directory for per-run working directories created by the pipeline */
  workRoot: string;
  /** Extractions in flight at once; 1 means strictly sequential */
  concurrency?: number;
}

export interface BuildOptions {
  /** Exclusive scratch directory for this run; created under workRoot when omitted */
  workDir?: string;
  concurrency?: number;
  signal?: AbortSignal;
  runId?: string;
  correlationId?: string;
}

function throwIfCancelled(signal: AbortSignal | undefined, step: string) {
  if (signal?.aborted) {
    throw new HighlightCancelledError(step);
  }
}

/**
 * Extract → manifest → merge, with every intermediate file owned by a
 * TempResourceManager that is released on every exit path. The merge is
 * staged inside the working directory, which is why the output must live
 * outside it.
 *
 * Events are processed in the order given; the first failure stops the run
 * and is the error the caller sees. The output file exists only when the
 * whole run succeeded.
 */
export class HighlightPipeline {
  constructor(private readonly deps: PipelineDependencies) {}

  async buildHighlight(
    sourceVideoPath: string,
    orderedEvents: readonly TimeRangeEvent[],
    outputPath: string,
    options: BuildOptions = {}
  ): Promise<string> {
    const result = await this.run(sourceVideoPath, orderedEvents, outputPath, options);
    return result.outputPath;
  }

  async run(
    sourceVideoPath: string,
    orderedEvents: readonly TimeRangeEvent[],
    outputPath: string,
    options: BuildOptions = {}
  ): Promise<HighlightResult> {
    const startedAt = Date.now();
    const runId = options.runId ?? uuidv4();
    const logger = new LoggingWrapper("highlight-pipeline", {
      runId,
      ...(options.correlationId ? { correlationId: options.correlationId } : {}),
    });

    validateEvents(orderedEvents);
    const source = await assertSourceVideo(sourceVideoPath);
    const output = path.resolve(outputPath);
    if (output === source) {
      throw new OutputPathError(output, "must differ from the source video");
    }
    if (options.workDir && isWithin(options.workDir, output)) {
      throw new OutputPathError(output, `must be outside the working directory ${path.resolve(options.workDir)}`);
    }
    throwIfCancelled(options.signal, "starting");

    const workDir = options.workDir ? path.resolve(options.workDir) : await createRunWorkDir(this.deps.workRoot, runId);
    const createdDir = options.workDir ? undefined : workDir;
    const extractor = new ClipExtractor(this.deps.runner, logger);
    const merger = new ConcatMerger(this.deps.runner, logger);

    logger.info("Highlight run started", {
      source,
      output,
      workDir,
      events: orderedEvents.length,
    });

    let warnings: CleanupWarning[] = [];
    let succeeded = false;
    try {
      ({ warnings } = await TempResourceManager.using(
        workDir,
        async resources => {
          const clips = await this.extractAll(extractor, source, orderedEvents, resources, options);

          throwIfCancelled(options.signal, "writing the manifest");
          const manifestPath = resources.manifestPath();
          await writeManifest(clips, manifestPath);

          throwIfCancelled(options.signal, "merging");
          await merger.merge(manifestPath, output, resources.stagedOutputPath(path.extname(output) || ".mp4"));
        },
        logger
      ));
      succeeded = true;
    } catch (error) {
      logger.error("Highlight run failed", {
        error: errorMessage(error),
        code: error instanceof Error && "code" in error ? error.code : undefined,
      });
      throw error;
    } finally {
      if (createdDir) await this.removeCreatedDir(createdDir, logger);
      const durationMs = Date.now() - startedAt;
      this.deps.metrics?.recordOperation("HighlightRun", succeeded, durationMs);
      if (succeeded) this.deps.metrics?.recordClipCount(orderedEvents.length);
      this.deps.metrics?.publishStoredMetrics();
    }

    const durationMs = Date.now() - startedAt;
    logger.info("Highlight run completed", { output, durationMs, warnings: warnings.length });
    return { outputPath: output, runId, clips: orderedEvents.length, durationMs, warnings };
  }

  /**
   * Results are slotted by ordinal index, so completion order never changes
   * manifest order. After the first failure no new extraction starts.
   */
  private async extractAll(
    extractor: ClipExtractor,
    source: string,
    events: readonly TimeRangeEvent[],
    resources: TempResourceManager,
    options: BuildOptions
  ): Promise<ClipArtifact[]> {
    const concurrency = Math.max(1, options.concurrency ?? this.deps.concurrency ?? 1);
    const ext = clipExtension(source);
    const clips: ClipArtifact[] = [];
    const errors: unknown[] = [];
    let next = 0;

    const worker = async () => {
      while (errors.length === 0 && next < events.length) {
        const index = next++;
        try {
          throwIfCancelled(options.signal, `extracting clip ${index}`);
          // Owned before ffmpeg runs, so a half-written clip is still removed
          resources.clipPath(index, ext);
          clips[index] = await extractor.extract(source, events[index], index, resources.workDir);
        } catch (error) {
          errors.push(error);
        }
      }
    };

    const workers = Array.from({ length: Math.min(concurrency, events.length) }, () => worker());
    await Promise.all(workers);

    if (errors.length > 0) {
      throw errors[0];
    }
    return clips;
  }

  private async removeCreatedDir(dir: string, logger: LoggingWrapper) {
    try {
      if (!(await removeIfEmpty(dir))) {
        logger.warn("CleanupWarning: working directory not empty, left in place", { workDir: dir });
      }
    } catch (error) {
      logger.warn("CleanupWarning: failed to remove working directory", {
        workDir: dir,
        error: errorMessage(error),
      });
    }
  }
}
