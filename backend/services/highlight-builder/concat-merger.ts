import fs from "node:fs/promises";
import { MergeError, errorMessage } from "../../lib/errors.js";
import type { LoggingWrapper } from "../../lib/logging.js";
import type { CommandRunner } from "../../lib/types.js";
import { ensureDirForFile } from "../../lib/workspace.js";

export function concatArgs(manifestPath: string, outputPath: string): string[] {
  // -safe 0: the manifest lists absolute paths
  return ["-y", "-f", "concat", "-safe", "0", "-i", manifestPath, "-c", "copy", outputPath];
}

function isCrossDevice(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EXDEV";
}

/**
 * Joins the clips listed in a manifest with stream copy.
 *
 * ffmpeg writes to `stagingPath`; only a successful merge is moved onto
 * `outputPath`. A failed merge leaves `outputPath` (and its parent
 * directories) exactly as they were.
 */
export class ConcatMerger {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger?: LoggingWrapper
  ) {}

  async merge(manifestPath: string, outputPath: string, stagingPath: string): Promise<void> {
    this.logger?.info("Merging clips", { manifestPath, outputPath, stagingPath });

    const result = await this.runner.run(concatArgs(manifestPath, stagingPath), "ConcatMerge");
    if (result.exitCode !== 0 || result.timedOut) {
      await this.discard(stagingPath);
      throw new MergeError(result.stderr, result.exitCode, result.timedOut ? "timed out" : undefined);
    }

    try {
      await ensureDirForFile(outputPath);
      await this.publish(stagingPath, outputPath);
    } catch (error) {
      await this.discard(stagingPath);
      throw new MergeError(result.stderr, result.exitCode, `could not move output into place (${errorMessage(error)})`);
    }
  }

  private async publish(stagingPath: string, outputPath: string) {
    try {
      await fs.rename(stagingPath, outputPath);
      return;
    } catch (error) {
      if (!isCrossDevice(error)) throw error;
    }

    // Different filesystem: copy beside the output, then rename within it
    const besideOutput = `${outputPath}.partial`;
    try {
      await fs.copyFile(stagingPath, besideOutput);
      await fs.rename(besideOutput, outputPath);
    } catch (error) {
      await this.discard(besideOutput);
      throw error;
    }
  }

  private async discard(filePath: string) {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      this.logger?.warn("Could not remove partial merge output", { path: filePath, error: errorMessage(error) });
    }
  }
}
