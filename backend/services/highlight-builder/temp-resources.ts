import fs from "node:fs/promises";
import path from "node:path";
import { WorkDirectoryInUseError, errorMessage } from "../../lib/errors.js";
import type { LoggingWrapper } from "../../lib/logging.js";
import type { CleanupWarning } from "../../lib/types.js";

export const LOCK_FILE = ".highlight.lock";
export const MANIFEST_FILE = "concat_list.txt";
export const STAGED_OUTPUT_STEM = "merged_output";
const CLIP_PATTERN = /^clip_\d+\./;
const STAGED_OUTPUT_PATTERN = /^merged_output(\.|$)/;

export function clipFileName(index: number, ext: string) {
  return `clip_${index}.${ext}`;
}

/**
 * Owns every intermediate file of one highlight run (clips, manifest, lock).
 *
 * Construct through `acquire()`: it claims the working directory with an
 * exclusive lock file, so two runs can never share ordinal clip names.
 * `release()` removes everything owned and never throws; failures come back
 * as CleanupWarnings. The directory itself and the final output are never
 * touched.
 */
export class TempResourceManager {
  private readonly owned = new Set<string>();
  private released = false;

  private constructor(
    readonly workDir: string,
    private readonly lockPath: string,
    private readonly logger?: LoggingWrapper
  ) {}

  static async acquire(workDir: string, logger?: LoggingWrapper): Promise<TempResourceManager> {
    const dir = path.resolve(workDir);

    let entries: string[];
    try {
      const stat = await fs.stat(dir);
      if (!stat.isDirectory()) {
        throw new WorkDirectoryInUseError(dir, "not a directory");
      }
      entries = await fs.readdir(dir);
    } catch (error) {
      if (error instanceof WorkDirectoryInUseError) throw error;
      throw new WorkDirectoryInUseError(dir, errorMessage(error), error);
    }

    const leftovers = entries.filter(
      name => CLIP_PATTERN.test(name) || STAGED_OUTPUT_PATTERN.test(name) || name === MANIFEST_FILE
    );
    if (leftovers.length > 0) {
      throw new WorkDirectoryInUseError(dir, `contains artifacts of another run (${leftovers.join(", ")})`);
    }

    const lockPath = path.join(dir, LOCK_FILE);
    try {
      // `wx` fails when the file exists: this is the exclusivity claim
      await fs.writeFile(lockPath, `${process.pid}\n`, { flag: "wx" });
    } catch (error) {
      throw new WorkDirectoryInUseError(dir, `already locked (${errorMessage(error)})`, error);
    }

    logger?.debug("Working directory acquired", { workDir: dir });
    return new TempResourceManager(dir, lockPath, logger);
  }

  /**
   * Run `fn` with a freshly acquired manager and release it on every exit path.
   * The error from `fn` is the one that propagates; on success the cleanup
   * warnings come back with its value.
   */
  static async using<T>(
    workDir: string,
    fn: (resources: TempResourceManager) => Promise<T>,
    logger?: LoggingWrapper
  ): Promise<{ value: T; warnings: CleanupWarning[] }> {
    const resources = await TempResourceManager.acquire(workDir, logger);
    let value: T;
    try {
      value = await fn(resources);
    } catch (error) {
      await resources.release();
      throw error;
    }
    return { value, warnings: await resources.release() };
  }

  track(filePath: string): string {
    if (this.released) {
      throw new Error("TempResourceManager already released");
    }
    const resolved = path.resolve(this.workDir, filePath);
    this.owned.add(resolved);
    return resolved;
  }

  clipPath(index: number, ext: string): string {
    return this.track(path.join(this.workDir, clipFileName(index, ext)));
  }

  manifestPath(): string {
    return this.track(path.join(this.workDir, MANIFEST_FILE));
  }

  /**
   * Where the merge writes before the result is moved onto the caller's
   * output path. `ext` includes the dot, as `path.extname` returns it.
   */
  stagedOutputPath(ext: string): string {
    return this.track(path.join(this.workDir, `${STAGED_OUTPUT_STEM}${ext}`));
  }

  async release(): Promise<CleanupWarning[]> {
    if (this.released) return [];
    this.released = true;

    const warnings: CleanupWarning[] = [];
    // lock goes last so the directory stays claimed until the files are gone
    for (const filePath of [...this.owned, this.lockPath]) {
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        const warning = { path: filePath, message: errorMessage(error) };
        warnings.push(warning);
        this.logger?.warn("CleanupWarning: failed to remove temp artifact", { ...warning });
      }
    }
    this.owned.clear();

    this.logger?.debug("Temp resources released", { workDir: this.workDir, warnings: warnings.length });
    return warnings;
  }
}
