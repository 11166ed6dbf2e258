import fs from "node:fs/promises";
import path from "node:path";
import { ManifestWriteError, errorMessage } from "../../lib/errors.js";
import type { ClipArtifact } from "../../lib/types.js";

/**
 * Render the concat demuxer list: one `file '<absolute path>'` line per clip,
 * in the order given.
 */
export function formatManifest(clips: readonly ClipArtifact[]): string {
  return clips.map(clip => `file '${path.resolve(clip.path)}'\n`).join("");
}

export async function writeManifest(clips: readonly ClipArtifact[], manifestPath: string): Promise<void> {
  // The demuxer needs escaping for quotes in paths; unsupported here
  const quoted = clips.find(clip => clip.path.includes("'"));
  if (quoted) {
    throw new ManifestWriteError(manifestPath, `clip path contains a single quote: ${quoted.path}`);
  }

  try {
    await fs.writeFile(manifestPath, formatManifest(clips), "utf-8");
  } catch (error) {
    throw new ManifestWriteError(manifestPath, errorMessage(error), error);
  }
}
