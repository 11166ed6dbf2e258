import { describe, it, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import fs from "node:fs/promises";
import path from "node:path";
import { formatManifest, writeManifest } from "./manifest-writer.js";
import { ManifestWriteError } from "../../lib/errors.js";
import type { ClipArtifact } from "../../lib/types.js";
import { makeTempDir, removeDir } from "../../lib/test-helpers.js";

function clip(index: number, clipPath: string): ClipArtifact {
  return { index, path: clipPath, event: { start_time: index, end_time: index + 1, label: `e${index}` } };
}

describe("Manifest writer", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await makeTempDir("highlight-manifest-");
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  it("writes one quoted absolute path per clip in the given order", async () => {
    const clips = [clip(1, "/w/clip_1.mp4"), clip(0, "/w/clip_0.mp4")];
    const manifestPath = path.join(workDir, "concat_list.txt");

    await writeManifest(clips, manifestPath);

    const text = await fs.readFile(manifestPath, "utf-8");
    assert.equal(text, "file '/w/clip_1.mp4'\nfile '/w/clip_0.mp4'\n");
    assert.equal(text.split("\n").filter(Boolean).length, clips.length);
  });

  it("resolves relative clip paths", () => {
    assert.equal(formatManifest([clip(0, "clip_0.mp4")]), `file '${path.resolve("clip_0.mp4")}'\n`);
  });

  it("writes an empty manifest for no clips", () => {
    assert.equal(formatManifest([]), "");
  });

  it("rejects paths containing a single quote", async () => {
    await assert.rejects(
      writeManifest([clip(0, "/w/it's/clip_0.mp4")], path.join(workDir, "concat_list.txt")),
      ManifestWriteError
    );
  });

  it("wraps I/O failures in ManifestWriteError", async () => {
    const manifestPath = path.join(workDir, "missing-dir", "concat_list.txt");
    await assert.rejects(
      writeManifest([clip(0, "/w/clip_0.mp4")], manifestPath),
      (error: unknown) =>
        error instanceof ManifestWriteError && error.manifestPath === manifestPath && /ENOENT/.test(error.message)
    );
  });
});
