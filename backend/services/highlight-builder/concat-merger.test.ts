import { describe, it, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import fs from "node:fs/promises";
import path from "node:path";
import { ConcatMerger, concatArgs } from "./concat-merger.js";
import { MergeError } from "../../lib/errors.js";
import { FakeFfmpeg, isDirectory, listDir, makeTempDir, removeDir } from "../../lib/test-helpers.js";

describe("ConcatMerger", () => {
  let workDir: string;
  let manifest: string;
  let staging: string;

  beforeEach(async () => {
    workDir = await makeTempDir("highlight-merge-");
    const a = path.join(workDir, "clip_0.mp4");
    const b = path.join(workDir, "clip_1.mp4");
    await fs.writeFile(a, "A");
    await fs.writeFile(b, "B");
    manifest = path.join(workDir, "concat_list.txt");
    await fs.writeFile(manifest, `file '${b}'\nfile '${a}'\n`);
    staging = path.join(workDir, "merged_output.mp4");
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  it("uses the concat demuxer with unsafe paths and stream copy", () => {
    assert.deepEqual(concatArgs("/w/concat_list.txt", "/out/reel.mp4"), [
      "-y",
      "-f",
      "concat",
      "-safe",
      "0",
      "-i",
      "/w/concat_list.txt",
      "-c",
      "copy",
      "/out/reel.mp4",
    ]);
  });

  it("merges into the staging file and moves it onto the output", async () => {
    const ffmpeg = new FakeFfmpeg();
    const output = path.join(workDir, "out", "reel.mp4");

    await new ConcatMerger(ffmpeg).merge(manifest, output, staging);

    assert.equal(ffmpeg.calls[0].args[ffmpeg.calls[0].args.length - 1], staging);
    assert.equal(await fs.readFile(output, "utf-8"), "BA");
    assert.deepEqual(await listDir(workDir), ["clip_0.mp4", "clip_1.mp4", "concat_list.txt", "out"]);
  });

  it("replaces an existing output only after a successful merge", async () => {
    const output = path.join(workDir, "reel.mp4");
    await fs.writeFile(output, "previous highlight");

    await new ConcatMerger(new FakeFfmpeg()).merge(manifest, output, staging);

    assert.equal(await fs.readFile(output, "utf-8"), "BA");
  });

  it("raises MergeError and creates nothing when the merge fails", async () => {
    const ffmpeg = new FakeFfmpeg({
      fail: () => ({ exitCode: 1, stderr: "Unsafe file name", partialOutput: true }),
    });
    const output = path.join(workDir, "out", "reel.mp4");

    await assert.rejects(
      new ConcatMerger(ffmpeg).merge(manifest, output, staging),
      (error: unknown) =>
        error instanceof MergeError && error.stderr === "Unsafe file name" && error.code === "MERGE_FAILED"
    );
    assert.deepEqual(await listDir(workDir), ["clip_0.mp4", "clip_1.mp4", "concat_list.txt"]);
    assert.equal(await isDirectory(path.dirname(output)), false);
  });

  it("leaves a pre-existing output untouched when the merge fails", async () => {
    const ffmpeg = new FakeFfmpeg({
      fail: () => ({ exitCode: 1, stderr: "Impossible to open clip_0.mp4" }),
    });
    const output = path.join(workDir, "keep.mp4");
    await fs.writeFile(output, "someone else's file");

    await assert.rejects(new ConcatMerger(ffmpeg).merge(manifest, output, staging), MergeError);

    assert.equal(await fs.readFile(output, "utf-8"), "someone else's file");
  });

  it("raises MergeError when the output cannot be moved into place", async () => {
    const output = path.join(workDir, "taken");
    await fs.mkdir(path.join(output, "child"), { recursive: true });

    await assert.rejects(
      new ConcatMerger(new FakeFfmpeg()).merge(manifest, output, staging),
      (error: unknown) => error instanceof MergeError && /could not move output into place/.test(error.message)
    );
    assert.deepEqual(await listDir(workDir), ["clip_0.mp4", "clip_1.mp4", "concat_list.txt", "taken"]);
  });
});
