import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs/promises";
import path from "node:path";
import { LocalVideoLibrary, assertSourceVideo } from "./video-source.js";
import { SourceVideoError } from "./errors.js";
import { makeTempDir, removeDir } from "./test-helpers.js";

describe("LocalVideoLibrary", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("highlight-library-");
    await fs.writeFile(path.join(dir, "abc123.mp4"), "video");
    await fs.writeFile(path.join(dir, "talk_01.webm"), "video");
    await fs.writeFile(path.join(dir, "notes.txt"), "not a video");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("fetch() finds a video by id among known extensions", async () => {
    const library = new LocalVideoLibrary(dir);
    assert.strictEqual(await library.fetch("talk_01", "/unused"), path.join(dir, "talk_01.webm"));
  });

  test("fetch() honours extensions.json", async () => {
    await fs.writeFile(path.join(dir, "abc123.mkv"), "video");
    await fs.writeFile(path.join(dir, "extensions.json"), JSON.stringify({ abc123: "mkv" }));
    const library = new LocalVideoLibrary(dir);
    assert.strictEqual(await library.fetch("abc123", "/unused"), path.join(dir, "abc123.mkv"));
  });

  test("fetch() fails for unknown or unsafe ids", async () => {
    const library = new LocalVideoLibrary(dir);
    await assert.rejects(library.fetch("missing", "/unused"), SourceVideoError);
    await assert.rejects(library.fetch("../abc123", "/unused"), /Invalid video id/);
  });

  test("fetch() rejects a malformed extension map", async () => {
    await fs.writeFile(path.join(dir, "extensions.json"), "[1, 2]");
    await assert.rejects(new LocalVideoLibrary(dir).fetch("abc123", "/unused"), /Invalid extension map/);
  });

  test("list() maps video file names to absolute paths", async () => {
    const videos = await new LocalVideoLibrary(dir).list();
    assert.deepStrictEqual(videos, {
      "abc123.mp4": path.join(dir, "abc123.mp4"),
      "talk_01.webm": path.join(dir, "talk_01.webm"),
    });
  });

  test("list() is empty for a missing directory", async () => {
    assert.deepStrictEqual(await new LocalVideoLibrary(path.join(dir, "nope")).list(), {});
  });
});

describe("assertSourceVideo", () => {
  test("rejects missing files and directories", async () => {
    const dir = await makeTempDir();
    try {
      await assert.rejects(assertSourceVideo(path.join(dir, "none.mp4")), SourceVideoError);
      await assert.rejects(assertSourceVideo(dir), SourceVideoError);
      const file = path.join(dir, "real.mp4");
      await fs.writeFile(file, "video");
      assert.strictEqual(await assertSourceVideo(file), file);
    } finally {
      await removeDir(dir);
    }
  });
});
