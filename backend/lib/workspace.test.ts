import { test, describe, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs/promises";
import path from "node:path";
import { createRunWorkDir, ensureDirForFile, isWithin, removeIfEmpty, runDirName } from "./workspace.js";
import { isDirectory, makeTempDir, removeDir } from "./test-helpers.js";

describe("Workspace utilities", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("highlight-workspace-");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  test("createRunWorkDir() creates a run-scoped directory", async () => {
    const dir = await createRunWorkDir(path.join(root, "nested"), "run-a");
    assert.strictEqual(dir, path.join(root, "nested", runDirName("run-a")));
    assert.strictEqual(await isDirectory(dir), true);
  });

  test("createRunWorkDir() refuses to reuse an existing directory", async () => {
    await createRunWorkDir(root, "same");
    await assert.rejects(createRunWorkDir(root, "same"), /EEXIST/);
  });

  test("createRunWorkDir() generates distinct directories", async () => {
    const a = await createRunWorkDir(root);
    const b = await createRunWorkDir(root);
    assert.notStrictEqual(a, b);
  });

  test("removeIfEmpty() keeps directories that still hold files", async () => {
    const dir = await createRunWorkDir(root, "busy");
    await fs.writeFile(path.join(dir, "highlight.mp4"), "output");
    assert.strictEqual(await removeIfEmpty(dir), false);
    assert.strictEqual(await isDirectory(dir), true);

    await fs.rm(path.join(dir, "highlight.mp4"));
    assert.strictEqual(await removeIfEmpty(dir), true);
    assert.strictEqual(await isDirectory(dir), false);
  });

  test("ensureDirForFile() creates parent directories", async () => {
    const file = path.join(root, "out", "reels", "final.mp4");
    await ensureDirForFile(file);
    assert.strictEqual(await isDirectory(path.dirname(file)), true);
  });

  test("isWithin() matches the directory and its descendants only", () => {
    assert.strictEqual(isWithin("/w/run-1", "/w/run-1/clip_0.mp4"), true);
    assert.strictEqual(isWithin("/w/run-1", "/w/run-1/out/../concat_list.txt"), true);
    assert.strictEqual(isWithin("/w/run-1", "/w/run-1"), true);
    assert.strictEqual(isWithin("/w/run-1", "/w/run-10/clip_0.mp4"), false);
    assert.strictEqual(isWithin("/w/run-1", "/w/highlight.mp4"), false);
  });
});
