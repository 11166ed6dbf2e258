import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import fs from "node:fs/promises";
import type { Server } from "node:http";
import path from "node:path";
import { createApp } from "./server.js";
import { FakeFfmpeg, makeTempDir, removeDir } from "./test-helpers.js";

describe("HTTP server", () => {
  let root: string;
  let server: Server;
  let baseUrl: string;

  before(async () => {
    root = await makeTempDir("highlight-server-");
    await fs.mkdir(path.join(root, "library"));
    await fs.writeFile(path.join(root, "library", "talk.mp4"), "video");
    await fs.writeFile(path.join(root, "library", "notes.txt"), "not a video");
    const app = createApp({
      runner: new FakeFfmpeg(),
      config: {
        env: "test",
        ffmpegPath: "ffmpeg",
        ffmpegTimeoutMs: 1000,
        concurrency: 1,
        workRoot: path.join(root, "runs"),
        videoLibraryPath: path.join(root, "library"),
        port: 0,
      },
    });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    await removeDir(root);
  });

  test("GET /health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), { ok: true, ffmpeg: true });
  });

  test("GET /videos lists the library", async () => {
    const res = await fetch(`${baseUrl}/videos`);
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), {
      videos: { "talk.mp4": path.join(root, "library", "talk.mp4") },
    });
  });

  test("POST /highlights builds from a library video id", async () => {
    const outputPath = path.join(root, "reel.mp4");
    const res = await fetch(`${baseUrl}/highlights`, {
      method: "POST",
      headers: { "content-type": "application/json", "x-correlation-id": "test-corr" },
      body: JSON.stringify({ videoId: "talk", outputPath, events: [{ start_time: 2, end_time: 4, label: "q" }] }),
    });

    assert.strictEqual(res.status, 201);
    const payload = JSON.parse(await res.text());
    assert.strictEqual(payload.correlationId, "test-corr");
    assert.strictEqual(await fs.readFile(outputPath, "utf-8"), "clip 2+2\n");
  });

  test("POST /highlights maps an unknown video to 404", async () => {
    const res = await fetch(`${baseUrl}/highlights`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        videoId: "nope",
        outputPath: path.join(root, "x.mp4"),
        events: [{ start_time: 2, end_time: 4, label: "q" }],
      }),
    });
    assert.strictEqual(res.status, 404);
  });
});
