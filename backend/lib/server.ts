import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import bodyParser from "body-parser";
import { createHighlight } from "./api/highlights/createHighlight.js";
import { loadConfig } from "./config.js";
import { FFmpegRuntime, validateRuntime } from "./ffmpeg-runtime.js";
import { initObservability } from "./init-observability.js";
import { LocalVideoLibrary } from "./video-source.js";
import type { HandlerOverrides } from "../services/highlight-builder/handler.js";

export function createApp(overrides: HandlerOverrides = {}) {
  const app = express();
  app.use(bodyParser.json({ limit: "1mb" }));

  // Healthy only when ffmpeg can be started
  app.get("/health", async (req, res) => {
    const config = overrides.config ?? loadConfig();
    const { logger, metrics } = initObservability({
      serviceName: "HighlightApi",
      correlationId: req.header("x-correlation-id") || `health-${Date.now()}`,
    });
    const runner =
      overrides.runner ??
      new FFmpegRuntime(logger, metrics, { ffmpegPath: config.ffmpegPath, timeoutMs: config.ffmpegTimeoutMs });
    const ffmpeg = await validateRuntime(runner, logger);
    res.status(ffmpeg ? 200 : 503).json({ ok: ffmpeg, ffmpeg });
  });

  app.get("/videos", async (_req, res) => {
    const config = overrides.config ?? loadConfig();
    try {
      const videos = await new LocalVideoLibrary(config.videoLibraryPath).list();
      res.status(200).json({ videos });
    } catch (err) {
      res.status(500).json({ error: err instanceof Error ? err.message : "Internal error" });
    }
  });

  app.post("/highlights", async (req, res) => {
    try {
      const result = await createHighlight(
        {
          headers: {
            "x-correlation-id": req.header("x-correlation-id") || `local-${Date.now()}`,
            "content-type": "application/json",
          },
          body: JSON.stringify(req.body),
        },
        overrides
      );
      res.status(result.statusCode).type("application/json").send(result.body);
    } catch (err) {
      res.status(500).json({ error: err instanceof Error ? err.message : "Internal error" });
    }
  });

  return app;
}

const isEntryPoint =
  process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  const { port } = loadConfig();
  createApp().listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`[api] listening on http://localhost:${port}`);
  });
}
