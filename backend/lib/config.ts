import os from "node:os";
import path from "node:path";
import type { Env } from "./types.js";

export interface HighlightConfig {
  env: Env;
  ffmpegPath: string;
  ffmpegTimeoutMs: number;
  concurrency: number;
  workRoot: string;
  videoLibraryPath: string;
  port: number;
}

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function currentEnv(env: NodeJS.ProcessEnv = process.env): Env {
  // Allow "test" for unit tests in addition to normal envs
  const e = String(env.HIGHLIGHT_ENV || "dev");
  return e === "dev" || e === "stage" || e === "prod" || e === "test" ? e : "dev";
}

/**
 * Read runtime settings from the environment. Read on every call so tests
 * can change variables between runs.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HighlightConfig {
  return {
    env: currentEnv(env),
    ffmpegPath: env.HIGHLIGHT_FFMPEG_PATH || "ffmpeg",
    ffmpegTimeoutMs: positiveInt(env.HIGHLIGHT_FFMPEG_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    concurrency: positiveInt(env.HIGHLIGHT_CONCURRENCY, 1),
    workRoot: path.resolve(env.HIGHLIGHT_WORK_ROOT || path.join(os.tmpdir(), "highlight-reel")),
    videoLibraryPath: path.resolve(env.HIGHLIGHT_VIDEO_LIBRARY || "./data"),
    port: positiveInt(env.PORT, 3000),
  };
}
