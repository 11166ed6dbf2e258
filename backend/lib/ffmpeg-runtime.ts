// backend/lib/ffmpeg-runtime.ts
import { spawn } from "node:child_process";
import type { LoggingWrapper } from "./logging.js";
import type { MetricsWrapper } from "./metrics.js";
import type { CommandResult, CommandRunner, FFmpegOperation } from "./types.js";

export interface FFmpegRuntimeOptions {
  ffmpegPath?: string;
  timeoutMs?: number;
}

const MAX_CAPTURE_CHARS = 1024 * 1024; // keep the tail of very chatty output

function appendCapped(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > MAX_CAPTURE_CHARS ? next.slice(next.length - MAX_CAPTURE_CHARS) : next;
}

/**
 * Validate that the FFmpeg runtime behind `runner` is available and functional
 */
export async function validateRuntime(runner: CommandRunner, logger?: LoggingWrapper): Promise<boolean> {
  const result = await runner.run(["-version"], "RuntimeCheck");
  const available = result.exitCode === 0 && !result.timedOut;
  if (available) {
    logger?.info("FFmpeg runtime validation successful", {
      version: result.stdout.split("\n")[0],
    });
  } else {
    logger?.error("FFmpeg runtime validation failed", { stderr: result.stderr });
  }
  return available;
}

/**
 * FFmpeg runtime helper with timing, stderr capture and metrics.
 *
 * Runs the binary directly with an argument vector (no shell). A non-zero
 * exit resolves normally; callers decide which error it becomes.
 */
class FFmpegRuntime implements CommandRunner {
  private logger: LoggingWrapper;
  private metrics: MetricsWrapper;
  private ffmpegPath: string;
  private timeoutMs: number;

  constructor(logger: LoggingWrapper, metrics: MetricsWrapper, options: FFmpegRuntimeOptions = {}) {
    this.logger = logger;
    this.metrics = metrics;
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
  }

  run(args: string[], operation: FFmpegOperation): Promise<CommandResult> {
    const startTime = Date.now();
    this.logger.debug("Executing FFmpeg command", { command: this.ffmpegPath, args, operation });

    return new Promise(resolve => {
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let settled = false;

      const finish = (exitCode: number | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);

        const duration = Date.now() - startTime;
        const success = exitCode === 0 && !timedOut;
        this.metrics.recordFFmpegExecution(operation, duration, success);

        if (success) {
          this.logger.info("FFmpeg command completed successfully", { operation, duration });
        } else {
          this.logger.error("FFmpeg command failed", {
            operation,
            duration,
            exitCode,
            timedOut,
            stderr,
          });
        }

        resolve({ exitCode, stdout, stderr, duration, timedOut });
      };

      const child = spawn(this.ffmpegPath, args, { stdio: ["ignore", "pipe", "pipe"] });

      const timer = setTimeout(() => {
        timedOut = true;
        stderr += `\nFFmpeg command timed out after ${this.timeoutMs}ms`;
        child.kill("SIGKILL");
      }, this.timeoutMs);

      // Decode across chunk boundaries so split multi-byte characters survive
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");

      child.stdout.on("data", (data: string) => {
        stdout = appendCapped(stdout, data);
      });

      child.stderr.on("data", (data: string) => {
        stderr = appendCapped(stderr, data);
      });

      child.on("error", error => {
        // Spawn failures (missing binary, permissions) have no exit code
        stderr += error.message;
        finish(null);
      });

      child.on("close", code => finish(code));
    });
  }
}

export { FFmpegRuntime };
