import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CommandResult, CommandRunner, FFmpegOperation } from "./types.js";

export interface RecordedCall {
  args: string[];
  operation: FFmpegOperation;
}

export interface SimulatedFailure {
  exitCode: number | null;
  stderr: string;
  timedOut?: boolean;
  /** Leave a half-written output behind, as ffmpeg does when it dies mid-write */
  partialOutput?: boolean;
}

export interface FakeFfmpegOptions {
  fail?: (call: RecordedCall, callIndex: number) => SimulatedFailure | undefined;
  delayMs?: (call: RecordedCall) => number;
  onCall?: (call: RecordedCall) => Promise<void> | void;
}

function argAfter(args: string[], flag: string): string {
  const i = args.indexOf(flag);
  if (i < 0 || i + 1 >= args.length) throw new Error(`missing ${flag} in ${args.join(" ")}`);
  return args[i + 1];
}

/**
 * In-process stand-in for ffmpeg. Extraction writes a small text "clip"
 * describing the requested range; concat joins the files named in the
 * manifest, so tests can read the merged output back.
 */
export class FakeFfmpeg implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  /** Manifest text as seen by each concat call */
  readonly manifests: string[] = [];
  private inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly options: FakeFfmpegOptions = {}) {}

  async run(args: string[], operation: FFmpegOperation): Promise<CommandResult> {
    const call = { args: [...args], operation };
    const callIndex = this.calls.push(call) - 1;
    const output = args[args.length - 1];

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await this.options.onCall?.(call);
      const delay = this.options.delayMs?.(call) ?? 0;
      if (delay > 0) await new Promise(resolve => setTimeout(resolve, delay));

      const failure = this.options.fail?.(call, callIndex);
      if (failure) {
        if (failure.partialOutput) await fs.writeFile(output, "partial");
        return {
          exitCode: failure.exitCode,
          stdout: "",
          stderr: failure.stderr,
          duration: delay,
          timedOut: failure.timedOut ?? false,
        };
      }

      if (operation === "ClipExtraction") {
        const start = argAfter(args, "-ss");
        const duration = argAfter(args, "-t");
        await fs.writeFile(output, `clip ${start}+${duration}\n`);
      } else if (operation === "ConcatMerge") {
        const manifest = await fs.readFile(argAfter(args, "-i"), "utf-8");
        this.manifests.push(manifest);
        const parts: string[] = [];
        for (const line of manifest.split("\n").filter(Boolean)) {
          const match = /^file '(.*)'$/.exec(line);
          if (!match) throw new Error(`bad manifest line: ${line}`);
          parts.push(await fs.readFile(match[1], "utf-8"));
        }
        await fs.writeFile(output, parts.join(""));
      }

      return { exitCode: 0, stdout: "", stderr: "", duration: delay, timedOut: false };
    } finally {
      this.inFlight--;
    }
  }

  get operations(): FFmpegOperation[] {
    return this.calls.map(call => call.operation);
  }
}

export async function makeTempDir(prefix = "highlight-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 });
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
