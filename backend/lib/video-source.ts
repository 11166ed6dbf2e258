import fs from "node:fs/promises";
import path from "node:path";
import { SourceVideoError } from "./errors.js";
import { isFile } from "./workspace.js";

export const VIDEO_EXTENSIONS = [".mp4", ".avi", ".mov", ".mkv", ".flv", ".wmv", ".webm"] as const;

/**
 * Retrieval collaborator: resolves a video id to a local file path.
 * Implementations do not retry.
 */
export interface VideoSource {
  fetch(videoId: string, destDir: string): Promise<string>;
}

/**
 * Resolves ids against a directory of already downloaded videos.
 *
 * An optional `extensions.json` in the directory maps ids to their file
 * extension (`{ "abc123": ".mkv" }`); otherwise known video extensions are
 * tried in order.
 */
export class LocalVideoLibrary implements VideoSource {
  constructor(private readonly directory: string) {}

  private async extensionMap(): Promise<Record<string, string>> {
    const mapPath = path.join(this.directory, "extensions.json");
    if (!(await isFile(mapPath))) return {};
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(mapPath, "utf-8"));
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error("expected an object of id to extension");
      }
      const map: Record<string, string> = {};
      for (const [id, ext] of Object.entries(parsed)) {
        if (typeof ext === "string") map[id] = ext.startsWith(".") ? ext : `.${ext}`;
      }
      return map;
    } catch (error) {
      throw new SourceVideoError(
        `Invalid extension map ${mapPath}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  /**
   * `destDir` is unused: files are already local and are returned in place.
   */
  async fetch(videoId: string, _destDir?: string): Promise<string> {
    if (!/^[A-Za-z0-9_-]+$/.test(videoId)) {
      throw new SourceVideoError(`Invalid video id "${videoId}"`);
    }

    const mapped = (await this.extensionMap())[videoId];
    const candidates = mapped ? [mapped] : [...VIDEO_EXTENSIONS];
    for (const ext of candidates) {
      const candidate = path.resolve(this.directory, `${videoId}${ext}`);
      if (await isFile(candidate)) return candidate;
    }

    throw new SourceVideoError(
      `Video "${videoId}" not found in ${this.directory} (tried ${candidates.join(", ")})`
    );
  }

  /**
   * Map of file name to absolute path for every video in the library
   */
  async list(): Promise<Record<string, string>> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return {};
      throw error;
    }

    const videos: Record<string, string> = {};
    for (const name of entries.sort()) {
      const ext = path.extname(name).toLowerCase();
      if (VIDEO_EXTENSIONS.some(known => known === ext)) {
        videos[name] = path.resolve(this.directory, name);
      }
    }
    return videos;
  }
}

/**
 * Precondition for a run: the source must be an existing regular file.
 */
export async function assertSourceVideo(sourceVideoPath: string): Promise<string> {
  const resolved = path.resolve(sourceVideoPath);
  if (!(await isFile(resolved))) {
    throw new SourceVideoError(`Source video not found or not a file: ${resolved}`);
  }
  return resolved;
}
