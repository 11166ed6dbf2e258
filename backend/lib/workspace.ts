import fs from "node:fs/promises";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";

export function runDirName(runId: string) {
  return `run-${runId}`;
}

/**
 * Create a fresh, uniquely named working directory under `root`.
 * Fails if the directory somehow already exists.
 */
export async function createRunWorkDir(root: string, runId: string = uuidv4()): Promise<string> {
  await fs.mkdir(root, { recursive: true });
  const dir = path.join(root, runDirName(runId));
  await fs.mkdir(dir);
  return dir;
}

/**
 * Remove a directory the pipeline created, only when nothing is left in it.
 * Returns false (and keeps the directory) otherwise.
 */
export async function removeIfEmpty(dir: string): Promise<boolean> {
  const entries = await fs.readdir(dir);
  if (entries.length > 0) return false;
  await fs.rmdir(dir);
  return true;
}

export async function ensureDirForFile(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * True when `filePath` is `dir` itself or anything below it.
 */
export function isWithin(dir: string, filePath: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(filePath));
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}
