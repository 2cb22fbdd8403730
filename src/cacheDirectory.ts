import { readdir, rm, stat } from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import { join } from "node:path";

const BYTES_PER_MEGABYTE = 1024 * 1024;

export interface CacheDirectorySummary {
  files: number;
  bytes: number;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function statIfPresent(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (err) {
    if (isMissing(err)) return undefined;
    throw err;
  }
}

async function walk(dir: string, summary: CacheDirectorySummary): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    // Removed while the walk was under way; counts as empty.
    if (isMissing(err)) return;
    throw err;
  }
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(path, summary);
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      // Symlinks count by their target; dangling links and linked directories are skipped.
      const stats = await statIfPresent(path);
      if (!stats?.isFile()) continue;
      summary.files++;
      summary.bytes += stats.size;
    }
  }
}

/** File count and byte total of everything under `dir`, or undefined when it does not exist. */
export async function describeCacheDirectory(dir: string): Promise<CacheDirectorySummary | undefined> {
  const root = await statIfPresent(dir);
  if (!root?.isDirectory()) return undefined;
  const summary: CacheDirectorySummary = { files: 0, bytes: 0 };
  await walk(dir, summary);
  return summary;
}

export async function measureDirectoryBytes(dir: string): Promise<number | undefined> {
  const summary = await describeCacheDirectory(dir);
  return summary?.bytes;
}

export function bytesToMegabytes(bytes: number): number {
  return bytes / BYTES_PER_MEGABYTE;
}

/** Removes `dir` recursively. Returns whether there was anything to remove. */
export async function clearDirectory(dir: string): Promise<boolean> {
  if (!(await statIfPresent(dir))) return false;
  await rm(dir, { recursive: true, force: true });
  return true;
}

export async function directoryExists(dir: string): Promise<boolean> {
  const stats = await statIfPresent(dir);
  return stats?.isDirectory() ?? false;
}
