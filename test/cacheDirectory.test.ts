import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  bytesToMegabytes,
  clearDirectory,
  describeCacheDirectory,
  directoryExists,
  measureDirectoryBytes,
} from "../src/cacheDirectory.js";
import { writeSizedFile } from "./helpers/setup.js";

describe("cache directories", () => {
  let tmpDir: string;
  let cacheDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "cachebench-cache-"));
    cacheDir = join(tmpDir, ".cache");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("sums file sizes across nested directories", async () => {
    writeSizedFile(join(cacheDir, "meta.bin"), 1000);
    writeSizedFile(join(cacheDir, "shards", "ms1_0.bin"), 20);
    writeSizedFile(join(cacheDir, "shards", "deep", "ms2_0.bin"), 4);

    expect(await describeCacheDirectory(cacheDir)).toEqual({ files: 3, bytes: 1024 });
    expect(await measureDirectoryBytes(cacheDir)).toBe(1024);
  });

  it("counts an empty directory as zero bytes", async () => {
    writeSizedFile(join(cacheDir, "empty", "zero.bin"), 0);
    expect(await describeCacheDirectory(cacheDir)).toEqual({ files: 1, bytes: 0 });
  });

  it("returns undefined for a missing directory", async () => {
    expect(await describeCacheDirectory(cacheDir)).toBeUndefined();
    expect(await measureDirectoryBytes(cacheDir)).toBeUndefined();
  });

  it("returns undefined when the path is a file", async () => {
    writeFileSync(cacheDir, "not a directory");
    expect(await describeCacheDirectory(cacheDir)).toBeUndefined();
  });

  it("counts symlinked files by target size and skips dangling links", async () => {
    writeSizedFile(join(cacheDir, "data.bin"), 100);
    symlinkSync(join(cacheDir, "data.bin"), join(cacheDir, "alias.bin"));
    symlinkSync(join(cacheDir, "missing.bin"), join(cacheDir, "dangling.bin"));

    expect(await describeCacheDirectory(cacheDir)).toEqual({ files: 2, bytes: 200 });
  });

  it("rejects when the cache path cannot be resolved", async () => {
    symlinkSync(cacheDir, cacheDir);

    await expect(measureDirectoryBytes(cacheDir)).rejects.toMatchObject({ code: "ELOOP" });
  });

  it("converts bytes to megabytes with 1024 * 1024", () => {
    expect(bytesToMegabytes(3 * 1024 * 1024)).toBe(3);
    expect(bytesToMegabytes(512 * 1024)).toBe(0.5);
  });

  it("clearDirectory removes the tree and is idempotent", async () => {
    writeSizedFile(join(cacheDir, "shards", "a.bin"), 10);

    expect(await clearDirectory(cacheDir)).toBe(true);
    expect(existsSync(cacheDir)).toBe(false);
    expect(await clearDirectory(cacheDir)).toBe(false);
  });

  it("directoryExists is true only for directories", async () => {
    expect(await directoryExists(tmpDir)).toBe(true);
    expect(await directoryExists(cacheDir)).toBe(false);
    writeFileSync(cacheDir, "file");
    expect(await directoryExists(cacheDir)).toBe(false);
  });
});
