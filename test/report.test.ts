import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { compareResults } from "../src/compare.js";
import { renderMarkdownReport, writeComparisonRecord } from "../src/report.js";

const context = {
  generatedAt: new Date("2026-01-02T03:04:05.000Z"),
  nodeVersion: "v20.11.0",
  platform: "linux",
};

describe("renderMarkdownReport", () => {
  it("renders a heading and one table row per metric", () => {
    const rows = compareResults(
      { cache_loading: 12.5, cache_size_mb: 300 },
      { cache_loading: 2.5, cache_size_mb: 100 },
    );

    expect(renderMarkdownReport(rows, context)).toBe(
      [
        "# Performance Comparison\n",
        "Generated: 2026-01-02T03:04:05.000Z\n",
        "Node: v20.11.0 | Platform: linux\n",
        "| Metric | Original | Optimized | Speedup |",
        "|--------|----------|-----------|---------|",
        "| Cache Loading | 12.500 | 2.500 | 5.00x faster |",
        "| Cache Size (MB) | 300.000 | 100.000 | 3.00x smaller |",
      ].join("\n"),
    );
  });

  it("says so when there is nothing to compare", () => {
    expect(renderMarkdownReport([], context).endsWith("No metrics were collected.")).toBe(true);
  });
});

describe("writeComparisonRecord", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) rmSync(tmpDir, { recursive: true, force: true });
  });

  it("overwrites the file with two-space indented JSON", () => {
    tmpDir = mkdtempSync(join(tmpdir(), "cachebench-report-"));
    const path = join(tmpDir, "nested", "performance_comparison.json");
    writeComparisonRecord(path, { original: { cache_loading: 1 }, optimized: {} });
    writeComparisonRecord(path, { original: {}, optimized: { total_execution: 2 } });

    expect(readFileSync(path, "utf-8")).toBe(
      '{\n  "original": {},\n  "optimized": {\n    "total_execution": 2\n  }\n}',
    );
  });

  it("replaces an existing unrelated file", () => {
    tmpDir = mkdtempSync(join(tmpdir(), "cachebench-report-"));
    const path = join(tmpDir, "out.json");
    writeFileSync(path, "stale content that is longer than the new record");
    writeComparisonRecord(path, { original: {}, optimized: {} });

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({ original: {}, optimized: {} });
  });
});
