import { METRICS } from "./metrics.js";
import type { ComparisonRow, RunResult } from "./types.js";

const METRIC_WIDTH = 20;
const VALUE_WIDTH = 15;
const TABLE_WIDTH = 60;
const NOT_AVAILABLE = "N/A";

function positive(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

/**
 * Builds one row per metric that at least one side reported with a strictly
 * positive value. Metrics neither side reported are left out.
 */
export function compareResults(original: RunResult, optimized: RunResult): ComparisonRow[] {
  const rows: ComparisonRow[] = [];

  for (const [metric, displayName] of METRICS) {
    const orig = positive(original[metric]);
    const opt = positive(optimized[metric]);
    if (orig === undefined && opt === undefined) continue;

    const row: ComparisonRow = {
      metric,
      displayName,
      verdict: metric === "cache_size_mb" ? "smaller" : "faster",
    };
    if (orig !== undefined) row.original = orig;
    if (opt !== undefined) row.optimized = opt;
    if (orig !== undefined && opt !== undefined) row.ratio = orig / opt;
    rows.push(row);
  }

  return rows;
}

/** "5.00x faster", "2.50x smaller", or "N/A" when there is no ratio. */
export function formatRatio(row: ComparisonRow): string {
  if (row.ratio === undefined) return NOT_AVAILABLE;
  return `${row.ratio.toFixed(2)}x ${row.verdict}`;
}

function formatValue(value: number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : value.toFixed(3);
}

function formatLine(metric: string, original: string, optimized: string, speedup: string): string {
  return [
    metric.padEnd(METRIC_WIDTH),
    original.padEnd(VALUE_WIDTH),
    optimized.padEnd(VALUE_WIDTH),
    speedup,
  ]
    .join(" ")
    .trimEnd();
}

/** Fixed-width table lines: header, separator, then one line per row. */
export function formatComparisonTable(rows: readonly ComparisonRow[]): string[] {
  const lines = [
    formatLine("Metric", "Original", "Optimized", "Speedup"),
    "-".repeat(TABLE_WIDTH),
  ];
  for (const row of rows) {
    lines.push(
      formatLine(row.displayName, formatValue(row.original), formatValue(row.optimized), formatRatio(row)),
    );
  }
  return lines;
}
