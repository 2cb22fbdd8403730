import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { formatRatio } from "./compare.js";
import type { ComparisonRecord, ComparisonRow } from "./types.js";

export const TITLE = "PERFORMANCE COMPARISON RESULTS";

function writeFileCreatingParent(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

/** Overwrites `path` with both labels' raw results, two-space indented. */
export function writeComparisonRecord(path: string, record: ComparisonRecord): void {
  writeFileCreatingParent(path, JSON.stringify(record, null, 2));
}

function cell(value: number | undefined): string {
  return value === undefined ? "N/A" : value.toFixed(3);
}

export interface MarkdownReportContext {
  generatedAt?: Date;
  nodeVersion?: string;
  platform?: string;
}

export function renderMarkdownReport(
  rows: readonly ComparisonRow[],
  context: MarkdownReportContext = {},
): string {
  const lines: string[] = [];
  const generatedAt = context.generatedAt ?? new Date();

  lines.push("# Performance Comparison\n");
  lines.push(`Generated: ${generatedAt.toISOString()}\n`);
  lines.push(`Node: ${context.nodeVersion ?? process.version} | Platform: ${context.platform ?? process.platform}\n`);

  if (rows.length === 0) {
    lines.push("No metrics were collected.");
    return lines.join("\n");
  }

  lines.push("| Metric | Original | Optimized | Speedup |");
  lines.push("|--------|----------|-----------|---------|");
  for (const row of rows) {
    lines.push(`| ${row.displayName} | ${cell(row.original)} | ${cell(row.optimized)} | ${formatRatio(row)} |`);
  }

  return lines.join("\n");
}

export function writeMarkdownReport(
  path: string,
  rows: readonly ComparisonRow[],
  context?: MarkdownReportContext,
): void {
  writeFileCreatingParent(path, renderMarkdownReport(rows, context));
}
