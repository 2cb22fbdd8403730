import type { MetricName, TimingMetricName } from "./types.js";

/**
 * Lowercase substrings identifying the console line that carries each scraped
 * metric. Order matters: the first marker found in a line claims it.
 */
export const TIMING_MARKERS: ReadonlyArray<readonly [string, TimingMetricName]> = [
  ["cache loading time", "cache_loading"],
  ["cache saving time", "cache_saving"],
  ["raw data reading time", "raw_reading"],
  ["total data preparation time", "total_preparation"],
];

export const TIMING_METRICS: readonly TimingMetricName[] = TIMING_MARKERS.map(([, metric]) => metric);

/** All metrics in table order, with their display names. */
export const METRICS: ReadonlyArray<readonly [MetricName, string]> = [
  ["cache_loading", "Cache Loading"],
  ["cache_saving", "Cache Saving"],
  ["raw_reading", "Raw Data Reading"],
  ["total_preparation", "Total Preparation"],
  ["total_execution", "Total Execution"],
  ["cache_size_mb", "Cache Size (MB)"],
];

/** A marker line whose value could not be read as a number. */
export interface SkippedMetricLine {
  metric: TimingMetricName;
  line: string;
  token: string;
}

export interface ParsedTimings {
  metrics: Partial<Record<TimingMetricName, number>>;
  skipped: SkippedMetricLine[];
}

/**
 * Takes the text after the last colon and returns its first
 * whitespace-delimited token. Lines without a colon yield their own first token.
 */
export function extractValueToken(line: string): string {
  const afterColon = line.slice(line.lastIndexOf(":") + 1).trim();
  return afterColon.split(/\s+/)[0] ?? "";
}

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Strict decimal parse: "12.5" and "1e3" pass; "12.5s", "0x10", "abc" and "" do not. */
export function parseMetricValue(token: string): number | undefined {
  if (!DECIMAL_NUMBER.test(token)) return undefined;
  const value = Number(token);
  return Number.isFinite(value) ? value : undefined;
}

export function matchTimingMarker(line: string): TimingMetricName | undefined {
  const lower = line.toLowerCase();
  for (const [marker, metric] of TIMING_MARKERS) {
    if (lower.includes(marker)) return metric;
  }
  return undefined;
}

/**
 * Scrapes timing metrics out of a program's console lines. A later line for
 * the same metric overwrites an earlier one; unparseable values are reported
 * in `skipped` and never throw.
 */
export function parseTimingLines(lines: Iterable<string>): ParsedTimings {
  const metrics: Partial<Record<TimingMetricName, number>> = {};
  const skipped: SkippedMetricLine[] = [];

  for (const line of lines) {
    const metric = matchTimingMarker(line);
    if (!metric) continue;

    const token = extractValueToken(line);
    const value = parseMetricValue(token);
    if (value === undefined) {
      skipped.push({ metric, line, token });
      continue;
    }
    metrics[metric] = value;
  }

  return { metrics, skipped };
}

export function splitOutputLines(output: string): string[] {
  return output.split(/\r?\n/);
}
