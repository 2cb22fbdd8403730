/** Metrics scraped from a variant's console output. Values are in seconds. */
export type TimingMetricName =
  | "cache_loading"
  | "cache_saving"
  | "raw_reading"
  | "total_preparation";

/** Every metric a run can report, in display order. */
export type MetricName = TimingMetricName | "total_execution" | "cache_size_mb";

/** The two compared program variants. */
export type VersionLabel = "original" | "optimized";

/** Metric values for one labeled run. Absent keys were not reported. */
export type RunResult = Readonly<Partial<Record<MetricName, number>>>;

/** What gets written to disk at the end of every invocation. */
export type ComparisonRecord = Record<VersionLabel, RunResult>;

export interface StepCommand {
  command: string;
  args: string[];
}

/** Where a variant lives and how to build and run it. */
export interface VersionDefinition {
  label: VersionLabel;
  directory: string;
  cacheDirectory: string;
  build: StepCommand;
  run: StepCommand;
}

/** One row of the comparison table. */
export interface ComparisonRow {
  metric: MetricName;
  displayName: string;
  original?: number;
  optimized?: number;
  /** original / optimized, present only when both sides are strictly positive. */
  ratio?: number;
  verdict: "faster" | "smaller";
}
