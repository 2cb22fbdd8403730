import { resolve } from "node:path";
import { bytesToMegabytes, clearDirectory, directoryExists, measureDirectoryBytes } from "./cacheDirectory.js";
import { StepLaunchError } from "./common/errors.js";
import { compareResults, formatComparisonTable } from "./compare.js";
import type { HarnessConfig } from "./config.js";
import { createLogger, type HarnessLogger } from "./logger.js";
import { TIMING_METRICS, parseTimingLines, splitOutputLines } from "./metrics.js";
import { TITLE, writeComparisonRecord, writeMarkdownReport } from "./report.js";
import {
  ChildProcessStepRunner,
  formatStep,
  stepSucceeded,
  type StepOutcome,
  type StepRunner,
} from "./stepRunner.js";
import type {
  ComparisonRecord,
  ComparisonRow,
  MetricName,
  RunResult,
  StepCommand,
  VersionDefinition,
  VersionLabel,
} from "./types.js";

const VERSION_ORDER: readonly VersionLabel[] = ["original", "optimized"];
const LABEL_TITLES: Record<VersionLabel, string> = { original: "Original", optimized: "Optimized" };

/** Where progress, failure dumps and the table are printed. */
export type ConsoleOutput = Pick<Console, "log" | "error">;

export interface ComparisonDriverOptions {
  config: HarnessConfig;
  /** Directory the version, cache and output paths are resolved against. Defaults to `process.cwd()`. */
  cwd?: string;
  runner?: StepRunner;
  logger?: HarnessLogger;
  output?: ConsoleOutput;
}

export interface ComparisonOutcome {
  results: ComparisonRecord;
  /** Present only when both labels produced results and the table was printed. */
  rows?: ComparisonRow[];
  outputPath: string;
}

type StepKind = "build" | "run";

const STEP_TITLES: Record<StepKind, string> = { build: "Build", run: "Execution" };

export class ComparisonDriver {
  readonly config: HarnessConfig;
  /** Results of the current (or last) comparison; reset when a comparison starts. */
  results: Record<VersionLabel, RunResult> = { original: {}, optimized: {} };

  private readonly cwd: string;
  private readonly runner: StepRunner;
  private readonly logger: HarnessLogger;
  private readonly output: ConsoleOutput;

  constructor(options: ComparisonDriverOptions) {
    this.config = options.config;
    this.cwd = options.cwd ?? process.cwd();
    this.runner = options.runner ?? new ChildProcessStepRunner();
    this.logger = options.logger ?? createLogger();
    this.output = options.output ?? console;
  }

  resolvePath(path: string): string {
    return resolve(this.cwd, path);
  }

  /** Removes each version's cache directory. Missing directories are not an error. */
  async clearCaches(): Promise<void> {
    this.output.log("Clearing caches...");
    for (const label of VERSION_ORDER) {
      const cacheDirectory = this.resolvePath(this.config.versions[label].cacheDirectory);
      if (await clearDirectory(cacheDirectory)) {
        this.output.log(`  - ${LABEL_TITLES[label]} cache cleared`);
        this.logger.debug({ label, cacheDirectory }, "cache directory removed");
      }
    }
  }

  private async runStep(
    version: VersionDefinition,
    kind: StepKind,
    step: StepCommand,
    timeoutMs?: number,
  ): Promise<StepOutcome | undefined> {
    const cwd = this.resolvePath(version.directory);
    this.logger.debug({ label: version.label, kind, command: formatStep(step), cwd, timeoutMs }, "starting step");

    let outcome: StepOutcome;
    try {
      outcome = await this.runner.run(step, { cwd, timeoutMs });
    } catch (err) {
      if (!(err instanceof StepLaunchError)) throw err;
      this.output.error(`${STEP_TITLES[kind]} failed for ${version.label}:`);
      this.output.error(err.message);
      this.logger.error({ label: version.label, kind, command: err.command, err }, "step could not be launched");
      return undefined;
    }

    if (stepSucceeded(outcome)) return outcome;

    if (outcome.timedOut) {
      this.output.error(`${STEP_TITLES[kind]} timed out for ${version.label} after ${(timeoutMs ?? 0) / 1000}s:`);
    } else {
      this.output.error(`${STEP_TITLES[kind]} failed for ${version.label}:`);
    }
    this.output.error(outcome.stderr);
    this.logger.error(
      { label: version.label, kind, exitCode: outcome.exitCode, signal: outcome.signal, timedOut: outcome.timedOut },
      "step failed",
    );
    return undefined;
  }

  /**
   * Builds and runs one version, then scrapes its timings and measures its
   * cache. Resolves undefined when either step fails; metric lines that do not
   * parse only produce warnings.
   */
  async runVersion(version: VersionDefinition): Promise<RunResult | undefined> {
    const { label } = version;
    this.output.log(`\nRunning ${label} version...`);
    this.output.log("=".repeat(50));

    this.output.log(`Building ${label}...`);
    const build = await this.runStep(version, "build", version.build);
    if (!build) return undefined;

    const run = await this.runStep(version, "run", version.run, this.config.timeoutSeconds * 1000);
    if (!run) return undefined;

    const { metrics, skipped } = parseTimingLines(splitOutputLines(run.stdout));
    for (const { metric, line, token } of skipped) {
      this.logger.warn({ label, metric, line, token }, "metric line could not be parsed, metric skipped");
    }
    for (const metric of TIMING_METRICS) {
      if (metrics[metric] === undefined && !skipped.some((s) => s.metric === metric)) {
        this.logger.warn({ label, metric }, "metric not reported by run");
      }
    }

    const result: Partial<Record<MetricName, number>> = {
      ...metrics,
      total_execution: run.elapsedMs / 1000,
    };

    const cacheDirectory = this.resolvePath(version.cacheDirectory);
    try {
      const cacheBytes = await measureDirectoryBytes(cacheDirectory);
      if (cacheBytes !== undefined) {
        result.cache_size_mb = bytesToMegabytes(cacheBytes);
      }
    } catch (err) {
      this.logger.warn({ label, cacheDirectory, err }, "cache directory could not be measured, cache size skipped");
    }

    this.logger.info({ label, result }, "run completed");
    return result;
  }

  /** Prints the comparison table for the results gathered so far and returns its rows. */
  compareResults(): ComparisonRow[] {
    const rows = compareResults(this.results.original, this.results.optimized);

    this.output.log("\n" + "=".repeat(60));
    this.output.log(TITLE);
    this.output.log("=".repeat(60));
    this.output.log("");
    for (const line of formatComparisonTable(rows)) {
      this.output.log(line);
    }
    return rows;
  }

  /**
   * Clear → original → clear → optimized → compare → persist. A failure of one
   * version never stops the sequence; the record is written every time.
   */
  async runComparison(clearCachesFirst: boolean = this.config.clearCaches): Promise<ComparisonOutcome> {
    this.results = { original: {}, optimized: {} };
    this.output.log("Starting Performance Comparison");
    this.output.log("=".repeat(60));

    for (const label of VERSION_ORDER) {
      if (clearCachesFirst) {
        await this.clearCaches();
      }

      const version = this.config.versions[label];
      if (!(await directoryExists(this.resolvePath(version.directory)))) {
        this.output.log(`Warning: ${label} version directory not found: ${version.directory}`);
        this.logger.warn({ label, directory: version.directory }, "version directory not found, skipping");
        continue;
      }

      const result = await this.runVersion(version);
      if (result) {
        this.results[label] = result;
      }
    }

    let rows: ComparisonRow[] | undefined;
    if (Object.keys(this.results.original).length > 0 && Object.keys(this.results.optimized).length > 0) {
      rows = this.compareResults();
    }

    const outputPath = this.resolvePath(this.config.outputFile);
    writeComparisonRecord(outputPath, this.results);
    this.output.log(`\nDetailed results saved to: ${this.config.outputFile}`);

    if (this.config.markdownFile) {
      writeMarkdownReport(
        this.resolvePath(this.config.markdownFile),
        rows ?? compareResults(this.results.original, this.results.optimized),
      );
      this.output.log(`Markdown report saved to: ${this.config.markdownFile}`);
    }

    const outcome: ComparisonOutcome = { results: this.results, outputPath };
    if (rows) outcome.rows = rows;
    return outcome;
  }
}
