export { ComparisonDriver } from "./driver.js";
export type { ComparisonDriverOptions, ComparisonOutcome, ConsoleOutput } from "./driver.js";
export { main, parseCliArgs, USAGE } from "./cli.js";
export type { CliArgs, MainOptions } from "./cli.js";
export {
  DEFAULT_OUTPUT_FILE,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_VERSIONS,
  loadHarnessConfig,
  resolveHarnessConfig,
  validateHarnessConfig,
} from "./config.js";
export type { HarnessConfig, HarnessConfigFile, HarnessConfigOverrides } from "./config.js";
export { parseTimingLines, TIMING_MARKERS, METRICS } from "./metrics.js";
export type { ParsedTimings, SkippedMetricLine } from "./metrics.js";
export { compareResults, formatComparisonTable, formatRatio } from "./compare.js";
export { ChildProcessStepRunner } from "./stepRunner.js";
export type { StepOptions, StepOutcome, StepRunner } from "./stepRunner.js";
export { describeCacheDirectory, measureDirectoryBytes, clearDirectory } from "./cacheDirectory.js";
export { renderMarkdownReport, writeComparisonRecord, writeMarkdownReport } from "./report.js";
export { createLogger } from "./logger.js";
export type { HarnessLogger, LoggerOptions } from "./logger.js";
export { ConfigError, HarnessError, MissingVersionDirectoryError, StepLaunchError } from "./common/errors.js";
export type * from "./types.js";
