import { resolve } from "node:path";
import { bytesToMegabytes, describeCacheDirectory, directoryExists } from "./cacheDirectory.js";
import { ConfigError, HarnessError, MissingVersionDirectoryError } from "./common/errors.js";
import {
  loadHarnessConfig,
  resolveHarnessConfig,
  type HarnessConfig,
  type HarnessConfigFile,
  type HarnessConfigOverrides,
} from "./config.js";
import { ComparisonDriver, type ConsoleOutput } from "./driver.js";
import { createLogger, type HarnessLogger } from "./logger.js";
import type { StepRunner } from "./stepRunner.js";

export const USAGE = [
  "Usage: cachebench [options]",
  "  --no-clear           Don't clear caches before running (use existing caches)",
  "  --config <path>      JSON configuration file (default: $CACHEBENCH_CONFIG)",
  "  --output <path>      Where to write the JSON results (default: performance_comparison.json)",
  "  --markdown <path>    Also write a Markdown report",
  "  --timeout <seconds>  Upper bound for each run step (default: 600)",
  "  --cache-info         Print the size of each cache directory and exit",
  "  -h, --help           Show this help and exit",
].join("\n");

export interface CliArgs {
  help: boolean;
  cacheInfo: boolean;
  clearCaches: boolean;
  configPath?: string;
  outputFile?: string;
  markdownFile?: string;
  timeoutSeconds?: number;
}

function valueOf(args: readonly string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

/** Unrecognized arguments are ignored. */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = {
    help: args.includes("--help") || args.includes("-h"),
    cacheInfo: args.includes("--cache-info"),
    clearCaches: !args.includes("--no-clear"),
  };
  if (parsed.help) return parsed;

  const configPath = valueOf(args, "--config");
  if (configPath !== undefined) parsed.configPath = configPath;
  const outputFile = valueOf(args, "--output");
  if (outputFile !== undefined) parsed.outputFile = outputFile;
  const markdownFile = valueOf(args, "--markdown");
  if (markdownFile !== undefined) parsed.markdownFile = markdownFile;

  const timeout = valueOf(args, "--timeout");
  if (timeout !== undefined) {
    const seconds = Number(timeout);
    if (!Number.isFinite(seconds) || seconds < 1) {
      throw new ConfigError(`--timeout must be a number of seconds >= 1, got "${timeout}"`);
    }
    parsed.timeoutSeconds = seconds;
  }
  return parsed;
}

export interface MainOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runner?: StepRunner;
  logger?: HarnessLogger;
  output?: ConsoleOutput;
}

function toOverrides(args: CliArgs): HarnessConfigOverrides {
  const overrides: HarnessConfigOverrides = {};
  // Only an explicit --no-clear overrides the file's clearCaches.
  if (!args.clearCaches) overrides.clearCaches = false;
  if (args.outputFile !== undefined) overrides.outputFile = args.outputFile;
  if (args.markdownFile !== undefined) overrides.markdownFile = args.markdownFile;
  if (args.timeoutSeconds !== undefined) overrides.timeoutSeconds = args.timeoutSeconds;
  return overrides;
}

function buildConfig(args: CliArgs, cwd: string, env: NodeJS.ProcessEnv): HarnessConfig {
  const configPath = args.configPath ?? (env.CACHEBENCH_CONFIG || undefined);
  const file: HarnessConfigFile = configPath ? loadHarnessConfig(resolve(cwd, configPath)) : {};
  return resolveHarnessConfig(file, env, toOverrides(args));
}

async function printCacheInfo(config: HarnessConfig, cwd: string, output: ConsoleOutput): Promise<void> {
  output.log("Cache directories:");
  for (const version of Object.values(config.versions)) {
    const summary = await describeCacheDirectory(resolve(cwd, version.cacheDirectory));
    if (!summary) {
      output.log(`  - ${version.label}: ${version.cacheDirectory} (absent)`);
      continue;
    }
    output.log(
      `  - ${version.label}: ${version.cacheDirectory} (${summary.files} files, ${bytesToMegabytes(summary.bytes).toFixed(2)} MB)`,
    );
  }
}

/** Runs the command line and resolves with the process exit code. */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const output = options.output ?? console;

  let args: CliArgs;
  let config: HarnessConfig;
  try {
    args = parseCliArgs(argv);
    if (args.help) {
      output.log(USAGE);
      return 0;
    }
    config = buildConfig(args, cwd, env);
  } catch (err) {
    if (!(err instanceof HarnessError)) throw err;
    output.error(`Error: ${err.message}`);
    return 1;
  }

  if (args.cacheInfo) {
    await printCacheInfo(config, cwd, output);
    return 0;
  }

  const logger = options.logger ?? createLogger();
  for (const version of Object.values(config.versions)) {
    if (!(await directoryExists(resolve(cwd, version.directory)))) {
      const err = new MissingVersionDirectoryError(version.directory, cwd);
      output.error(`Error: ${err.message}`);
      output.error("This command must be run from the directory holding both versions.");
      logger.error({ code: err.code, directory: err.directory, cwd }, "version directory missing");
      return 1;
    }
  }

  const driver = new ComparisonDriver({
    config,
    cwd,
    runner: options.runner,
    logger,
    output,
  });
  await driver.runComparison(config.clearCaches);
  return 0;
}
