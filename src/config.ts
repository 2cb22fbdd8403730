import { readFileSync } from "node:fs";
import * as v from "valibot";
import { ConfigError } from "./common/errors.js";
import type { StepCommand, VersionDefinition, VersionLabel } from "./types.js";

export const DEFAULT_OUTPUT_FILE = "performance_comparison.json";
export const DEFAULT_TIMEOUT_SECONDS = 600;

const DEFAULT_BUILD: StepCommand = { command: "cargo", args: ["build", "--release"] };
const DEFAULT_RUN: StepCommand = { command: "cargo", args: ["run", "--release"] };

export const DEFAULT_VERSIONS: Readonly<Record<VersionLabel, VersionDefinition>> = {
  original: {
    label: "original",
    directory: "original_version",
    cacheDirectory: ".timstof_cache",
    build: DEFAULT_BUILD,
    run: DEFAULT_RUN,
  },
  optimized: {
    label: "optimized",
    directory: "optimized_version",
    cacheDirectory: ".timstof_cache_optimized",
    build: DEFAULT_BUILD,
    run: DEFAULT_RUN,
  },
};

const StepCommandSchema = v.object({
  command: v.pipe(v.string(), v.nonEmpty()),
  args: v.optional(v.array(v.string())),
});

const VersionSchema = v.object({
  directory: v.optional(v.pipe(v.string(), v.nonEmpty())),
  cacheDirectory: v.optional(v.pipe(v.string(), v.nonEmpty())),
  build: v.optional(StepCommandSchema),
  run: v.optional(StepCommandSchema),
});

const HarnessConfigSchema = v.object({
  outputFile: v.optional(v.pipe(v.string(), v.nonEmpty())),
  markdownFile: v.optional(v.pipe(v.string(), v.nonEmpty())),
  timeoutSeconds: v.optional(v.pipe(v.number(), v.minValue(1))),
  clearCaches: v.optional(v.boolean()),
  versions: v.optional(
    v.object({
      original: v.optional(VersionSchema),
      optimized: v.optional(VersionSchema),
    }),
  ),
});

/** Shape of a configuration file, every field optional. */
export type HarnessConfigFile = v.InferOutput<typeof HarnessConfigSchema>;

/** Fully resolved settings for one comparison. */
export interface HarnessConfig {
  outputFile: string;
  markdownFile?: string;
  timeoutSeconds: number;
  clearCaches: boolean;
  versions: Record<VersionLabel, VersionDefinition>;
}

/** Settings coming from the command line; they win over the file and the environment. */
export interface HarnessConfigOverrides {
  outputFile?: string;
  markdownFile?: string;
  timeoutSeconds?: number;
  clearCaches?: boolean;
}

export function validateHarnessConfig(data: unknown): HarnessConfigFile {
  const result = v.safeParse(HarnessConfigSchema, data);
  if (!result.success) {
    const issue = result.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue.message}`, v.getDotPath(issue) ?? undefined);
  }
  return result.output;
}

export function loadHarnessConfig(path: string): HarnessConfigFile {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${path}`, undefined, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, undefined, { cause: err });
  }
  return validateHarnessConfig(data);
}

function parseTimeoutEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 1) {
    throw new ConfigError(`CACHEBENCH_TIMEOUT_SECONDS must be a number of seconds >= 1, got "${raw}"`);
  }
  return value;
}

function resolveVersion(
  label: VersionLabel,
  file: v.InferOutput<typeof VersionSchema> | undefined,
): VersionDefinition {
  const defaults = DEFAULT_VERSIONS[label];
  return {
    label,
    directory: file?.directory ?? defaults.directory,
    cacheDirectory: file?.cacheDirectory ?? defaults.cacheDirectory,
    build: file?.build ? { command: file.build.command, args: file.build.args ?? [] } : defaults.build,
    run: file?.run ? { command: file.run.command, args: file.run.args ?? [] } : defaults.run,
  };
}

/**
 * Merges, lowest precedence first: built-in defaults, the configuration file,
 * environment variables, command-line overrides.
 */
export function resolveHarnessConfig(
  file: HarnessConfigFile = {},
  env: NodeJS.ProcessEnv = process.env,
  overrides: HarnessConfigOverrides = {},
): HarnessConfig {
  const outputFile =
    overrides.outputFile ?? (env.CACHEBENCH_OUTPUT || undefined) ?? file.outputFile ?? DEFAULT_OUTPUT_FILE;
  const timeoutSeconds =
    overrides.timeoutSeconds ??
    parseTimeoutEnv(env.CACHEBENCH_TIMEOUT_SECONDS) ??
    file.timeoutSeconds ??
    DEFAULT_TIMEOUT_SECONDS;

  const config: HarnessConfig = {
    outputFile,
    timeoutSeconds,
    clearCaches: overrides.clearCaches ?? file.clearCaches ?? true,
    versions: {
      original: resolveVersion("original", file.versions?.original),
      optimized: resolveVersion("optimized", file.versions?.optimized),
    },
  };
  const markdownFile = overrides.markdownFile ?? file.markdownFile;
  if (markdownFile !== undefined) config.markdownFile = markdownFile;
  return config;
}
