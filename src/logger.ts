import { pino, destination, type DestinationStream, type Logger, type LevelWithSilent } from "pino";

export type HarnessLogger = Logger;

export interface LoggerOptions {
  /** Defaults to `CACHEBENCH_LOGGER`; logging is on unless that is "false". */
  enabled?: boolean;
  /** Defaults to `CACHEBENCH_LOG_LEVEL`, then "info". */
  level?: LevelWithSilent;
  /** Defaults to stderr so stdout carries only progress and the comparison table. */
  destination?: DestinationStream;
}

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

export function createLogger(options?: LoggerOptions): HarnessLogger {
  const envLevel = process.env.CACHEBENCH_LOG_LEVEL;
  const level = options?.level ?? (envLevel && isLevel(envLevel) ? envLevel : "info");
  const enabled = options?.enabled ?? process.env.CACHEBENCH_LOGGER !== "false";

  return pino(
    { name: "cachebench", level, enabled },
    options?.destination ?? destination(2),
  );
}
