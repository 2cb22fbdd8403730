import { spawn, type ChildProcess } from "node:child_process";
import { performance } from "node:perf_hooks";
import { StepLaunchError } from "./common/errors.js";
import type { StepCommand } from "./types.js";

export interface StepOptions {
  cwd: string;
  /** Kill the step and report `timedOut` after this many milliseconds. Unbounded when omitted. */
  timeoutMs?: number;
}

export interface StepOutcome {
  /** Null when the process was terminated by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  elapsedMs: number;
  timedOut: boolean;
}

/**
 * Runs one external build or run step to completion. Implementations resolve
 * with the outcome whatever the exit status, and reject with
 * {@link StepLaunchError} only when the command could not be started.
 */
export interface StepRunner {
  run(step: StepCommand, options: StepOptions): Promise<StepOutcome>;
}

export function stepSucceeded(outcome: StepOutcome): boolean {
  return !outcome.timedOut && outcome.exitCode === 0;
}

export function formatStep(step: StepCommand): string {
  return [step.command, ...step.args].join(" ");
}

/**
 * Kills the step's whole process group, so that grandchildren such as the
 * program under `cargo run` die with it. Falls back to the direct child where
 * there is no group to signal.
 */
function killProcessTree(child: ChildProcess): void {
  if (child.pid !== undefined && process.platform !== "win32") {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch (err) {
      // ESRCH: the group is already gone; anything else falls through to the direct kill.
      if (err instanceof Error && "code" in err && err.code === "ESRCH") return;
    }
  }
  child.kill("SIGKILL");
}

export class ChildProcessStepRunner implements StepRunner {
  run(step: StepCommand, options: StepOptions): Promise<StepOutcome> {
    return new Promise((resolve, reject) => {
      const start = performance.now();
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;
      let exited: { code: number | null; signal: NodeJS.Signals | null } | undefined;
      let timer: NodeJS.Timeout | undefined;

      const child = spawn(step.command, step.args, {
        cwd: options.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        // Own process group, killed as a whole on timeout.
        detached: true,
      });

      const finish = (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdout).toString("utf-8"),
          stderr: Buffer.concat(stderr).toString("utf-8"),
          elapsedMs: performance.now() - start,
          timedOut,
        });
      };

      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      if (options.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          // Orphans may still hold the pipes open; stop waiting on them.
          child.stdout?.destroy();
          child.stderr?.destroy();
          if (exited) finish(exited.code, exited.signal);
          killProcessTree(child);
        }, options.timeoutMs);
      }

      child.once("error", (err) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        reject(new StepLaunchError(step.command, err));
      });

      child.once("exit", (code, signal) => {
        exited = { code, signal };
        if (timedOut) finish(code, signal);
      });

      child.once("close", (code, signal) => finish(code, signal));
    });
  }
}
