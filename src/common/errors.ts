export class HarnessError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HarnessError";
    this.code = code;
  }
}

export class ConfigError extends HarnessError {
  /** Dotted path of the offending field, when valibot reported one. */
  readonly path?: string;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super("InvalidConfig", message, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

export class MissingVersionDirectoryError extends HarnessError {
  readonly directory: string;

  constructor(directory: string, cwd: string) {
    super(
      "MissingVersionDirectory",
      `Version directory not found: ${directory} (current directory: ${cwd})`,
    );
    this.name = "MissingVersionDirectoryError";
    this.directory = directory;
  }
}

/** The step's command could not be started at all (ENOENT, EACCES, ...). */
export class StepLaunchError extends HarnessError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("StepLaunchFailed", `Failed to launch "${command}": ${reason}`, { cause });
    this.name = "StepLaunchError";
    this.command = command;
  }
}
