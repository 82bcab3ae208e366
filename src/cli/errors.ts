/**
 * Error taxonomy for sync operations
 *
 * Every error carries the paths it affects and a suggested next step so the
 * CLI can print them uniformly and pick an exit code.
 */

export type SyncErrorCode =
  | "conflict"
  | "config"
  | "usage"
  | "filesystem"
  | "version-control";

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly exitCode: number;
  readonly paths: string[];
  readonly hint?: string;

  constructor(
    code: SyncErrorCode,
    exitCode: number,
    message: string,
    options: { paths?: string[]; hint?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    this.paths = options.paths ?? [];
    this.hint = options.hint;
  }
}

/**
 * Push refused because both sides changed the same files
 */
export class ConflictError extends SyncError {
  constructor(paths: string[]) {
    super("conflict", 1, `Push blocked by ${paths.length} conflicting file(s)`, {
      paths,
      hint: "Resolve the conflicts manually, then re-run push",
    });
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, options: { paths?: string[]; hint?: string; cause?: unknown } = {}) {
    super("config", 2, message, options);
  }
}

export class UsageError extends SyncError {
  constructor(message: string, hint?: string) {
    super("usage", 2, message, { hint });
  }
}

/**
 * I/O failure in the middle of a copy batch.
 *
 * `completed` were written before the failure, `failed` is the path that
 * threw, `pending` were never attempted.
 */
export class FilesystemError extends SyncError {
  readonly completed: string[];
  readonly failed: string | undefined;
  readonly pending: string[];

  constructor(
    message: string,
    options: {
      completed?: string[];
      failed?: string;
      pending?: string[];
      hint?: string;
      cause?: unknown;
    } = {}
  ) {
    super("filesystem", 3, message, {
      paths: options.failed ? [options.failed] : [],
      hint: options.hint ?? "Fix the file permissions or disk problem, then re-run the same command",
      cause: options.cause,
    });
    this.completed = options.completed ?? [];
    this.failed = options.failed;
    this.pending = options.pending ?? [];
  }
}

export class VersionControlError extends SyncError {
  readonly output: string;

  constructor(message: string, output = "", hint?: string) {
    super("version-control", 4, message, {
      hint: hint ?? "Fix the git problem (network, credentials, rebase state), then re-run",
    });
    this.output = output;
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
