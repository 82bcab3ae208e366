/**
 * Shared CLI utilities
 *
 * Context setup, location printing and error reporting used by every
 * command.
 */

import { loadConfig, resolveRepoRoot, type ResolvedConfig } from "./config.js";
import { FilesystemError, VersionControlError, errorMessage, isSyncError } from "./errors.js";
import { createSyncContext, type SyncContext } from "./sync/operations.js";

/**
 * Options every command accepts
 */
export type RepoOptions = {
  repo?: string;
};

/**
 * Exit with an error message and optional suggestion.
 *
 * All CLI errors should use this for consistent formatting.
 */
export function exitWithError(message: string, suggestion?: string, code = 1): never {
  console.error(`Error: ${message}`);
  if (suggestion) {
    console.error(`  Suggestion: ${suggestion}`);
  }
  process.exit(code);
}

/**
 * Print a warning message (non-fatal).
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`);
}

/**
 * Print a note/informational message.
 */
export function note(message: string): void {
  console.error(`Note: ${message}`);
}

/**
 * Print where every category of data lives
 */
export function printStorageLocations(
  config: ResolvedConfig,
  out: (line: string) => void = console.log
): void {
  out("Storage locations:");
  out(`  Local OrcaSlicer dir:  ${config.localBaseDir}`);
  out(`  Synced scope:          ${config.scopeDir}`);
  out(`  Repo mirror (git):     ${config.mirrorDir}`);
  out(`  Sync baseline:         ${config.statePath}`);
  out(`  Tool config:           ${config.configPath}`);
}

/**
 * Resolve the repo, load (or create) its config, print the locations and
 * build the context for one operation.
 *
 * With `quiet`, locations go to stderr so stdout stays machine-readable.
 */
export async function openContext(
  options: RepoOptions,
  settings: { quiet?: boolean } = {}
): Promise<SyncContext> {
  const repoRoot = resolveRepoRoot(options);
  const { config, created } = await loadConfig(repoRoot);

  if (created) {
    note(`Created default config at ${config.configPath}; review local_orca_dir before pushing`);
  }
  printStorageLocations(config, settings.quiet ? console.error : console.log);
  if (!settings.quiet) {
    console.log();
  }

  return createSyncContext(config, { warn });
}

/**
 * Print a failure with its affected paths and suggested next step, then exit
 */
export function reportError(error: unknown): never {
  if (!isSyncError(error)) {
    exitWithError(errorMessage(error));
  }

  console.error(`Error: ${error.message}`);

  if (error instanceof FilesystemError) {
    if (error.completed.length > 0) {
      console.error(`  Completed (${error.completed.length}):`);
      for (const file of error.completed) {
        console.error(`    + ${file}`);
      }
    }
    if (error.failed) {
      console.error(`  Failed: ${error.failed}`);
    }
    if (error.pending.length > 0) {
      console.error(`  Not attempted (${error.pending.length}):`);
      for (const file of error.pending) {
        console.error(`    - ${file}`);
      }
    }
  } else if (error.paths.length > 0) {
    for (const file of error.paths) {
      console.error(`  ! ${file}`);
    }
  }

  if (error instanceof VersionControlError && error.output) {
    console.error(error.output);
  }

  if (error.hint) {
    console.error(`  Suggestion: ${error.hint}`);
  }
  process.exit(error.exitCode);
}
