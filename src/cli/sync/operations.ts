/**
 * Sync operations - status, push, pull, apply, wipe
 *
 * Each operation is single-shot: scan, classify, act, and only then replace
 * the baseline. Any failure before the end leaves the baseline untouched so
 * the next run reclassifies from what is actually on disk.
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

import type { ResolvedConfig } from "../config.js";
import {
  ConfigError,
  ConflictError,
  FilesystemError,
  UsageError,
  VersionControlError,
  errorMessage,
  isSyncError,
} from "../errors.js";
import { scanTree, type Snapshot } from "./snapshot.js";
import {
  createEmptyBaseline,
  loadBaseline,
  saveBaseline,
  settleBaseline,
  type Baseline,
} from "./state.js";
import {
  classifyChanges,
  getConflicts,
  getOutgoing,
  summarizeChanges,
  type ChangeEntry,
  type ChangeSummary,
} from "./conflicts.js";
import { GitVersionControl, type CommitResult, type VersionControl } from "./vcs.js";
import { appendSyncLog, type SyncLogEntry, type SyncOperation } from "./history.js";

export const DEFAULT_COMMIT_MESSAGE = "Sync OrcaSlicer profiles";

/**
 * Everything an operation needs, resolved once per invocation
 */
export type SyncContext = {
  config: ResolvedConfig;
  vcs: VersionControl;
  /** Receives non-fatal problems (e.g. the history file could not be written) */
  warn: (message: string) => void;
  now: () => Date;
};

export function createSyncContext(
  config: ResolvedConfig,
  overrides: Partial<Omit<SyncContext, "config">> = {}
): SyncContext {
  return {
    config,
    vcs: overrides.vcs ?? new GitVersionControl(config.mirrorDir),
    warn: overrides.warn ?? ((message) => process.emitWarning(message)),
    now: overrides.now ?? (() => new Date()),
  };
}

export type StatusResult = {
  changes: ChangeEntry[];
  summary: ChangeSummary;
  conflicts: string[];
};

export type PushResult = {
  dryRun: boolean;
  /** Copied local -> mirror */
  copied: string[];
  /** Deleted from the mirror because they were deleted locally */
  removed: string[];
  /** Mirror-side changes left for `apply` */
  incoming: string[];
  commit: CommitResult | null;
  baselineUpdated: boolean;
};

export type PullResult = {
  status: StatusResult;
};

export type ApplyResult = {
  dryRun: boolean;
  /** Every mirror file written into the local scope */
  copied: string[];
  /** Subset of `copied` whose local content differed */
  overwritten: string[];
  /** Local files deleted by --prune */
  removed: string[];
  baselineUpdated: boolean;
};

export type WipeResult = {
  /** Top-level mirror entries deleted */
  removed: string[];
  baselineReset: boolean;
};

async function scanBoth(
  ctx: SyncContext,
  baseline: Baseline
): Promise<{ local: Snapshot; mirror: Snapshot }> {
  const { config } = ctx;
  const options = {
    exclude: config.exclude,
    reuse: config.trustMtime ? baseline.files : undefined,
  };

  const local = await scanTree(config.scopeDir, config.syncFolders, options);
  const mirror = await scanTree(config.mirrorDir, config.syncFolders, options);
  return { local, mirror };
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Copy a file via a temp file beside the destination, keeping the source mtime
 */
async function copyFileAtomic(src: string, dest: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });

  const tempDest = `${dest}.${crypto.randomBytes(4).toString("hex")}.tmp`;
  try {
    const stat = await fs.stat(src);
    await fs.copyFile(src, tempDest);
    await fs.utimes(tempDest, stat.atime, stat.mtime);
    await fs.rename(tempDest, dest);
  } catch (error) {
    await fs.rm(tempDest, { force: true });
    throw error;
  }
}

/**
 * Delete a file and any parent directories it leaves empty. The sync folder
 * itself (first path segment under `root`) is kept.
 */
async function removeFile(root: string, relPath: string): Promise<void> {
  const target = path.join(root, relPath);
  const folderDir = path.join(root, relPath.split("/")[0]);
  await fs.rm(target, { force: true });

  let parent = path.dirname(target);
  while (parent !== folderDir && parent.startsWith(folderDir + path.sep)) {
    try {
      await fs.rmdir(parent);
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === "ENOTEMPTY" || code === "EEXIST" || code === "ENOENT") break;
      throw error;
    }
    parent = path.dirname(parent);
  }
}

type FileAction = {
  path: string;
  run: () => Promise<void>;
};

/**
 * Run actions in order, stopping at the first failure
 */
async function runBatch(label: string, actions: FileAction[]): Promise<string[]> {
  const completed: string[] = [];

  for (let i = 0; i < actions.length; i++) {
    const action = actions[i];
    try {
      await action.run();
      completed.push(action.path);
    } catch (error) {
      throw new FilesystemError(`${label} failed at ${action.path}: ${errorMessage(error)}`, {
        completed: [...completed],
        failed: action.path,
        pending: actions.slice(i + 1).map((a) => a.path),
        cause: error,
      });
    }
  }

  return completed;
}

async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new FilesystemError(`Cannot create directory: ${errorMessage(error)}`, {
      failed: dirPath,
      cause: error,
    });
  }
}

type HistoryDetails = Omit<SyncLogEntry, "timestamp" | "operation" | "result">;

async function record(
  ctx: SyncContext,
  operation: SyncOperation,
  result: SyncLogEntry["result"],
  details: HistoryDetails
): Promise<void> {
  const warning = await appendSyncLog(ctx.config.historyPath, {
    timestamp: ctx.now().toISOString(),
    operation,
    result,
    ...details,
  });
  if (warning) {
    ctx.warn(warning);
  }
}

/**
 * Run an operation and append its outcome to the sync history
 */
async function tracked<T>(
  ctx: SyncContext,
  operation: SyncOperation,
  run: () => Promise<T>,
  describe: (result: T) => HistoryDetails
): Promise<T> {
  let result: T;
  try {
    result = await run();
  } catch (error) {
    await record(ctx, operation, "failure", {
      error: errorMessage(error),
      conflicts: error instanceof ConflictError ? error.paths : undefined,
    });
    throw error;
  }
  await record(ctx, operation, "success", describe(result));
  return result;
}

/**
 * Call into the version control collaborator, normalizing its failures
 */
async function callVcs<T>(step: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isSyncError(error)) throw error;
    throw new VersionControlError(`${step} failed: ${errorMessage(error)}`);
  }
}

/**
 * Classify local and mirror against the baseline. Read-only.
 */
export async function getStatus(ctx: SyncContext): Promise<StatusResult> {
  const baseline = await loadBaseline(ctx.config.statePath);
  const { local, mirror } = await scanBoth(ctx, baseline);
  const changes = classifyChanges(local, mirror, baseline);

  return {
    changes,
    summary: summarizeChanges(changes),
    conflicts: getConflicts(changes),
  };
}

/**
 * Publish local edits: copy them into the mirror, commit and push, then
 * advance the baseline. Refuses before touching anything if a conflict exists.
 */
export async function push(
  ctx: SyncContext,
  options: { message?: string; dryRun?: boolean } = {}
): Promise<PushResult> {
  const run = async (): Promise<PushResult> => {
    const { config } = ctx;

    if (!(await isDirectory(config.scopeDir))) {
      throw new ConfigError("Local scope directory does not exist", {
        paths: [config.scopeDir],
        hint: "Check local_orca_dir and local_scope_subdir in config.json",
      });
    }

    const baseline = await loadBaseline(config.statePath);
    const { local, mirror } = await scanBoth(ctx, baseline);
    const changes = classifyChanges(local, mirror, baseline);

    const conflicts = getConflicts(changes);
    if (conflicts.length > 0) {
      throw new ConflictError(conflicts);
    }

    const { copy, remove } = getOutgoing(changes);
    const incoming = changes
      .filter((change) => change.side === "mirror")
      .map((change) => change.path);

    if (options.dryRun) {
      return {
        dryRun: true,
        copied: copy,
        removed: remove,
        incoming,
        commit: null,
        baselineUpdated: false,
      };
    }

    await ensureDirectory(config.mirrorDir);
    await runBatch("Push", [
      ...copy.map((relPath) => ({
        path: relPath,
        run: () => copyFileAtomic(path.join(config.scopeDir, relPath), path.join(config.mirrorDir, relPath)),
      })),
      ...remove.map((relPath) => ({
        path: relPath,
        run: () => removeFile(config.mirrorDir, relPath),
      })),
    ]);

    const commit = await callVcs("Commit and push", () =>
      ctx.vcs.commitAndPush(options.message || DEFAULT_COMMIT_MESSAGE)
    );

    const after = await scanBoth(ctx, baseline);
    await saveBaseline(config.statePath, settleBaseline(baseline, after.mirror, after.local, ctx.now()));

    return {
      dryRun: false,
      copied: copy,
      removed: remove,
      incoming,
      commit,
      baselineUpdated: true,
    };
  };

  if (options.dryRun) {
    return run();
  }
  return tracked(ctx, "push", run, (result) => ({
    copied: result.copied.length,
    removed: result.removed.length,
    committed: result.commit?.committed,
  }));
}

/**
 * Bring the mirror up to date from the remote. Never touches the local
 * scope or the baseline; the returned status shows what `apply` would bring in.
 */
export async function pull(ctx: SyncContext): Promise<PullResult> {
  return tracked(
    ctx,
    "pull",
    async () => {
      await ensureDirectory(ctx.config.mirrorDir);
      await callVcs("Pull", () => ctx.vcs.pullRebase());
      return { status: await getStatus(ctx) };
    },
    () => ({})
  );
}

/**
 * Overwrite the local scope with the mirror (mirror wins, no conflict check).
 *
 * Destructive: local edits to any mirrored file are lost, and with `prune`
 * every scanned local file missing from the mirror is deleted.
 */
export async function apply(
  ctx: SyncContext,
  options: { prune?: boolean; dryRun?: boolean } = {}
): Promise<ApplyResult> {
  const run = async (): Promise<ApplyResult> => {
    const { config } = ctx;

    // A missing mirror is "nothing pulled yet", not "delete everything"
    if (!(await isDirectory(config.mirrorDir))) {
      throw new ConfigError("Mirror directory does not exist", {
        paths: [config.mirrorDir],
        hint: "Run 'orcasync pull' (or check repo_mirror_dir in config.json) before applying",
      });
    }

    const baseline = await loadBaseline(config.statePath);
    const { local, mirror } = await scanBoth(ctx, baseline);

    const copy = Object.keys(mirror).sort();
    const overwritten = copy.filter(
      (relPath) => local[relPath] !== undefined && local[relPath].hash !== mirror[relPath].hash
    );
    const remove = options.prune
      ? Object.keys(local)
          .filter((relPath) => mirror[relPath] === undefined)
          .sort()
      : [];

    if (options.dryRun) {
      return { dryRun: true, copied: copy, overwritten, removed: remove, baselineUpdated: false };
    }

    await ensureDirectory(config.scopeDir);
    await runBatch("Apply", [
      ...copy.map((relPath) => ({
        path: relPath,
        run: () => copyFileAtomic(path.join(config.mirrorDir, relPath), path.join(config.scopeDir, relPath)),
      })),
      ...remove.map((relPath) => ({
        path: relPath,
        run: () => removeFile(config.scopeDir, relPath),
      })),
    ]);

    const applied = await scanTree(config.scopeDir, config.syncFolders, { exclude: config.exclude });
    await saveBaseline(config.statePath, settleBaseline(baseline, applied, mirror, ctx.now()));

    return { dryRun: false, copied: copy, overwritten, removed: remove, baselineUpdated: true };
  };

  if (options.dryRun) {
    return run();
  }
  return tracked(ctx, "apply", run, (result) => ({
    copied: result.copied.length,
    removed: result.removed.length,
  }));
}

/**
 * Delete everything in the mirror directory (except `.git`).
 *
 * The baseline is kept as-is unless `resetBaseline` is set; see DESIGN.md.
 */
export async function wipeMirror(
  ctx: SyncContext,
  options: { confirm?: boolean; resetBaseline?: boolean } = {}
): Promise<WipeResult> {
  return tracked(
    ctx,
    "wipe",
    async () => {
      if (!options.confirm) {
        throw new UsageError(
          "Refusing to wipe the mirror without confirmation",
          "Re-run with --yes to delete every file in the mirror directory"
        );
      }

      const { config } = ctx;

      let names: string[];
      try {
        names = await fs.readdir(config.mirrorDir);
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
          throw new FilesystemError(`Cannot read mirror directory: ${errorMessage(error)}`, {
            failed: config.mirrorDir,
            cause: error,
          });
        }
        names = [];
      }

      const targets = names.filter((name) => name !== ".git").sort();
      const removed = await runBatch(
        "Wipe",
        targets.map((name) => ({
          path: name,
          run: () => fs.rm(path.join(config.mirrorDir, name), { recursive: true, force: true }),
        }))
      );

      if (options.resetBaseline) {
        await saveBaseline(config.statePath, { ...createEmptyBaseline(), savedAt: ctx.now().toISOString() });
      }

      return { removed, baselineReset: options.resetBaseline === true };
    },
    (result) => ({ removed: result.removed.length })
  );
}
