/**
 * orcasync push/pull - Publish local edits, fetch remote ones
 */

import { DEFAULT_COMMIT_MESSAGE, push, pull } from "../sync/operations.js";
import { openContext, reportError, type RepoOptions } from "../shared.js";
import { formatStatus } from "./status.js";

export type PushOptions = RepoOptions & {
  message?: string;
  dryRun?: boolean;
};

export type PullOptions = RepoOptions;

/**
 * Copy local changes into the mirror, then commit and push
 */
export async function pushCommand(options: PushOptions): Promise<void> {
  try {
    const ctx = await openContext(options);

    if (options.dryRun) {
      console.log("(dry run - no changes will be made)");
    }

    const result = await push(ctx, {
      message: options.message,
      dryRun: options.dryRun,
    });

    const verb = result.dryRun ? "Would copy" : "Copied";
    if (result.copied.length > 0) {
      console.log(`${verb} ${result.copied.length} file(s) to the mirror:`);
      for (const file of result.copied) {
        console.log(`  + ${file}`);
      }
    }

    if (result.removed.length > 0) {
      console.log(`${result.dryRun ? "Would remove" : "Removed"} ${result.removed.length} file(s) from the mirror:`);
      for (const file of result.removed) {
        console.log(`  - ${file}`);
      }
    }

    if (result.incoming.length > 0) {
      console.log(`\nLeft ${result.incoming.length} mirror-side change(s) untouched; run 'orcasync apply' to bring them in`);
    }

    if (result.copied.length === 0 && result.removed.length === 0) {
      console.log("Nothing to copy - mirror already has your local changes");
    }

    if (result.commit) {
      if (result.commit.committed) {
        console.log(`Committed: ${options.message || DEFAULT_COMMIT_MESSAGE}`);
      } else {
        console.log("No git changes to commit.");
      }
      if (result.commit.pushed) {
        console.log("Pushed to remote.");
      }
    }

    if (result.baselineUpdated) {
      console.log("Sync baseline updated.");
    }
  } catch (error) {
    reportError(error);
  }
}

/**
 * Update the mirror from the remote (git pull --rebase); local files are untouched
 */
export async function pullCommand(options: PullOptions): Promise<void> {
  try {
    const ctx = await openContext(options);
    const result = await pull(ctx);

    console.log("Mirror updated from remote.\n");
    for (const line of formatStatus(result.status)) {
      console.log(line);
    }

    const incoming = result.status.summary["mirror-changed"] + result.status.changes.filter(
      (change) => change.kind === "added" && change.side === "mirror"
    ).length;
    if (incoming > 0) {
      console.log(`\nRun 'orcasync apply' to copy ${incoming} mirror change(s) into OrcaSlicer.`);
    }
  } catch (error) {
    reportError(error);
  }
}
