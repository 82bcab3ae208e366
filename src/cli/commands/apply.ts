/**
 * orcasync apply - Overwrite the local OrcaSlicer scope with the mirror
 *
 * Destructive: there is no conflict check, local edits to mirrored
 * files are replaced, and --prune deletes local files the mirror lacks.
 */

import { apply } from "../sync/operations.js";
import { openContext, reportError, warn, type RepoOptions } from "../shared.js";

export type ApplyOptions = RepoOptions & {
  prune?: boolean;
  dryRun?: boolean;
};

export async function applyCommand(options: ApplyOptions): Promise<void> {
  try {
    const ctx = await openContext(options);

    if (options.dryRun) {
      console.log("(dry run - no changes will be made)");
    } else {
      warn("apply overwrites local profiles with the mirror copy; unpushed local edits are lost");
    }

    const result = await apply(ctx, {
      prune: options.prune,
      dryRun: options.dryRun,
    });

    const verb = result.dryRun ? "Would write" : "Wrote";
    console.log(`${verb} ${result.copied.length} file(s) into the local scope`);
    for (const file of result.overwritten) {
      console.log(`  ~ ${file}`);
    }

    if (result.removed.length > 0) {
      console.log(`${result.dryRun ? "Would prune" : "Pruned"} ${result.removed.length} local file(s) missing from the mirror:`);
      for (const file of result.removed) {
        console.log(`  - ${file}`);
      }
    }

    if (result.baselineUpdated) {
      console.log("Sync baseline updated.");
    }
  } catch (error) {
    reportError(error);
  }
}
