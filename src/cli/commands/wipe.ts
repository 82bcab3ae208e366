/**
 * orcasync wipe-profiles - Empty the mirror directory
 */

import { wipeMirror } from "../sync/operations.js";
import { note, openContext, reportError, type RepoOptions } from "../shared.js";

export type WipeOptions = RepoOptions & {
  yes?: boolean;
  resetBaseline?: boolean;
};

export async function wipeCommand(options: WipeOptions): Promise<void> {
  try {
    const ctx = await openContext(options);
    const result = await wipeMirror(ctx, {
      confirm: options.yes,
      resetBaseline: options.resetBaseline,
    });

    console.log(`Removed ${result.removed.length} entr${result.removed.length === 1 ? "y" : "ies"} from ${ctx.config.mirrorDir}`);
    for (const name of result.removed) {
      console.log(`  - ${name}`);
    }

    if (result.baselineReset) {
      console.log("Sync baseline cleared; the next push re-adds every local file.");
    } else {
      note("Baseline kept: status now reports the wiped files as mirror-side deletions. Use --reset-baseline to republish them with push.");
    }
  } catch (error) {
    reportError(error);
  }
}
