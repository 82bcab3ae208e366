/**
 * orcasync log - Show sync history
 */

import { readSyncLog } from "../sync/history.js";
import { openContext, reportError, type RepoOptions } from "../shared.js";

export type LogOptions = RepoOptions & {
  limit?: string;
  json?: boolean;
};

export async function logCommand(options: LogOptions): Promise<void> {
  try {
    const ctx = await openContext(options, { quiet: true });
    const limit = options.limit ? parseInt(options.limit, 10) : 20;
    const entries = (await readSyncLog(ctx.config.historyPath)).slice(-(limit > 0 ? limit : 20));

    if (options.json) {
      console.log(JSON.stringify(entries, null, 2));
      return;
    }

    if (entries.length === 0) {
      console.log("No sync history.");
      return;
    }

    console.log("Sync history");
    console.log("-".repeat(60));

    for (const entry of entries) {
      const status = entry.result === "success" ? "OK" : "FAILED";

      let details = "";
      if (entry.copied) details += ` +${entry.copied}`;
      if (entry.removed) details += ` -${entry.removed}`;
      if (entry.conflicts && entry.conflicts.length > 0) details += ` !${entry.conflicts.length}`;

      console.log(`${entry.timestamp}  ${entry.operation.padEnd(6)}  ${status.padEnd(7)}${details}`);

      if (entry.error) {
        console.log(`    Error: ${entry.error}`);
      }
    }
  } catch (error) {
    reportError(error);
  }
}
