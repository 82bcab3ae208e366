/**
 * orcasync status - Show local/mirror differences and conflicts
 */

import { getStatus, type StatusResult } from "../sync/operations.js";
import type { ChangeEntry, ChangeKind } from "../sync/conflicts.js";
import { openContext, reportError, type RepoOptions } from "../shared.js";

export type StatusOptions = RepoOptions & {
  json?: boolean;
};

const KIND_LABELS: Record<Exclude<ChangeKind, "unchanged">, string> = {
  "local-changed": "local",
  "mirror-changed": "mirror",
  conflict: "CONFLICT",
  added: "added",
  deleted: "deleted",
};

function describeEntry(entry: ChangeEntry): string {
  if (entry.kind === "unchanged") return "";
  let label = KIND_LABELS[entry.kind];
  if (entry.kind === "added") {
    label += ` (${entry.side})`;
  } else if (entry.kind === "local-changed" && entry.local === null) {
    label += " (deleted)";
  } else if (entry.kind === "mirror-changed" && entry.mirror === null) {
    label += " (deleted)";
  }
  return `  ${label.padEnd(18)} ${entry.path}`;
}

/**
 * Human-readable status report
 */
export function formatStatus(result: StatusResult): string[] {
  const { summary } = result;
  const lines: string[] = [];

  lines.push("Sync status");
  lines.push("-".repeat(50));
  lines.push(`  Unchanged:       ${summary.unchanged}`);
  lines.push(`  Local changes:   ${summary["local-changed"]} (push to publish)`);
  lines.push(`  Mirror changes:  ${summary["mirror-changed"]} (apply to bring in)`);
  lines.push(`  Added:           ${summary.added}`);
  lines.push(`  Deleted:         ${summary.deleted}`);
  lines.push(`  Conflicts:       ${summary.conflict}`);

  const pending = result.changes.filter(
    (change) => change.kind !== "unchanged" && change.kind !== "deleted"
  );
  if (pending.length > 0) {
    lines.push("");
    for (const change of pending) {
      lines.push(describeEntry(change));
    }
  }

  lines.push("");
  if (result.conflicts.length > 0) {
    lines.push("Conflicts need manual resolution: make both copies identical, then run 'orcasync push'");
  } else if (pending.length === 0) {
    lines.push("All files in sync!");
  } else {
    lines.push(`Total changes: ${pending.length}`);
  }

  return lines;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  try {
    const ctx = await openContext(options, { quiet: options.json });
    const result = await getStatus(ctx);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            summary: result.summary,
            conflicts: result.conflicts,
            changes: result.changes.filter((change) => change.kind !== "unchanged"),
          },
          null,
          2
        )
      );
      return;
    }

    for (const line of formatStatus(result)) {
      console.log(line);
    }
  } catch (error) {
    reportError(error);
  }
}
