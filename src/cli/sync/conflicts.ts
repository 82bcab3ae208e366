/**
 * Three-way change classification
 *
 * Compares the local scope and the mirror against the baseline, path by path.
 * Pure: no I/O, output depends only on the three inputs.
 */

import type { Snapshot } from "./snapshot.js";
import type { Baseline } from "./state.js";

export type ChangeKind =
  | "unchanged"      // Nothing to do (including both sides converging)
  | "local-changed"  // Only the local side moved away from the baseline
  | "mirror-changed" // Only the mirror moved away from the baseline
  | "conflict"       // Both sides moved, to different content
  | "added"          // Not in the baseline, present on one side
  | "deleted";       // In the baseline, gone from both sides

export type ChangeSide = "local" | "mirror" | "both" | "none";

export type ChangeEntry = {
  /** Relative file path */
  path: string;
  kind: ChangeKind;
  /** Side(s) the change came from */
  side: ChangeSide;
  /** Local hash (null if missing) */
  local: string | null;
  /** Mirror hash (null if missing) */
  mirror: string | null;
  /** Baseline hash (null if never synced) */
  base: string | null;
};

export type ChangeSummary = Record<ChangeKind, number>;

/**
 * Classify one path from its three hashes
 */
export function classifyPath(
  local: string | null,
  mirror: string | null,
  base: string | null
): { kind: ChangeKind; side: ChangeSide } {
  const localChanged = local !== base;
  const mirrorChanged = mirror !== base;

  if (localChanged && mirrorChanged && local !== mirror) {
    return { kind: "conflict", side: "both" };
  }

  if (local === null && mirror === null) {
    return { kind: "deleted", side: "none" };
  }

  if (base === null) {
    // Present on both with equal content, or on exactly one side
    if (local === mirror) {
      return { kind: "unchanged", side: "both" };
    }
    return { kind: "added", side: local !== null ? "local" : "mirror" };
  }

  if (localChanged && !mirrorChanged) {
    return { kind: "local-changed", side: "local" };
  }
  if (mirrorChanged && !localChanged) {
    return { kind: "mirror-changed", side: "mirror" };
  }
  if (localChanged && mirrorChanged) {
    // Converged on the same new content
    return { kind: "unchanged", side: "both" };
  }
  return { kind: "unchanged", side: "none" };
}

/**
 * Classify every path appearing in any of the three inputs, sorted by path
 */
export function classifyChanges(
  local: Snapshot,
  mirror: Snapshot,
  baseline: Baseline
): ChangeEntry[] {
  const allPaths = new Set([
    ...Object.keys(local),
    ...Object.keys(mirror),
    ...Object.keys(baseline.files),
  ]);

  const changes: ChangeEntry[] = [];
  for (const relPath of [...allPaths].sort()) {
    const localHash = local[relPath]?.hash ?? null;
    const mirrorHash = mirror[relPath]?.hash ?? null;
    const baseHash = baseline.files[relPath]?.hash ?? null;

    const { kind, side } = classifyPath(localHash, mirrorHash, baseHash);
    changes.push({
      path: relPath,
      kind,
      side,
      local: localHash,
      mirror: mirrorHash,
      base: baseHash,
    });
  }

  return changes;
}

export function summarizeChanges(changes: readonly ChangeEntry[]): ChangeSummary {
  const summary: ChangeSummary = {
    unchanged: 0,
    "local-changed": 0,
    "mirror-changed": 0,
    conflict: 0,
    added: 0,
    deleted: 0,
  };

  for (const change of changes) {
    summary[change.kind]++;
  }

  return summary;
}

export function getConflicts(changes: readonly ChangeEntry[]): string[] {
  return changes.filter((change) => change.kind === "conflict").map((change) => change.path);
}

/**
 * Paths the local side should send to the mirror on push
 */
export function getOutgoing(changes: readonly ChangeEntry[]): {
  copy: string[];
  remove: string[];
} {
  const copy: string[] = [];
  const remove: string[] = [];

  for (const change of changes) {
    if (change.kind === "added" && change.side === "local") {
      copy.push(change.path);
    } else if (change.kind === "local-changed") {
      if (change.local === null) {
        remove.push(change.path);
      } else {
        copy.push(change.path);
      }
    }
  }

  return { copy, remove };
}
