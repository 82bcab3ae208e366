/**
 * Baseline store
 *
 * The baseline is the snapshot both sides agreed on at the end of the last
 * successful push or apply. It is the third point of the local/mirror/base
 * comparison and is only ever replaced as a whole.
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

import { ConfigError, FilesystemError, errorMessage } from "../errors.js";
import type { FileFingerprint, Snapshot } from "./snapshot.js";

const BASELINE_VERSION = 1;

export type Baseline = {
  /** Version for future migrations */
  version: number;
  /** When this baseline was written (ISO), null if never saved */
  savedAt: string | null;
  /** Fingerprints keyed by relative path */
  files: Snapshot;
};

export function createEmptyBaseline(): Baseline {
  return {
    version: BASELINE_VERSION,
    savedAt: null,
    files: {},
  };
}

export function baselineFromSnapshot(snapshot: Snapshot, savedAt: Date = new Date()): Baseline {
  return {
    version: BASELINE_VERSION,
    savedAt: savedAt.toISOString(),
    files: { ...snapshot },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFingerprint(value: unknown, key: string): value is FileFingerprint {
  return (
    isRecord(value) &&
    value.path === key &&
    typeof value.hash === "string" &&
    typeof value.size === "number" &&
    typeof value.mtimeMs === "number"
  );
}

/**
 * Load the baseline. A missing file is an empty baseline; an unreadable or
 * malformed one is a ConfigError.
 */
export async function loadBaseline(statePath: string): Promise<Baseline> {
  let content: string;
  try {
    content = await fs.readFile(statePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return createEmptyBaseline();
    }
    throw new FilesystemError(`Cannot read sync baseline: ${errorMessage(error)}`, {
      failed: statePath,
      cause: error,
    });
  }

  const corrupt = (reason: string, cause?: unknown): ConfigError =>
    new ConfigError(`Sync baseline is corrupt: ${reason}`, {
      paths: [statePath],
      hint: "Delete the file to start from an empty baseline; the next status will show every file as added",
      cause,
    });

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw corrupt(errorMessage(error), error);
  }

  if (!isRecord(parsed)) {
    throw corrupt("expected a JSON object");
  }
  const record = parsed;
  const files = record.files;
  if (!isRecord(files)) {
    throw corrupt("missing 'files' map");
  }

  const snapshot: Snapshot = {};
  for (const [key, value] of Object.entries(files)) {
    if (!isFingerprint(value, key)) {
      throw corrupt(`invalid entry for '${key}'`);
    }
    snapshot[key] = { path: key, hash: value.hash, size: value.size, mtimeMs: value.mtimeMs };
  }

  return {
    version: typeof record.version === "number" ? record.version : BASELINE_VERSION,
    savedAt: typeof record.savedAt === "string" ? record.savedAt : null,
    files: snapshot,
  };
}

/**
 * Save the baseline atomically: temp file beside the target, then rename.
 * On failure the previous baseline is left as it was.
 */
export async function saveBaseline(statePath: string, baseline: Baseline): Promise<void> {
  const stateDir = path.dirname(statePath);
  const tempPath = `${statePath}.${crypto.randomBytes(4).toString("hex")}.tmp`;

  const ordered: Snapshot = {};
  for (const key of Object.keys(baseline.files).sort()) {
    ordered[key] = baseline.files[key];
  }
  const payload: Baseline = {
    version: baseline.version || BASELINE_VERSION,
    savedAt: baseline.savedAt,
    files: ordered,
  };

  try {
    await fs.mkdir(stateDir, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(payload, null, 2) + "\n", "utf-8");
    await fs.rename(tempPath, statePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FilesystemError(`Cannot save sync baseline: ${errorMessage(error)}`, {
      failed: statePath,
      cause: error,
    });
  }
}

/**
 * Baseline after an operation that made `primary` authoritative.
 *
 * Paths where `primary` and `other` hold the same content take the `primary`
 * fingerprint. Paths gone from both sides are dropped. Anything still
 * differing keeps its previous entry (or stays absent), so a one-sided
 * change the operation did not carry over is reported the same way next run.
 */
export function settleBaseline(
  previous: Baseline,
  primary: Snapshot,
  other: Snapshot,
  savedAt: Date = new Date()
): Baseline {
  const paths = new Set([
    ...Object.keys(previous.files),
    ...Object.keys(primary),
    ...Object.keys(other),
  ]);

  const files: Snapshot = {};
  for (const relPath of [...paths].sort()) {
    const mine = primary[relPath];
    const theirs = other[relPath];

    if (mine && theirs && mine.hash === theirs.hash) {
      files[relPath] = mine;
    } else if (!mine && !theirs) {
      continue;
    } else if (previous.files[relPath]) {
      files[relPath] = previous.files[relPath];
    }
  }

  return {
    version: BASELINE_VERSION,
    savedAt: savedAt.toISOString(),
    files,
  };
}
