/**
 * Sync history: one JSON line per mutating operation
 */

import fs from "node:fs/promises";
import path from "node:path";

const MAX_LOG_ENTRIES = 500;

export type SyncOperation = "push" | "pull" | "apply" | "wipe";

export type SyncLogEntry = {
  timestamp: string;
  operation: SyncOperation;
  result: "success" | "failure";
  copied?: number;
  removed?: number;
  conflicts?: string[];
  error?: string;
  committed?: boolean;
};

/**
 * Append an entry, keeping the newest MAX_LOG_ENTRIES.
 *
 * A failed write is returned as a message instead of thrown so it never
 * changes the outcome of the operation being logged.
 */
export async function appendSyncLog(
  logPath: string,
  entry: SyncLogEntry
): Promise<string | null> {
  try {
    await fs.mkdir(path.dirname(logPath), { recursive: true });

    let entries = await readSyncLog(logPath);
    entries.push(entry);
    if (entries.length > MAX_LOG_ENTRIES) {
      entries = entries.slice(-MAX_LOG_ENTRIES);
    }

    const content = entries.map((e) => JSON.stringify(e)).join("\n") + "\n";
    await fs.writeFile(logPath, content, "utf-8");
    return null;
  } catch (error) {
    return `Failed to write sync log ${logPath}: ${error instanceof Error ? error.message : String(error)}`;
  }
}

const OPERATIONS: readonly string[] = ["push", "pull", "apply", "wipe"];

function isLogEntry(value: unknown): value is SyncLogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "operation" in value &&
    typeof value.operation === "string" &&
    OPERATIONS.includes(value.operation) &&
    "result" in value &&
    (value.result === "success" || value.result === "failure")
  );
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    // Partial line from an interrupted write
    return undefined;
  }
}

/**
 * Read all entries, oldest first. Lines that do not parse are skipped.
 */
export async function readSyncLog(logPath: string): Promise<SyncLogEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(logPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }

  const entries: SyncLogEntry[] = [];
  for (const line of content.split("\n")) {
    if (!line.trim()) continue;
    const parsed = parseLine(line);
    if (isLogEntry(parsed)) {
      entries.push(parsed);
    }
  }
  return entries;
}
