/**
 * Content fingerprints for a directory tree
 *
 * A snapshot covers only regular files under the allow-listed sync folders,
 * keyed by POSIX path relative to the scanned root so a local scope and the
 * mirror compare directly.
 */

import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { minimatch } from "minimatch";

import { FilesystemError, errorMessage } from "../errors.js";

export type FileFingerprint = {
  /** Path relative to the scanned root, `/`-separated */
  path: string;
  /** SHA-256 of the file content (hex) */
  hash: string;
  size: number;
  /** Modification time in whole milliseconds */
  mtimeMs: number;
};

export type Snapshot = Record<string, FileFingerprint>;

export type ScanOptions = {
  /** Glob patterns matched against the relative path */
  exclude?: readonly string[];
  /**
   * Previous fingerprints; a file whose size and mtime match its entry here
   * keeps the recorded hash instead of being read again.
   */
  reuse?: Snapshot;
};

/**
 * Compute SHA-256 hash of a file's content
 */
export async function computeFileHash(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return computeContentHash(content);
}

export function computeContentHash(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

export function isExcluded(relPath: string, exclude: readonly string[]): boolean {
  return exclude.some((pattern) => minimatch(relPath, pattern, { dot: true, nocase: true }));
}

function isMissing(error: unknown): boolean {
  const code = (error as NodeJS.ErrnoException).code;
  return code === "ENOENT" || code === "ENOTDIR";
}

/**
 * Scan `root`, limited to `folders`, into a snapshot.
 *
 * A missing root or folder contributes nothing. Symlinks and other
 * non-regular entries are skipped, including a folder that is itself a link.
 */
export async function scanTree(
  root: string,
  folders: readonly string[],
  options: ScanOptions = {}
): Promise<Snapshot> {
  const exclude = options.exclude ?? [];
  const reuse = options.reuse ?? {};
  const found: FileFingerprint[] = [];

  async function walkDir(currentDir: string, relativePath: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(currentDir, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) return;
      throw new FilesystemError(`Cannot read directory: ${errorMessage(error)}`, {
        failed: currentDir,
        cause: error,
      });
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const entryPath = path.join(currentDir, entry.name);
      const relPath = `${relativePath}/${entry.name}`;

      if (entry.isDirectory()) {
        await walkDir(entryPath, relPath);
      } else if (entry.isFile()) {
        if (isExcluded(relPath, exclude)) continue;
        found.push(await fingerprint(entryPath, relPath, reuse[relPath]));
      }
    }
  }

  for (const folder of [...folders].sort()) {
    const folderPath = path.join(root, folder);
    let stat: Stats;
    try {
      stat = await fs.lstat(folderPath);
    } catch (error) {
      if (isMissing(error)) continue;
      throw new FilesystemError(`Cannot stat folder: ${errorMessage(error)}`, {
        failed: folderPath,
        cause: error,
      });
    }
    if (!stat.isDirectory()) continue;
    await walkDir(folderPath, folder);
  }

  found.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const snapshot: Snapshot = {};
  for (const entry of found) {
    snapshot[entry.path] = entry;
  }
  return snapshot;
}

async function fingerprint(
  filePath: string,
  relPath: string,
  previous: FileFingerprint | undefined
): Promise<FileFingerprint> {
  try {
    const stat = await fs.stat(filePath);
    const mtimeMs = Math.floor(stat.mtimeMs);

    if (previous && previous.size === stat.size && previous.mtimeMs === mtimeMs) {
      return { path: relPath, hash: previous.hash, size: stat.size, mtimeMs };
    }

    const hash = await computeFileHash(filePath);
    return { path: relPath, hash, size: stat.size, mtimeMs };
  } catch (error) {
    throw new FilesystemError(`Cannot fingerprint file: ${errorMessage(error)}`, {
      failed: filePath,
      cause: error,
    });
  }
}

/**
 * Stable JSON form of a snapshot (keys in path order)
 */
export function serializeSnapshot(snapshot: Snapshot): string {
  const ordered: Snapshot = {};
  for (const key of Object.keys(snapshot).sort()) {
    const entry = snapshot[key];
    ordered[key] = { path: entry.path, hash: entry.hash, size: entry.size, mtimeMs: entry.mtimeMs };
  }
  return JSON.stringify(ordered, null, 2);
}

export function snapshotHash(snapshot: Snapshot, relPath: string): string | null {
  return snapshot[relPath]?.hash ?? null;
}
