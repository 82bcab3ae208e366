/**
 * Tests for the baseline store
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import {
  baselineFromSnapshot,
  createEmptyBaseline,
  loadBaseline,
  saveBaseline,
  settleBaseline,
  type Baseline,
} from "../state.js";
import type { FileFingerprint, Snapshot } from "../snapshot.js";
import { ConfigError, FilesystemError } from "../../errors.js";

const SAVED_AT = new Date("2024-03-01T12:00:00.000Z");

function fp(relPath: string, hash: string): FileFingerprint {
  return { path: relPath, hash, size: hash.length, mtimeMs: 1000 };
}

function snap(entries: Record<string, string>): Snapshot {
  const snapshot: Snapshot = {};
  for (const [relPath, hash] of Object.entries(entries)) {
    snapshot[relPath] = fp(relPath, hash);
  }
  return snapshot;
}

describe("Baseline store", () => {
  let tempDir: string;
  let statePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "orcasync-state-test-"));
    statePath = path.join(tempDir, ".orcasync", "state.json");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("loadBaseline", () => {
    it("should return an empty baseline when the file does not exist", async () => {
      const baseline = await loadBaseline(statePath);
      expect(baseline).toEqual({ version: 1, savedAt: null, files: {} });
    });

    it("should reject invalid JSON with a ConfigError", async () => {
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(statePath, "{not json");

      const error = await loadBaseline(statePath).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.exitCode).toBe(2);
        expect(error.paths).toEqual([statePath]);
      }
    });

    it("should reject an entry whose path does not match its key", async () => {
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(
        statePath,
        JSON.stringify({
          version: 1,
          savedAt: null,
          files: { "filament/a.json": fp("filament/b.json", "h") },
        })
      );

      await expect(loadBaseline(statePath)).rejects.toThrow(
        "Sync baseline is corrupt: invalid entry for 'filament/a.json'"
      );
    });

    it("should reject a missing files map", async () => {
      await fs.mkdir(path.dirname(statePath), { recursive: true });
      await fs.writeFile(statePath, JSON.stringify({ version: 1 }));

      await expect(loadBaseline(statePath)).rejects.toThrow(
        "Sync baseline is corrupt: missing 'files' map"
      );
    });
  });

  describe("saveBaseline", () => {
    it("should round-trip a baseline with sorted keys", async () => {
      const baseline = baselineFromSnapshot(
        snap({ "process/b.json": "hb", "filament/a.json": "ha" }),
        SAVED_AT
      );

      await saveBaseline(statePath, baseline);
      const loaded = await loadBaseline(statePath);

      expect(loaded).toEqual(baseline);
      expect(Object.keys(loaded.files)).toEqual(["filament/a.json", "process/b.json"]);
      expect(loaded.savedAt).toBe("2024-03-01T12:00:00.000Z");
    });

    it("should leave no temp files behind", async () => {
      await saveBaseline(statePath, createEmptyBaseline());
      const names = await fs.readdir(path.dirname(statePath));
      expect(names).toEqual(["state.json"]);
    });

    it("should keep the previous baseline and remove the temp file when the rename fails", async () => {
      const previous = baselineFromSnapshot(snap({ "machine/a.json": "1" }), SAVED_AT);
      await saveBaseline(statePath, previous);

      const renameError = Object.assign(new Error("EXDEV: cross-device link not permitted"), {
        code: "EXDEV",
      });
      vi.spyOn(fs, "rename").mockRejectedValueOnce(renameError);

      const error = await saveBaseline(
        statePath,
        baselineFromSnapshot(snap({ "machine/b.json": "2" }), SAVED_AT)
      ).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FilesystemError);
      if (error instanceof FilesystemError) {
        expect(error.failed).toBe(statePath);
        expect(error.cause).toBe(renameError);
      }
      expect(await loadBaseline(statePath)).toEqual(previous);
      expect(await fs.readdir(path.dirname(statePath))).toEqual(["state.json"]);
    });

    it("should replace the previous baseline as a whole", async () => {
      await saveBaseline(statePath, baselineFromSnapshot(snap({ "machine/a.json": "1" }), SAVED_AT));
      await saveBaseline(statePath, baselineFromSnapshot(snap({ "machine/b.json": "2" }), SAVED_AT));

      const loaded = await loadBaseline(statePath);
      expect(Object.keys(loaded.files)).toEqual(["machine/b.json"]);
    });
  });

  describe("settleBaseline", () => {
    const previous: Baseline = baselineFromSnapshot(
      snap({
        "filament/same.json": "old",
        "filament/gone.json": "g",
        "filament/pending.json": "p0",
      }),
      SAVED_AT
    );

    it("should take the primary fingerprint where both sides agree", () => {
      const primary = snap({ "filament/same.json": "new", "filament/added.json": "a" });
      const other = snap({ "filament/same.json": "new", "filament/added.json": "a" });

      const settled = settleBaseline(previous, primary, other, SAVED_AT);

      expect(settled.files["filament/same.json"].hash).toBe("new");
      expect(settled.files["filament/added.json"].hash).toBe("a");
    });

    it("should drop paths absent from both sides", () => {
      const settled = settleBaseline(previous, {}, {}, SAVED_AT);
      expect(settled.files).toEqual({});
    });

    it("should keep the previous entry where the sides still differ", () => {
      const primary = snap({ "filament/pending.json": "p0" });
      const other = snap({ "filament/pending.json": "p1", "filament/only-other.json": "x" });

      const settled = settleBaseline(previous, primary, other, SAVED_AT);

      expect(settled.files["filament/pending.json"].hash).toBe("p0");
      expect(settled.files["filament/only-other.json"]).toBeUndefined();
      expect(Object.keys(settled.files)).toEqual(["filament/pending.json"]);
    });

    it("should stamp the save time", () => {
      const settled = settleBaseline(previous, {}, {}, SAVED_AT);
      expect(settled.savedAt).toBe("2024-03-01T12:00:00.000Z");
      expect(settled.version).toBe(1);
    });
  });
});
