/**
 * Tests for CLI commands
 *
 * These tests exercise the CLI command functions directly against temp
 * directories. Commands that talk to git are covered in sync/__tests__ with a
 * fake collaborator.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from "vitest";

import { applyCommand } from "../commands/apply.js";
import { configCommand } from "../commands/config.js";
import { logCommand } from "../commands/log.js";
import { formatStatus, statusCommand } from "../commands/status.js";
import { wipeCommand } from "../commands/wipe.js";
import { getDefaultConfig, saveConfig } from "../config.js";
import { ConflictError, FilesystemError } from "../errors.js";
import { reportError } from "../shared.js";
import type { StatusResult } from "../sync/operations.js";
import { getPackageVersion } from "../version.js";

async function writeFile(root: string, relPath: string, content: string): Promise<void> {
  const filePath = path.join(root, relPath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

function lines(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((call) => call.map(String).join(" "));
}

describe("CLI commands", () => {
  let tempDir: string;
  let repoRoot: string;
  let scopeDir: string;
  let mirrorDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "orcasync-cli-test-"));
    repoRoot = path.join(tempDir, "repo");
    const orcaDir = path.join(tempDir, "OrcaSlicer");
    scopeDir = path.join(orcaDir, "user", "default");
    mirrorDir = path.join(repoRoot, "profiles");

    await saveConfig(repoRoot, { ...getDefaultConfig(), local_orca_dir: orcaDir });
    await fs.mkdir(scopeDir, { recursive: true });

    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("formatStatus", () => {
    it("should list pending changes under the summary", () => {
      const result: StatusResult = {
        changes: [
          { path: "filament/a.json", kind: "local-changed", side: "local", local: "x", mirror: "y", base: "y" },
          { path: "process/b.json", kind: "added", side: "mirror", local: null, mirror: "z", base: null },
          { path: "process/c.json", kind: "unchanged", side: "none", local: "c", mirror: "c", base: "c" },
        ],
        summary: { unchanged: 1, "local-changed": 1, "mirror-changed": 0, conflict: 0, added: 1, deleted: 0 },
        conflicts: [],
      };

      expect(formatStatus(result)).toEqual([
        "Sync status",
        "-".repeat(50),
        "  Unchanged:       1",
        "  Local changes:   1 (push to publish)",
        "  Mirror changes:  0 (apply to bring in)",
        "  Added:           1",
        "  Deleted:         0",
        "  Conflicts:       0",
        "",
        "  local              filament/a.json",
        "  added (mirror)     process/b.json",
        "",
        "Total changes: 2",
      ]);
    });

    it("should flag conflicts", () => {
      const result: StatusResult = {
        changes: [
          { path: "filament/a.json", kind: "conflict", side: "both", local: "x", mirror: "y", base: "z" },
        ],
        summary: { unchanged: 0, "local-changed": 0, "mirror-changed": 0, conflict: 1, added: 0, deleted: 0 },
        conflicts: ["filament/a.json"],
      };

      const output = formatStatus(result);
      expect(output).toContain("  CONFLICT           filament/a.json");
      expect(output[output.length - 1]).toBe(
        "Conflicts need manual resolution: make both copies identical, then run 'orcasync push'"
      );
    });
  });

  describe("statusCommand", () => {
    it("should print JSON on stdout and locations on stderr", async () => {
      await writeFile(scopeDir, "filament/PLA.json", "pla");

      await statusCommand({ repo: repoRoot, json: true });

      expect(logSpy).toHaveBeenCalledTimes(1);
      const output: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(output).toEqual({
        summary: { unchanged: 0, "local-changed": 0, "mirror-changed": 0, conflict: 0, added: 1, deleted: 0 },
        conflicts: [],
        changes: [
          {
            path: "filament/PLA.json",
            kind: "added",
            side: "local",
            local: expect.any(String),
            mirror: null,
            base: null,
          },
        ],
      });
      expect(lines(errorSpy)).toContain("Storage locations:");
    });

    it("should report an empty tree as in sync", async () => {
      await statusCommand({ repo: repoRoot });

      expect(lines(logSpy)).toContain("All files in sync!");
      expect(lines(logSpy)).toContain(`  Repo mirror (git):     ${mirrorDir}`);
    });
  });

  describe("applyCommand", () => {
    it("should write mirror files and log the operation", async () => {
      await writeFile(mirrorDir, "machine/printer.json", "printer");

      await applyCommand({ repo: repoRoot });

      expect(await fs.readFile(path.join(scopeDir, "machine/printer.json"), "utf-8")).toBe("printer");
      expect(lines(logSpy)).toContain("Wrote 1 file(s) into the local scope");

      logSpy.mockClear();
      await logCommand({ repo: repoRoot, json: true });
      const entries: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(entries).toEqual([
        {
          timestamp: expect.any(String),
          operation: "apply",
          result: "success",
          copied: 1,
          removed: 0,
        },
      ]);
    });
  });

  describe("wipeCommand", () => {
    it("should exit with a usage error without --yes", async () => {
      await writeFile(mirrorDir, "filament/PLA.json", "pla");

      await expect(wipeCommand({ repo: repoRoot })).rejects.toThrow("process.exit(2)");

      expect(lines(errorSpy)).toContain("Error: Refusing to wipe the mirror without confirmation");
      expect(lines(errorSpy)).toContain(
        "  Suggestion: Re-run with --yes to delete every file in the mirror directory"
      );
      expect(await fs.readFile(path.join(mirrorDir, "filament/PLA.json"), "utf-8")).toBe("pla");
    });

    it("should empty the mirror with --yes", async () => {
      await writeFile(mirrorDir, "filament/PLA.json", "pla");

      await wipeCommand({ repo: repoRoot, yes: true });

      expect(await fs.readdir(mirrorDir)).toEqual([]);
      expect(lines(logSpy)).toContain(`Removed 1 entry from ${mirrorDir}`);
    });
  });

  describe("logCommand", () => {
    it("should say when there is no history", async () => {
      await logCommand({ repo: repoRoot });
      expect(lines(logSpy)).toEqual(["No sync history."]);
    });
  });

  describe("configCommand", () => {
    it("should print the resolved config as JSON", async () => {
      await configCommand({ repo: repoRoot, json: true });

      const output: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(output).toMatchObject({
        repoRoot,
        scopeDir,
        mirrorDir,
        syncFolders: ["filament", "machine", "process"],
        trustMtime: false,
      });
    });

    it("should exit with the config error code for invalid JSON", async () => {
      await fs.writeFile(path.join(repoRoot, ".orcasync", "config.json"), "{ nope");

      await expect(configCommand({ repo: repoRoot })).rejects.toThrow("process.exit(2)");
    });
  });

  describe("reportError", () => {
    it("should list conflicting paths and exit 1", () => {
      expect(() => reportError(new ConflictError(["filament/a.json"]))).toThrow("process.exit(1)");

      expect(lines(errorSpy)).toEqual([
        "Error: Push blocked by 1 conflicting file(s)",
        "  ! filament/a.json",
        "  Suggestion: Resolve the conflicts manually, then re-run push",
      ]);
    });

    it("should show batch progress for filesystem errors", () => {
      const error = new FilesystemError("Apply failed at b: EACCES", {
        completed: ["a"],
        failed: "b",
        pending: ["c"],
      });

      expect(() => reportError(error)).toThrow("process.exit(3)");

      expect(lines(errorSpy)).toEqual([
        "Error: Apply failed at b: EACCES",
        "  Completed (1):",
        "    + a",
        "  Failed: b",
        "  Not attempted (1):",
        "    - c",
        "  Suggestion: Fix the file permissions or disk problem, then re-run the same command",
      ]);
    });

    it("should exit 1 for unexpected errors", () => {
      expect(() => reportError(new Error("surprise"))).toThrow("process.exit(1)");
      expect(lines(errorSpy)).toEqual(["Error: surprise"]);
    });
  });
});

describe("getPackageVersion", () => {
  it("should read the version from package.json", () => {
    expect(getPackageVersion()).toBe("0.1.0");
  });
});
