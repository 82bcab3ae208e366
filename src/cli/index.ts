#!/usr/bin/env node
/**
 * orcasync CLI
 *
 * Git-backed sync of OrcaSlicer profiles between machines, with three-way
 * conflict detection against the last synced baseline.
 */

import { program } from "commander";

import { VERSION } from "./version.js";
import {
  statusCommand,
  pushCommand,
  pullCommand,
  applyCommand,
  wipeCommand,
  logCommand,
  configCommand,
} from "./commands/index.js";

program
  .name("orcasync")
  .description("Sync OrcaSlicer profiles through a git-tracked mirror")
  .version(VERSION);

// orcasync status
program
  .command("status")
  .description("Show local and mirror changes since the last sync, and conflicts")
  .option("-r, --repo <path>", "Sync repository (default: $ORCASYNC_REPO or cwd)")
  .option("--json", "Output as JSON")
  .action(statusCommand);

// orcasync push
program
  .command("push")
  .description("Copy local changes into the mirror, then git commit and push")
  .option("-r, --repo <path>", "Sync repository (default: $ORCASYNC_REPO or cwd)")
  .option("-m, --message <message>", "Git commit message", "Sync OrcaSlicer profiles")
  .option("--dry-run", "Show what would be copied without making changes")
  .action(pushCommand);

// orcasync pull
program
  .command("pull")
  .description("git pull --rebase the mirror (local OrcaSlicer files are not touched)")
  .option("-r, --repo <path>", "Sync repository (default: $ORCASYNC_REPO or cwd)")
  .action(pullCommand);

// orcasync apply
program
  .command("apply")
  .description("Overwrite local OrcaSlicer profiles with the mirror (destructive)")
  .option("-r, --repo <path>", "Sync repository (default: $ORCASYNC_REPO or cwd)")
  .option("--prune", "Also delete local profiles that are not in the mirror")
  .option("--dry-run", "Show what would be written without making changes")
  .action(applyCommand);

// orcasync wipe-profiles
program
  .command("wipe-profiles")
  .description("Delete every file in the mirror directory (local files are not touched)")
  .option("-r, --repo <path>", "Sync repository (default: $ORCASYNC_REPO or cwd)")
  .option("-y, --yes", "Confirm the wipe")
  .option("--reset-baseline", "Also clear the sync baseline so the next push republishes everything")
  .action(wipeCommand);

// orcasync log
program
  .command("log")
  .description("Show sync history")
  .option("-r, --repo <path>", "Sync repository (default: $ORCASYNC_REPO or cwd)")
  .option("-n, --limit <number>", "Number of entries to show (default: 20)")
  .option("--json", "Output as JSON")
  .action(logCommand);

// orcasync config
program
  .command("config")
  .description("Show the resolved configuration")
  .option("-r, --repo <path>", "Sync repository (default: $ORCASYNC_REPO or cwd)")
  .option("--json", "Output as JSON")
  .action(configCommand);

// Parse and run
await program.parseAsync();
