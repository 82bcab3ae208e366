/**
 * Sync module - snapshot, baseline, classification and the operations on top
 */

export {
  type FileFingerprint,
  type Snapshot,
  type ScanOptions,
  computeFileHash,
  computeContentHash,
  isExcluded,
  scanTree,
  serializeSnapshot,
  snapshotHash,
} from "./snapshot.js";

export {
  type Baseline,
  createEmptyBaseline,
  baselineFromSnapshot,
  loadBaseline,
  saveBaseline,
  settleBaseline,
} from "./state.js";

export {
  type ChangeKind,
  type ChangeSide,
  type ChangeEntry,
  type ChangeSummary,
  classifyPath,
  classifyChanges,
  summarizeChanges,
  getConflicts,
  getOutgoing,
} from "./conflicts.js";

export {
  type CommitResult,
  type VersionControl,
  type CommandResult,
  type CommandRunner,
  runCommand,
  GitVersionControl,
} from "./vcs.js";

export {
  type SyncOperation,
  type SyncLogEntry,
  appendSyncLog,
  readSyncLog,
} from "./history.js";

export {
  type SyncContext,
  type StatusResult,
  type PushResult,
  type PullResult,
  type ApplyResult,
  type WipeResult,
  DEFAULT_COMMIT_MESSAGE,
  createSyncContext,
  getStatus,
  push,
  pull,
  apply,
  wipeMirror,
} from "./operations.js";
