// Sync core
export * from "./cli/sync/index.js";

// Configuration
export {
  type OrcaSyncConfig,
  type ResolvedConfig,
  DEFAULT_SCOPE_SUBDIR,
  DEFAULT_SYNC_FOLDERS,
  DEFAULT_MIRROR_DIR,
  DEFAULT_EXCLUDE,
  resolveRepoRoot,
  getConfigDir,
  getConfigPath,
  getStatePath,
  getHistoryPath,
  detectDefaultOrcaPath,
  getDefaultConfig,
  expandPath,
  formatPath,
  saveConfig,
  ensureConfig,
  readConfig,
  validateConfig,
  resolveConfig,
  loadConfig,
} from "./cli/config.js";

// Errors
export {
  type SyncErrorCode,
  SyncError,
  ConflictError,
  ConfigError,
  UsageError,
  FilesystemError,
  VersionControlError,
  isSyncError,
  errorMessage,
} from "./cli/errors.js";
