/**
 * Configuration loading and path resolution
 *
 * Tool-owned files live under `<repo>/.orcasync/`:
 * - config.json     local settings (OrcaSlicer path, mirror path, folders)
 * - state.json      baseline of the last successful sync
 * - sync-log.jsonl  history of mutating operations
 *
 * The config is written with defaults on first run and is immutable for the
 * rest of the invocation.
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

import { ConfigError, errorMessage } from "./errors.js";

const CONFIG_DIR = ".orcasync";
const CONFIG_FILENAME = "config.json";
const STATE_FILENAME = "state.json";
const HISTORY_FILENAME = "sync-log.jsonl";

// Config, baseline and history are per machine and never committed
const GITIGNORE_CONTENT = `# orcasync machine-local state
*
`;

export const DEFAULT_SCOPE_SUBDIR = "user/default";
export const DEFAULT_SYNC_FOLDERS = ["filament", "machine", "process"];
export const DEFAULT_MIRROR_DIR = "./profiles";
export const DEFAULT_EXCLUDE = [
  "**/.DS_Store",
  "**/Thumbs.db",
  "**/*.lock",
  "**/cache/**",
  "**/logs/**",
];

/**
 * On-disk config shape (snake_case to match the JSON file)
 */
export type OrcaSyncConfig = {
  /** Live OrcaSlicer directory on this machine */
  local_orca_dir: string;
  /** Subdirectory of local_orca_dir that is synced */
  local_scope_subdir: string;
  /** Folders under the scope that are synced; everything else is ignored */
  sync_folders: string[];
  /** Mirror directory, relative to the repo root or absolute */
  repo_mirror_dir: string;
  /** Glob patterns (relative to the scope) never synced */
  exclude: string[];
  /** Reuse baseline hashes when size and mtime are unchanged */
  trust_mtime: boolean;
};

export type ResolvedConfig = {
  repoRoot: string;
  configPath: string;
  statePath: string;
  historyPath: string;
  localBaseDir: string;
  scopeDir: string;
  mirrorDir: string;
  syncFolders: readonly string[];
  exclude: readonly string[];
  trustMtime: boolean;
};

/**
 * Resolve the repository root.
 *
 * Priority:
 * 1. --repo flag
 * 2. ORCASYNC_REPO environment variable
 * 3. Current working directory
 */
export function resolveRepoRoot(options: { repo?: string } = {}): string {
  if (options.repo) {
    return path.resolve(options.repo);
  }

  const envRepo = process.env.ORCASYNC_REPO;
  if (envRepo) {
    return path.resolve(envRepo);
  }

  return process.cwd();
}

export function getConfigDir(repoRoot: string): string {
  return path.join(repoRoot, CONFIG_DIR);
}

export function getConfigPath(repoRoot: string): string {
  return path.join(repoRoot, CONFIG_DIR, CONFIG_FILENAME);
}

export function getStatePath(repoRoot: string): string {
  return path.join(repoRoot, CONFIG_DIR, STATE_FILENAME);
}

export function getHistoryPath(repoRoot: string): string {
  return path.join(repoRoot, CONFIG_DIR, HISTORY_FILENAME);
}

/**
 * Best-effort OrcaSlicer location for a platform
 */
export function detectDefaultOrcaPath(platform: NodeJS.Platform = process.platform): string {
  if (platform === "darwin") {
    return "~/Library/Application Support/OrcaSlicer";
  }
  if (platform === "win32") {
    return "%APPDATA%\\OrcaSlicer";
  }
  return "~/.config/OrcaSlicer";
}

export function getDefaultConfig(platform?: NodeJS.Platform): OrcaSyncConfig {
  return {
    local_orca_dir: detectDefaultOrcaPath(platform),
    local_scope_subdir: DEFAULT_SCOPE_SUBDIR,
    sync_folders: [...DEFAULT_SYNC_FOLDERS],
    repo_mirror_dir: DEFAULT_MIRROR_DIR,
    exclude: [...DEFAULT_EXCLUDE],
    trust_mtime: false,
  };
}

/**
 * Expand `~`, `$VAR`, `${VAR}` and `%VAR%` in a configured path.
 *
 * Unknown variables are left as written.
 */
export function expandPath(raw: string, env: NodeJS.ProcessEnv = process.env): string {
  let expanded = raw.replace(/%([A-Za-z_][A-Za-z0-9_]*)%/g, (match, name: string) => env[name] ?? match);
  expanded = expanded.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      return name !== undefined ? env[name] ?? match : match;
    }
  );

  if (expanded === "~") {
    return os.homedir();
  }
  if (expanded.startsWith("~/") || expanded.startsWith("~\\")) {
    return path.join(os.homedir(), expanded.slice(2));
  }
  return expanded;
}

/**
 * Format a path for display (use ~ for home directory)
 */
export function formatPath(filePath: string): string {
  const home = os.homedir();
  if (filePath === home || filePath.startsWith(home + path.sep)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}

export async function saveConfig(repoRoot: string, config: OrcaSyncConfig): Promise<void> {
  const configPath = getConfigPath(repoRoot);
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

/**
 * Write a default config if none exists yet.
 *
 * Returns true when a new file was created.
 */
export async function ensureConfig(repoRoot: string): Promise<boolean> {
  const configPath = getConfigPath(repoRoot);
  let created = false;
  try {
    await fs.access(configPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw new ConfigError(`Cannot access config: ${errorMessage(error)}`, {
        paths: [configPath],
        hint: "Fix the permissions of the .orcasync directory, then re-run",
        cause: error,
      });
    }
    await saveConfig(repoRoot, getDefaultConfig());
    created = true;
  }

  const gitignorePath = path.join(getConfigDir(repoRoot), ".gitignore");
  try {
    await fs.access(gitignorePath);
  } catch {
    await fs.writeFile(gitignorePath, GITIGNORE_CONTENT, "utf-8");
  }

  return created;
}

/**
 * Read and validate config.json, filling optional fields with defaults
 */
export async function readConfig(repoRoot: string): Promise<OrcaSyncConfig> {
  const configPath = getConfigPath(repoRoot);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config: ${errorMessage(error)}`, {
      paths: [configPath],
      hint: "Delete the file to regenerate defaults, or fix its permissions",
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config: ${errorMessage(error)}`, {
      paths: [configPath],
      hint: "Fix the JSON syntax or delete the file to regenerate defaults",
      cause: error,
    });
  }

  return validateConfig(parsed, configPath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validate a parsed config object
 */
export function validateConfig(value: unknown, configPath: string): OrcaSyncConfig {
  const invalid = (message: string): ConfigError =>
    new ConfigError(message, {
      paths: [configPath],
      hint: "Fix the value in config.json, or delete the file to regenerate defaults",
    });

  if (!isRecord(value)) {
    throw invalid("Config must be a JSON object");
  }

  const defaults = getDefaultConfig();

  const localDir = value.local_orca_dir;
  if (typeof localDir !== "string" || localDir.trim() === "") {
    throw invalid("local_orca_dir must be a non-empty string");
  }

  const scope = value.local_scope_subdir ?? defaults.local_scope_subdir;
  if (typeof scope !== "string" || path.isAbsolute(scope) || scope.split(/[\\/]/).includes("..")) {
    throw invalid("local_scope_subdir must be a relative path inside local_orca_dir");
  }

  const folders = value.sync_folders ?? defaults.sync_folders;
  if (!isStringArray(folders) || folders.length === 0) {
    throw invalid("sync_folders must be a non-empty array of folder names");
  }
  for (const folder of folders) {
    if (folder === "" || folder === "." || folder === ".." || /[\\/]/.test(folder)) {
      throw invalid(`sync_folders entry '${folder}' must be a plain folder name`);
    }
  }

  const mirror = value.repo_mirror_dir ?? defaults.repo_mirror_dir;
  if (typeof mirror !== "string" || mirror.trim() === "") {
    throw invalid("repo_mirror_dir must be a non-empty string");
  }

  const exclude = value.exclude ?? defaults.exclude;
  if (!isStringArray(exclude)) {
    throw invalid("exclude must be an array of glob patterns");
  }

  const trustMtime = value.trust_mtime ?? defaults.trust_mtime;
  if (typeof trustMtime !== "boolean") {
    throw invalid("trust_mtime must be true or false");
  }

  return {
    local_orca_dir: localDir,
    local_scope_subdir: scope,
    sync_folders: [...new Set(folders)].sort(),
    repo_mirror_dir: mirror,
    exclude,
    trust_mtime: trustMtime,
  };
}

function isSameOrInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Resolve every configured path to an absolute location
 */
export function resolveConfig(repoRoot: string, config: OrcaSyncConfig): ResolvedConfig {
  const root = path.resolve(repoRoot);
  const localBaseDir = path.resolve(root, expandPath(config.local_orca_dir));
  const scopeDir = path.resolve(localBaseDir, config.local_scope_subdir);
  const mirrorDir = path.resolve(root, expandPath(config.repo_mirror_dir));
  const configPath = getConfigPath(root);

  if (isSameOrInside(mirrorDir, scopeDir) || isSameOrInside(scopeDir, mirrorDir)) {
    throw new ConfigError("Mirror directory and local scope directory must not overlap", {
      paths: [scopeDir, mirrorDir],
      hint: "Point repo_mirror_dir outside the OrcaSlicer directory",
    });
  }
  if (isSameOrInside(root, mirrorDir)) {
    throw new ConfigError("Mirror directory must not contain the repository root", {
      paths: [mirrorDir],
      hint: "Use a dedicated folder such as ./profiles for repo_mirror_dir",
    });
  }

  return {
    repoRoot: root,
    configPath,
    statePath: getStatePath(root),
    historyPath: getHistoryPath(root),
    localBaseDir,
    scopeDir,
    mirrorDir,
    syncFolders: config.sync_folders,
    exclude: config.exclude,
    trustMtime: config.trust_mtime,
  };
}

/**
 * Load the config for a repo, creating defaults on first run
 */
export async function loadConfig(
  repoRoot: string
): Promise<{ config: ResolvedConfig; created: boolean }> {
  const created = await ensureConfig(repoRoot);
  const raw = await readConfig(repoRoot);
  return { config: resolveConfig(repoRoot, raw), created };
}
