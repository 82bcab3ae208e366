/**
 * CLI Commands
 */

export { statusCommand, formatStatus, type StatusOptions } from "./status.js";
export { pushCommand, pullCommand, type PushOptions, type PullOptions } from "./push-pull.js";
export { applyCommand, type ApplyOptions } from "./apply.js";
export { wipeCommand, type WipeOptions } from "./wipe.js";
export { logCommand, type LogOptions } from "./log.js";
export { configCommand, type ConfigOptions } from "./config.js";
