/**
 * foldback: folder monitoring with checkpoints and rollback
 *
 * Watches directory trees, records per-file changes, snapshots a tree on
 * request and restores it, wholly or file by file.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Monitoring engine
export * from "./monitor/index.js";

// Multi-folder hub
export { MonitorHub, sessionOptionsFrom } from "./app/hub.js";
export type { ChangeEntry, ChangeFilter, FolderOutcome, SessionFactory } from "./app/hub.js";

// Diffs
export { createFileDiff, formatFileDiff, readSide } from "./diff/renderer.js";
export type { DiffSide, FileDiff, FileDiffRequest } from "./diff/renderer.js";

// Configuration
export { loadConfig, saveConfig } from "./config/loader.js";
export { FolderRegistry } from "./config/folders.js";
export { FoldbackConfigSchema, createDefaultConfig } from "./config/schema.js";
export type { FoldbackConfig, WatcherConfig } from "./config/schema.js";
export { CONFIG_PATHS, IGNORE_FILENAME } from "./config/paths.js";

// Errors
export {
  FoldbackError,
  FileSystemError,
  ConfigError,
  ValidationError,
  CheckpointError,
  formatError,
  isFoldbackError,
} from "./utils/errors.js";

// Logging
export { createLogger, getLogger, setLogger } from "./utils/logger.js";
