/**
 * Types for the folder monitoring and checkpoint engine
 */

// =============================================================================
// Changes
// =============================================================================

/**
 * Kind of a file-level change
 */
export type ChangeKind = "created" | "modified" | "deleted" | "moved";

export const CHANGE_KINDS: readonly ChangeKind[] = ["created", "modified", "deleted", "moved"];

/**
 * Effective change recorded for one path
 */
export interface ChangeRecord {
  kind: ChangeKind;
  /** ISO-8601 time of the last event for the path, whole seconds */
  timestamp: string;
}

/**
 * Change records keyed by forward-slash path relative to the watched root
 */
export type ChangeTable = Record<string, ChangeRecord>;

/**
 * Which ledger table to read
 */
export type LedgerView = "all" | "checkpoint";

// =============================================================================
// Watch events
// =============================================================================

/**
 * Filesystem event decoded at the watcher boundary.
 * A move is reported once, at its destination path.
 */
export interface RawWatchEvent {
  kind: ChangeKind;
  /** Absolute path of the affected entry */
  path: string;
  isDirectory: boolean;
}

/**
 * Notification published after an event has been recorded
 */
export interface ChangeNotification {
  /** Watched root the change belongs to */
  root: string;
  /** Path relative to the root */
  path: string;
  /** Effective kind after coalescing, as now visible through getChanges() */
  kind: ChangeKind;
  timestamp: string;
}

/**
 * Callback invoked after every accepted event
 */
export type ChangeListener = (notification: ChangeNotification) => void | Promise<void>;

// =============================================================================
// Checkpoint results
// =============================================================================

/**
 * A per-file I/O failure collected during a batch operation
 */
export interface FileFailure {
  path: string;
  error: string;
}

/**
 * Outcome of creating a checkpoint
 */
export interface CheckpointResult {
  /** Staging directory holding the snapshot */
  stagingDir: string;
  /** Number of files copied into the snapshot */
  fileCount: number;
  /** Files that could not be copied and will not be restorable */
  warnings: FileFailure[];
}

/**
 * Outcome of a full rollback
 */
export interface RollbackResult {
  /** True when the rollback ran and every file operation succeeded */
  success: boolean;
  /** Set when the rollback did not run at all */
  reason?: "no-checkpoint";
  restored: string[];
  removed: string[];
  failures: FileFailure[];
}

// =============================================================================
// Session
// =============================================================================

export type SessionState = "stopped" | "running";

/**
 * Options for a watch session
 */
export interface WatchSessionOptions {
  /** Suppression window for the engine's own writes, in ms (default: 3000) */
  suppressionMs?: number;
  /** Bounded notification channel capacity (default: 256) */
  notificationCapacity?: number;
  /** Parent directory for the snapshot staging directory (default: OS temp dir) */
  stagingDir?: string;
  usePolling?: boolean;
  pollIntervalMs?: number;
  /** chokidar awaitWriteFinish stability threshold in ms; 0 disables (default: 200) */
  awaitWriteFinishMs?: number;
  /** Clock used for change timestamps */
  now?: () => Date;
}
