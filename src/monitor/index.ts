/**
 * Folder monitoring and checkpoint engine
 */

export { NotificationChannel } from "./channel.js";
export { DEFAULT_IGNORE_PATTERNS, IgnoreMatcher, parseIgnoreFile } from "./ignore.js";
export { ChangeLedger, coalesce } from "./ledger.js";
export { RollbackEngine } from "./rollback.js";
export { WatchSession, decodeWatcherEvent, formatTimestamp } from "./session.js";
export { SnapshotStore, type SnapshotCreation } from "./snapshot.js";
export { DEFAULT_SUPPRESSION_MS, EventSuppressor } from "./suppressor.js";
export { CHANGE_KINDS } from "./types.js";
export type {
  ChangeKind,
  ChangeListener,
  ChangeNotification,
  ChangeRecord,
  ChangeTable,
  CheckpointResult,
  FileFailure,
  LedgerView,
  RawWatchEvent,
  RollbackResult,
  SessionState,
  WatchSessionOptions,
} from "./types.js";
