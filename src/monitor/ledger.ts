/**
 * In-memory record of per-file changes
 */

import type { ChangeKind, ChangeRecord, ChangeTable, LedgerView } from "./types.js";

/**
 * Merge a new raw event kind with the kind already recorded for a path.
 *
 * - created + modified → created (still a brand-new file)
 * - deleted + created → modified (the file came back)
 * - anything else → the new kind
 */
export function coalesce(previous: ChangeKind | undefined, next: ChangeKind): ChangeKind {
  if (previous === "created" && next === "modified") return "created";
  if (previous === "deleted" && next === "created") return "modified";
  return next;
}

/**
 * Two change tables for one watched root.
 *
 * The all-time table records every change since the ledger was last
 * cleared. The since-checkpoint table only fills while a checkpoint is
 * active and starts empty each time one begins. Readers see exactly one of
 * them through {@link snapshot}.
 *
 * Every method is synchronous: a call completes before any other event
 * handler or foreground operation can touch the tables.
 */
export class ChangeLedger {
  private readonly all = new Map<string, ChangeRecord>();
  private readonly sinceCheckpoint = new Map<string, ChangeRecord>();
  private active = false;

  get checkpointActive(): boolean {
    return this.active;
  }

  /**
   * Record an event for a root-relative path. Returns the effective kind
   * now visible to readers.
   */
  register(relativePath: string, kind: ChangeKind, timestamp: string): ChangeKind {
    const effectiveAll = coalesce(this.all.get(relativePath)?.kind, kind);
    this.all.set(relativePath, { kind: effectiveAll, timestamp });

    if (!this.active) {
      return effectiveAll;
    }

    const effectiveCheckpoint = coalesce(this.sinceCheckpoint.get(relativePath)?.kind, kind);
    this.sinceCheckpoint.set(relativePath, { kind: effectiveCheckpoint, timestamp });
    return effectiveCheckpoint;
  }

  /**
   * Copy of the visible table: since-checkpoint while a checkpoint is
   * active, all-time otherwise
   */
  snapshot(): ChangeTable {
    return toTable(this.active ? this.sinceCheckpoint : this.all);
  }

  /**
   * Copy of one specific table
   */
  entries(view: LedgerView): ChangeTable {
    return toTable(view === "checkpoint" ? this.sinceCheckpoint : this.all);
  }

  /**
   * Recorded kind for a path, preferring the since-checkpoint table
   */
  kindOf(relativePath: string): ChangeKind | undefined {
    return this.sinceCheckpoint.get(relativePath)?.kind ?? this.all.get(relativePath)?.kind;
  }

  /**
   * Forget a path in both tables
   */
  remove(relativePath: string): void {
    this.all.delete(relativePath);
    this.sinceCheckpoint.delete(relativePath);
  }

  /**
   * Empty both tables
   */
  clear(): void {
    this.all.clear();
    this.sinceCheckpoint.clear();
  }

  /**
   * Start tracking against a fresh checkpoint
   */
  beginCheckpoint(): void {
    this.sinceCheckpoint.clear();
    this.active = true;
  }

  /**
   * Stop tracking against the checkpoint. `clearAll` also empties the
   * all-time table (full rollback); without it the all-time history stays
   * (cancel).
   */
  endCheckpoint(options: { clearAll?: boolean } = {}): void {
    this.active = false;
    this.sinceCheckpoint.clear();
    if (options.clearAll) {
      this.all.clear();
    }
  }
}

function toTable(source: Map<string, ChangeRecord>): ChangeTable {
  const table: ChangeTable = {};
  for (const [key, record] of source) {
    table[key] = { ...record };
  }
  return table;
}
