/**
 * Watch session: one watched root, its change ledger and its checkpoint
 */

import * as path from "node:path";
import { watch, type FSWatcher } from "chokidar";
import type { Logger, ILogObj } from "tslog";
import { createMutex, type Mutex } from "../utils/async.js";
import { errorMessage } from "../utils/errors.js";
import { normalizeRelativePath, toPosixPath } from "../utils/files.js";
import { createChildLogger, getLogger, logTiming } from "../utils/logger.js";
import { NotificationChannel } from "./channel.js";
import { IgnoreMatcher, isOutside } from "./ignore.js";
import { ChangeLedger } from "./ledger.js";
import { RollbackEngine } from "./rollback.js";
import { SnapshotStore, type SnapshotCreation } from "./snapshot.js";
import { DEFAULT_SUPPRESSION_MS, EventSuppressor } from "./suppressor.js";
import type {
  ChangeListener,
  ChangeNotification,
  ChangeTable,
  CheckpointResult,
  RawWatchEvent,
  RollbackResult,
  SessionState,
  WatchSessionOptions,
} from "./types.js";

const DEFAULT_NOTIFICATION_CAPACITY = 256;
const DEFAULT_AWAIT_WRITE_FINISH_MS = 200;

/**
 * Decode a chokidar event into a {@link RawWatchEvent}. Events that do not
 * describe a filesystem change (ready, raw, error) decode to null.
 */
export function decodeWatcherEvent(eventName: string, filePath: string): RawWatchEvent | null {
  switch (eventName) {
    case "add":
      return { kind: "created", path: filePath, isDirectory: false };
    case "change":
      return { kind: "modified", path: filePath, isDirectory: false };
    case "unlink":
      return { kind: "deleted", path: filePath, isDirectory: false };
    case "addDir":
      return { kind: "created", path: filePath, isDirectory: true };
    case "unlinkDir":
      return { kind: "deleted", path: filePath, isDirectory: true };
    default:
      return null;
  }
}

/**
 * ISO-8601 timestamp truncated to whole seconds
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Monitors one directory tree recursively and owns its checkpoint.
 *
 * Lifecycle is `stopped → running → stopped`; the second stop is terminal
 * and a stopped session cannot be restarted. Checkpoint, cancel and
 * rollback requests are serialized: a request issued while another is in
 * flight waits for it to finish.
 */
export class WatchSession {
  readonly root: string;

  private readonly matcher: IgnoreMatcher;
  private readonly ledger = new ChangeLedger();
  private readonly suppressor: EventSuppressor;
  private readonly snapshot: SnapshotStore;
  private readonly rollbackEngine: RollbackEngine;
  private readonly channel: NotificationChannel<ChangeNotification>;
  private readonly listeners = new Set<ChangeListener>();
  private readonly operations: Mutex = createMutex();
  private readonly logger: Logger<ILogObj>;
  private readonly now: () => Date;
  private readonly options: WatchSessionOptions;

  private watcher: FSWatcher | null = null;
  private currentState: SessionState = "stopped";
  private terminated = false;

  constructor(root: string, options: WatchSessionOptions = {}) {
    this.root = path.resolve(root);
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.logger = createChildLogger(getLogger(), "session");

    this.matcher = new IgnoreMatcher(this.root);
    this.suppressor = new EventSuppressor(options.suppressionMs ?? DEFAULT_SUPPRESSION_MS);
    this.snapshot = new SnapshotStore(this.root, this.matcher, { parentDir: options.stagingDir });
    this.rollbackEngine = new RollbackEngine(
      this.root,
      this.ledger,
      this.snapshot,
      this.suppressor,
    );
    this.channel = new NotificationChannel<ChangeNotification>(
      options.notificationCapacity ?? DEFAULT_NOTIFICATION_CAPACITY,
    );
  }

  get state(): SessionState {
    return this.currentState;
  }

  get hasCheckpoint(): boolean {
    return this.rollbackEngine.active;
  }

  get ignorePatterns(): string[] {
    return this.matcher.patterns;
  }

  /**
   * Bounded queue receiving a notification for every recorded change
   */
  get notifications(): NotificationChannel<ChangeNotification> {
    return this.channel;
  }

  /**
   * Subscribe to recorded changes. Returns an unsubscribe function.
   * Listener errors are logged and never reach the session.
   */
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Subscribe to recursive change notifications for the root. Resolves
   * once the initial scan is complete.
   */
  async start(): Promise<void> {
    if (this.currentState === "running" || this.terminated) {
      return;
    }

    const awaitWriteFinishMs = this.options.awaitWriteFinishMs ?? DEFAULT_AWAIT_WRITE_FINISH_MS;
    const watcher = watch(this.root, {
      persistent: true,
      ignoreInitial: true,
      ignored: (filePath: string) => this.matcher.isIgnored(filePath),
      usePolling: this.options.usePolling ?? false,
      interval: this.options.pollIntervalMs ?? 100,
      awaitWriteFinish:
        awaitWriteFinishMs > 0
          ? { stabilityThreshold: awaitWriteFinishMs, pollInterval: Math.min(100, awaitWriteFinishMs) }
          : false,
    });

    watcher.on("all", (eventName: string, filePath: string) => {
      const event = decodeWatcherEvent(eventName, filePath);
      if (event) {
        this.handleEvent(event);
      }
    });

    watcher.on("error", (error: unknown) => {
      this.logger.error(`Watcher error on ${this.root}: ${errorMessage(error)}`);
    });

    this.watcher = watcher;
    this.currentState = "running";

    await new Promise<void>((resolve) => {
      watcher.once("ready", () => resolve());
    });

    this.logger.info(`Started watching ${this.root}`);
  }

  /**
   * Unsubscribe, close the notification channel and delete any snapshot
   * without restoring it. Safe to call more than once.
   */
  async stop(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    this.terminated = true;

    if (watcher) {
      await watcher.close();
      this.logger.info(`Stopped watching ${this.root}`);
    }
    this.currentState = "stopped";
    this.channel.close();

    await this.operations.withLock(() => this.rollbackEngine.cancel());
  }

  /**
   * Dispatch one decoded filesystem event. Returns the published
   * notification, or null when the event was dropped (directory, ignored,
   * outside the root, or caused by the engine's own write).
   */
  handleEvent(event: RawWatchEvent): ChangeNotification | null {
    if (event.isDirectory) {
      return null;
    }
    if (this.matcher.isIgnored(event.path)) {
      return null;
    }

    const relative = path.relative(this.root, path.resolve(this.root, event.path));
    if (isOutside(relative)) {
      return null;
    }
    const key = toPosixPath(relative);

    if (this.suppressor.consume(key)) {
      this.logger.debug(`Suppressed own write: ${key}`);
      return null;
    }

    const timestamp = formatTimestamp(this.now());
    const kind = this.ledger.register(key, event.kind, timestamp);
    const notification: ChangeNotification = { root: this.root, path: key, kind, timestamp };

    this.channel.push(notification);
    this.notifyListeners(notification);
    return notification;
  }

  private notifyListeners(notification: ChangeNotification): void {
    for (const listener of this.listeners) {
      try {
        const result = listener(notification);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.logListenerFailure(error));
        }
      } catch (error) {
        this.logListenerFailure(error);
      }
    }
  }

  private logListenerFailure(error: unknown): void {
    this.logger.warn(`Change listener for ${this.root} failed: ${errorMessage(error)}`);
  }

  /**
   * Changes since the checkpoint while one is active, all changes otherwise
   */
  getChanges(): ChangeTable {
    return this.ledger.snapshot();
  }

  /**
   * Forget every recorded change. Refused while a checkpoint is active.
   */
  clearAllChanges(): boolean {
    if (this.ledger.checkpointActive) {
      return false;
    }
    this.ledger.clear();
    return true;
  }

  reloadIgnorePatterns(): void {
    this.matcher.reload();
  }

  /**
   * Snapshot the tree and start tracking changes against it. Any previous
   * checkpoint is discarded first; if the new snapshot cannot be created
   * the session is left without a checkpoint.
   */
  async createCheckpoint(): Promise<CheckpointResult> {
    return this.operations.withLock(async () => {
      let created: SnapshotCreation;
      try {
        created = await logTiming(this.logger, "checkpoint", () => this.snapshot.create());
      } catch (error) {
        await this.rollbackEngine.cancel();
        throw error;
      }
      this.ledger.beginCheckpoint();
      return {
        stagingDir: created.dir,
        fileCount: created.files.length,
        warnings: created.warnings,
      };
    });
  }

  /**
   * Discard the checkpoint, keeping live files and the all-time changes.
   * Returns false when there was no checkpoint.
   */
  async cancelCheckpoint(): Promise<boolean> {
    return this.operations.withLock(async () => {
      if (!this.rollbackEngine.active) {
        return false;
      }
      await this.rollbackEngine.cancel();
      this.logger.info(`Cancelled checkpoint of ${this.root}`);
      return true;
    });
  }

  /**
   * Restore the whole tree to the checkpoint and clear all changes
   */
  async rollback(): Promise<RollbackResult> {
    return this.operations.withLock(() =>
      logTiming(this.logger, "rollback", () => this.rollbackEngine.rollbackAll()),
    );
  }

  /**
   * Restore one root-relative path to the checkpoint
   */
  async rollbackFile(relativePath: string): Promise<boolean> {
    return this.operations.withLock(() => this.rollbackEngine.rollbackOne(relativePath));
  }

  /**
   * Location of the checkpoint copy of a root-relative path, if it exists
   */
  async getCheckpointPath(relativePath: string): Promise<string | undefined> {
    return this.rollbackEngine.checkpointPathFor(relativePath);
  }

  /**
   * Absolute live path for a root-relative path, or null when it escapes the root
   */
  resolvePath(relativePath: string): string | null {
    const relative = normalizeRelativePath(relativePath);
    return relative === null ? null : path.join(this.root, relative);
  }
}
