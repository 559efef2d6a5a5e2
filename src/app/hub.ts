/**
 * Monitor hub: one watch session per monitored folder
 */

import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import type { FolderRegistry } from "../config/folders.js";
import type { FoldbackConfig } from "../config/schema.js";
import { NotificationChannel } from "../monitor/channel.js";
import { WatchSession } from "../monitor/session.js";
import type {
  ChangeKind,
  ChangeNotification,
  CheckpointResult,
  RollbackResult,
  WatchSessionOptions,
} from "../monitor/types.js";
import { ValidationError, errorMessage } from "../utils/errors.js";
import { isDirectory } from "../utils/files.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

/**
 * One row of the aggregated change list
 */
export interface ChangeEntry {
  folder: string;
  path: string;
  kind: ChangeKind;
  timestamp: string;
}

export interface ChangeFilter {
  /** Only changes under this watched folder */
  folder?: string;
  kind?: ChangeKind;
  /** Case-insensitive substring of the relative path */
  search?: string;
}

/**
 * Per-folder result of a hub-wide operation
 */
export type FolderOutcome<T> =
  | { folder: string; ok: true; value: T }
  | { folder: string; ok: false; error: string };

export type SessionFactory = (root: string, options: WatchSessionOptions) => WatchSession;

/**
 * Session options derived from the configuration file
 */
export function sessionOptionsFrom(config: FoldbackConfig): WatchSessionOptions {
  return {
    suppressionMs: config.suppressionMs,
    notificationCapacity: config.notificationCapacity,
    stagingDir: config.stagingDir,
    usePolling: config.watcher.usePolling,
    pollIntervalMs: config.watcher.pollIntervalMs,
    awaitWriteFinishMs: config.watcher.awaitWriteFinishMs,
  };
}

/**
 * Runs a {@link WatchSession} per folder and fans their notifications into
 * one channel.
 */
export class MonitorHub {
  private readonly sessionsByRoot = new Map<string, WatchSession>();
  private readonly unsubscribers = new Map<string, () => void>();
  private readonly channel: NotificationChannel<ChangeNotification>;
  private readonly sessionOptions: WatchSessionOptions;
  private readonly createSession: SessionFactory;
  private readonly logger: Logger<ILogObj>;
  private running = false;

  constructor(
    private readonly registry: FolderRegistry,
    config: FoldbackConfig,
    options: { createSession?: SessionFactory } = {},
  ) {
    this.sessionOptions = sessionOptionsFrom(config);
    this.channel = new NotificationChannel<ChangeNotification>(config.notificationCapacity);
    this.createSession = options.createSession ?? ((root, opts) => new WatchSession(root, opts));
    this.logger = createChildLogger(getLogger(), "hub");
  }

  /**
   * Notifications from every session
   */
  get notifications(): NotificationChannel<ChangeNotification> {
    return this.channel;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start watching. Without explicit folders the persisted list is used,
   * after dropping folders that no longer exist. Explicit folders are
   * watched for this run only. Folders whose session fails to start are
   * logged and left out of the returned list.
   */
  async start(folders?: string[]): Promise<string[]> {
    if (this.running) {
      return this.folders();
    }

    let targets: string[];
    if (folders && folders.length > 0) {
      targets = [];
      for (const folder of folders) {
        const resolved = path.resolve(folder);
        if (!(await isDirectory(resolved))) {
          throw new ValidationError(`Not a directory: ${resolved}`, { field: "folder" });
        }
        if (!targets.includes(resolved)) targets.push(resolved);
      }
    } else {
      const dropped = await this.registry.prune();
      for (const folder of dropped) {
        this.logger.warn(`Dropped missing folder from the list: ${folder}`);
      }
      targets = await this.registry.folders();
    }

    this.running = true;
    const started: string[] = [];
    for (const folder of targets) {
      try {
        await this.startSession(folder);
        started.push(folder);
      } catch (error) {
        this.logger.error(`Could not watch ${folder}: ${errorMessage(error)}`);
      }
    }
    return started;
  }

  /**
   * Stop every session and close the hub channel
   */
  async stop(): Promise<void> {
    this.running = false;
    const roots = [...this.sessionsByRoot.keys()];
    for (const root of roots) {
      await this.stopSession(root);
    }
    this.channel.close();
  }

  /**
   * Persist a folder and, while running, start watching it.
   * Returns false when it was already monitored.
   */
  async addFolder(folder: string): Promise<boolean> {
    const resolved = path.resolve(folder);
    if (!(await isDirectory(resolved))) {
      throw new ValidationError(`Not a directory: ${resolved}`, { field: "folder" });
    }

    const added = await this.registry.add(resolved);
    if (this.running && !this.sessionsByRoot.has(resolved)) {
      await this.startSession(resolved);
      return true;
    }
    return added;
  }

  /**
   * Forget a folder and stop its session. Returns false when it was unknown.
   */
  async removeFolder(folder: string): Promise<boolean> {
    const resolved = path.resolve(folder);
    const removed = await this.registry.remove(resolved);
    const hadSession = this.sessionsByRoot.has(resolved);
    await this.stopSession(resolved);
    return removed || hadSession;
  }

  session(folder: string): WatchSession | undefined {
    return this.sessionsByRoot.get(path.resolve(folder));
  }

  sessions(): WatchSession[] {
    return [...this.sessionsByRoot.values()];
  }

  folders(): string[] {
    return [...this.sessionsByRoot.keys()];
  }

  /**
   * Changes across all sessions, sorted by folder then path
   */
  listChanges(filter: ChangeFilter = {}): ChangeEntry[] {
    const folderFilter = filter.folder ? path.resolve(filter.folder) : undefined;
    const search = filter.search?.toLowerCase();
    const entries: ChangeEntry[] = [];

    for (const [folder, session] of this.sessionsByRoot) {
      if (folderFilter && folder !== folderFilter) continue;

      for (const [relative, record] of Object.entries(session.getChanges())) {
        if (filter.kind && record.kind !== filter.kind) continue;
        if (search && !relative.toLowerCase().includes(search)) continue;
        entries.push({ folder, path: relative, kind: record.kind, timestamp: record.timestamp });
      }
    }

    return entries.sort(
      (a, b) => compareStrings(a.folder, b.folder) || compareStrings(a.path, b.path),
    );
  }

  /**
   * Create a checkpoint in every session that has none
   */
  async checkpointAll(): Promise<FolderOutcome<CheckpointResult>[]> {
    const targets = this.sessions().filter((s) => !s.hasCheckpoint);
    return this.forEachSession(targets, (s) => s.createCheckpoint());
  }

  /**
   * Roll back every session that has a checkpoint
   */
  async rollbackAll(): Promise<FolderOutcome<RollbackResult>[]> {
    const targets = this.sessions().filter((s) => s.hasCheckpoint);
    return this.forEachSession(targets, (s) => s.rollback());
  }

  /**
   * Cancel the checkpoint of every session that has one
   */
  async cancelAll(): Promise<FolderOutcome<boolean>[]> {
    const targets = this.sessions().filter((s) => s.hasCheckpoint);
    return this.forEachSession(targets, (s) => s.cancelCheckpoint());
  }

  private async forEachSession<T>(
    targets: WatchSession[],
    operation: (session: WatchSession) => Promise<T>,
  ): Promise<FolderOutcome<T>[]> {
    const outcomes: FolderOutcome<T>[] = [];
    for (const session of targets) {
      try {
        outcomes.push({ folder: session.root, ok: true, value: await operation(session) });
      } catch (error) {
        this.logger.error(`Operation on ${session.root} failed: ${errorMessage(error)}`);
        outcomes.push({ folder: session.root, ok: false, error: errorMessage(error) });
      }
    }
    return outcomes;
  }

  private async startSession(root: string): Promise<void> {
    if (this.sessionsByRoot.has(root)) return;

    const session = this.createSession(root, this.sessionOptions);
    try {
      await session.start();
    } catch (error) {
      await session.stop();
      throw error;
    }

    this.unsubscribers.set(
      root,
      session.onChange((notification) => {
        this.channel.push(notification);
      }),
    );
    this.sessionsByRoot.set(root, session);
  }

  private async stopSession(root: string): Promise<void> {
    const session = this.sessionsByRoot.get(root);
    if (!session) return;

    this.sessionsByRoot.delete(root);
    this.unsubscribers.get(root)?.();
    this.unsubscribers.delete(root);
    await session.stop();
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
