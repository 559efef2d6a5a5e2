/**
 * Restores a watched tree to its checkpoint state
 */

import * as path from "node:path";
import type { Logger, ILogObj } from "tslog";
import {
  copyFilePreserving,
  fileExists,
  normalizeRelativePath,
  removeFile,
} from "../utils/files.js";
import { errorMessage } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import type { ChangeLedger } from "./ledger.js";
import type { SnapshotStore } from "./snapshot.js";
import type { EventSuppressor } from "./suppressor.js";
import type { FileFailure, RollbackResult } from "./types.js";

/**
 * Full and per-file rollback against the live snapshot.
 *
 * Every write is preceded by a suppression of the written path so the
 * resulting filesystem event is not recorded as a user change.
 */
export class RollbackEngine {
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly root: string,
    private readonly ledger: ChangeLedger,
    private readonly snapshot: SnapshotStore,
    private readonly suppressor: EventSuppressor,
    logger?: Logger<ILogObj>,
  ) {
    this.logger = logger ?? createChildLogger(getLogger(), "rollback");
  }

  /**
   * True while a checkpoint is being tracked and its snapshot exists
   */
  get active(): boolean {
    return this.ledger.checkpointActive && this.snapshot.dir !== null;
  }

  /**
   * Restore every staged file, delete files created since the checkpoint,
   * then end the checkpoint and clear both ledger tables. Per-file errors
   * are collected; the checkpoint ends regardless.
   */
  async rollbackAll(): Promise<RollbackResult> {
    const stagingDir = this.snapshot.dir;
    if (!this.ledger.checkpointActive || stagingDir === null) {
      return { success: false, reason: "no-checkpoint", restored: [], removed: [], failures: [] };
    }

    const failures: FileFailure[] = [];
    const restored: string[] = [];
    const removed: string[] = [];

    const staged = await this.snapshot.listFiles((absolute, error) => {
      failures.push({ path: absolute, error: errorMessage(error) });
    });

    for (const relative of staged) {
      const source = path.join(stagingDir, relative);
      try {
        this.suppressor.suppress(relative);
        await copyFilePreserving(source, this.livePath(relative));
        restored.push(relative);
      } catch (error) {
        failures.push({ path: source, error: errorMessage(error) });
      }
    }

    const createdSinceCheckpoint = Object.entries(this.ledger.entries("checkpoint"))
      .filter(([, record]) => record.kind === "created")
      .map(([relative]) => relative);

    for (const relative of createdSinceCheckpoint) {
      const target = this.livePath(relative);
      try {
        if (await fileExists(target)) {
          this.suppressor.suppress(relative);
          await removeFile(target);
          removed.push(relative);
        }
      } catch (error) {
        failures.push({ path: target, error: errorMessage(error) });
      }
    }

    await this.snapshot.discard();
    this.ledger.endCheckpoint({ clearAll: true });

    if (failures.length > 0) {
      this.logger.warn(
        `Rollback of ${this.root} finished with ${failures.length} error(s):\n` +
          failures.map((f) => `  ${f.path}: ${f.error}`).join("\n"),
      );
    }
    this.logger.info(
      `Rolled back ${this.root}: ${restored.length} restored, ${removed.length} removed`,
    );

    return { success: failures.length === 0, restored, removed, failures };
  }

  /**
   * Restore one root-relative path to its checkpoint state.
   *
   * A file created since the checkpoint is deleted; otherwise its staged
   * copy is written back, or the live file is deleted when no copy exists.
   * A path that is neither tracked nor staged is left alone and reported as
   * a failure.
   */
  async rollbackOne(relativePath: string): Promise<boolean> {
    if (!this.active) {
      return false;
    }

    const relative = normalizeRelativePath(relativePath);
    if (!relative) {
      this.logger.warn(`Refusing to roll back path outside ${this.root}: ${relativePath}`);
      return false;
    }

    const kind = this.ledger.kindOf(relative);
    const staged = await this.snapshot.existingPathFor(relative);
    if (kind === undefined && !staged) {
      this.logger.warn(`Nothing to roll back for untracked path ${relative}`);
      return false;
    }

    const target = this.livePath(relative);
    try {
      if (kind !== "created" && staged) {
        this.suppressor.suppress(relative);
        await copyFilePreserving(staged, target);
      } else if (await fileExists(target)) {
        this.suppressor.suppress(relative);
        await removeFile(target);
      }
    } catch (error) {
      this.logger.warn(`Rollback of ${relative} in ${this.root} failed: ${errorMessage(error)}`);
      return false;
    }

    this.ledger.remove(relative);
    return true;
  }

  /**
   * Staged copy of a root-relative path, if it exists on disk
   */
  async checkpointPathFor(relativePath: string): Promise<string | undefined> {
    const relative = normalizeRelativePath(relativePath);
    if (!relative || !this.active) {
      return undefined;
    }
    return this.snapshot.existingPathFor(relative);
  }

  /**
   * End the checkpoint without touching live files. The all-time table is
   * kept, so monitoring continues as if no checkpoint had existed.
   */
  async cancel(): Promise<void> {
    await this.snapshot.discard();
    this.ledger.endCheckpoint();
  }

  private livePath(relative: string): string {
    return path.join(this.root, relative);
  }
}

