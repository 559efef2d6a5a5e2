/**
 * Point-in-time copy of a watched tree
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { Logger, ILogObj } from "tslog";
import { STAGING_PREFIX } from "../config/paths.js";
import { CheckpointError, errorMessage } from "../utils/errors.js";
import { copyFilePreserving, fileExists, listFilesRecursive } from "../utils/files.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import type { IgnoreMatcher } from "./ignore.js";
import type { FileFailure } from "./types.js";

/**
 * Snapshot created by {@link SnapshotStore.create}
 */
export interface SnapshotCreation {
  dir: string;
  files: string[];
  warnings: FileFailure[];
}

/**
 * Materializes a copy of every non-ignored file of the watched root in a
 * private staging directory mirroring the root's layout. At most one
 * snapshot is live at a time; the store owns its staging directory.
 */
export class SnapshotStore {
  private stagingDir: string | null = null;
  private readonly parentDir: string;
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly root: string,
    private readonly matcher: IgnoreMatcher,
    options: { parentDir?: string; logger?: Logger<ILogObj> } = {},
  ) {
    this.parentDir = options.parentDir ?? os.tmpdir();
    this.logger = options.logger ?? createChildLogger(getLogger(), "snapshot");
  }

  /**
   * Staging directory of the live snapshot
   */
  get dir(): string | null {
    return this.stagingDir;
  }

  /**
   * Copy the watched tree into a fresh staging directory, discarding any
   * previous snapshot first. Files that fail to copy are reported as
   * warnings and the snapshot proceeds without them.
   */
  async create(): Promise<SnapshotCreation> {
    await this.discard();

    const dir = await this.makeStagingDir();
    const warnings: FileFailure[] = [];
    const candidates = await listFilesRecursive(this.root, {
      // a staging parent inside the root must not be copied into itself
      skipDir: (absolute) => absolute === dir || this.matcher.isIgnored(absolute),
      skipFile: (absolute) => this.matcher.isIgnored(absolute),
      onError: (absolute, error) => {
        warnings.push({ path: absolute, error: errorMessage(error) });
      },
    });

    const files: string[] = [];
    for (const relative of candidates) {
      const source = path.join(this.root, relative);
      try {
        await copyFilePreserving(source, path.join(dir, relative));
        files.push(relative);
      } catch (error) {
        warnings.push({ path: source, error: errorMessage(error) });
      }
    }

    this.stagingDir = dir;

    if (warnings.length > 0) {
      this.logger.warn(
        `Checkpoint of ${this.root} skipped ${warnings.length} file(s):\n` +
          warnings.map((w) => `  ${w.path}: ${w.error}`).join("\n"),
      );
    }
    this.logger.info(`Snapshot of ${this.root}: ${files.length} file(s) in ${dir}`);

    return { dir, files, warnings };
  }

  private async makeStagingDir(): Promise<string> {
    try {
      await fs.mkdir(this.parentDir, { recursive: true });
      return await fs.mkdtemp(path.join(this.parentDir, STAGING_PREFIX));
    } catch (error) {
      throw new CheckpointError(`Failed to create staging directory in ${this.parentDir}`, {
        root: this.root,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Staged copy location for a root-relative path, or null without a snapshot
   */
  pathFor(relativePath: string): string | null {
    return this.stagingDir ? path.join(this.stagingDir, relativePath) : null;
  }

  /**
   * Staged copy location if that copy exists on disk
   */
  async existingPathFor(relativePath: string): Promise<string | undefined> {
    const staged = this.pathFor(relativePath);
    if (staged && (await fileExists(staged))) {
      return staged;
    }
    return undefined;
  }

  /**
   * Root-relative paths of every staged file
   */
  async listFiles(onError?: (absolutePath: string, error: unknown) => void): Promise<string[]> {
    if (!this.stagingDir) {
      return [];
    }
    return listFilesRecursive(this.stagingDir, { onError });
  }

  /**
   * Remove the staging directory. Failures are logged, never thrown.
   */
  async discard(): Promise<void> {
    const dir = this.stagingDir;
    this.stagingDir = null;
    if (!dir) {
      return;
    }
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Could not remove staging directory ${dir}: ${errorMessage(error)}`);
    }
  }
}

