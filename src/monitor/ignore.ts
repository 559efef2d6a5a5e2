/**
 * Ignore rules for tracking and snapshotting
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Minimatch } from "minimatch";
import type { Logger, ILogObj } from "tslog";
import { IGNORE_FILENAME } from "../config/paths.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

/**
 * Patterns that are always ignored: VCS metadata, dependency caches,
 * OS metadata, temp and log files, IDE folders and backup copies.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  ".git",
  ".svn",
  ".hg",
  "__pycache__",
  "*.pyc",
  "*.pyo",
  "node_modules",
  ".DS_Store",
  "Thumbs.db",
  "*.tmp",
  "*.log",
  "*.swp",
  ".idea",
  ".vscode",
  "*.egg-info",
  ".foldback_backup",
];

const MATCH_OPTIONS = { dot: true, nonegate: true, nocomment: true } as const;

/**
 * Parse the contents of an ignore file: one pattern per line,
 * blank lines and `#` comments skipped.
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Decides whether a path below the watched root is excluded.
 *
 * A path is ignored when any single segment, or the whole root-relative
 * path, matches any pattern. `node_modules` therefore blocks the folder
 * anywhere in the tree while `build/output/*.bin` targets one location.
 *
 * Rules are read once at construction and only change on {@link reload}.
 */
export class IgnoreMatcher {
  private readonly root: string;
  private readonly logger: Logger<ILogObj>;
  private rules: { pattern: string; matcher: Minimatch }[] = [];

  constructor(root: string, logger: Logger<ILogObj> = createChildLogger(getLogger(), "ignore")) {
    this.root = path.resolve(root);
    this.logger = logger;
    this.reload();
  }

  /**
   * Active patterns, built-ins first
   */
  get patterns(): string[] {
    return this.rules.map((rule) => rule.pattern);
  }

  /**
   * Re-read the override file at the root
   */
  reload(): void {
    const patterns = [...DEFAULT_IGNORE_PATTERNS, ...this.readOverrideFile()];
    this.rules = patterns.map((pattern) => ({
      pattern,
      matcher: new Minimatch(pattern, MATCH_OPTIONS),
    }));
  }

  /**
   * Check an absolute path, or a path relative to the root.
   * Paths outside the root are never ignored here.
   */
  isIgnored(target: string): boolean {
    const absolute = path.resolve(this.root, target);
    const relative = path.relative(this.root, absolute);
    if (isOutside(relative)) {
      return false;
    }

    const segments = relative.split(path.sep);
    const relativePosix = segments.join("/");

    return this.rules.some(
      ({ matcher }) =>
        segments.some((segment) => matcher.match(segment)) || matcher.match(relativePosix),
    );
  }

  private readOverrideFile(): string[] {
    const file = path.join(this.root, IGNORE_FILENAME);
    try {
      return parseIgnoreFile(fs.readFileSync(file, "utf-8"));
    } catch (error) {
      this.logger.debug(`No usable ${IGNORE_FILENAME} in ${this.root}, using built-in patterns`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}

/**
 * True for "", ".." and paths that climb out of the base directory
 */
export function isOutside(relative: string): boolean {
  return (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  );
}
