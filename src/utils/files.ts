/**
 * File utilities for foldback
 */

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { FileSystemError } from "./errors.js";

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is an existing directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Copy a file, keeping its permission bits and access/modification times.
 * Parent directories of the destination are created as needed.
 */
export async function copyFilePreserving(source: string, destination: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.copyFile(source, destination);
    const stat = await fs.stat(source);
    await fs.chmod(destination, stat.mode & 0o7777);
    await fs.utimes(destination, stat.atime, stat.mtime);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file from ${source} to ${destination}`, {
      path: source,
      operation: "copy",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Remove a file. A file that is already gone is not an error.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return;
    }
    throw new FileSystemError(`Failed to remove: ${filePath}`, {
      path: filePath,
      operation: "delete",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Options for {@link listFilesRecursive}
 */
export interface ListFilesOptions {
  /** Directories for which this returns true are not descended into */
  skipDir?: (absolutePath: string) => boolean;
  skipFile?: (absolutePath: string) => boolean;
  /** When given, unreadable directories are reported here and skipped instead of failing the walk */
  onError?: (absolutePath: string, error: unknown) => void;
}

/**
 * List every regular file below a directory as sorted forward-slash relative paths.
 */
export async function listFilesRecursive(
  dir: string,
  options: ListFilesOptions = {},
): Promise<string[]> {
  const files: string[] = [];

  async function walk(current: string, prefix: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      if (!options.onError) {
        throw new FileSystemError(`Failed to read directory: ${current}`, {
          path: current,
          operation: "walk",
          cause: error instanceof Error ? error : undefined,
        });
      }
      options.onError(current, error);
      return;
    }
    for (const entry of entries) {
      const absolute = path.join(current, entry.name);
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (options.skipDir?.(absolute)) continue;
        await walk(absolute, relative);
      } else if (entry.isFile()) {
        if (options.skipFile?.(absolute)) continue;
        files.push(relative);
      }
    }
  }

  await walk(dir, "");
  return files.sort();
}

/**
 * Convert a path to forward-slash form
 */
export function toPosixPath(p: string): string {
  return p.split(path.sep).join("/");
}

/**
 * Narrow an unknown error to a Node.js errno exception
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Normalize a caller-supplied root-relative path to forward-slash form.
 * Returns null for paths that are empty, absolute or climb out of the root.
 */
export function normalizeRelativePath(relativePath: string): string | null {
  const normalized = path.posix.normalize(relativePath.replace(/\\/g, "/"));
  if (
    normalized === "." ||
    normalized === ".." ||
    normalized.startsWith("../") ||
    path.posix.isAbsolute(normalized) ||
    path.isAbsolute(relativePath)
  ) {
    return null;
  }
  return normalized.replace(/\/$/, "");
}
