/**
 * Diff between a checkpoint copy and the live file
 */

import * as fs from "node:fs/promises";
import chalk from "chalk";
import * as diff from "diff";
import { errorMessage } from "../utils/errors.js";
import { isErrnoException } from "../utils/files.js";

/** Bytes inspected for a NUL byte when deciding whether a file is binary */
export const BINARY_SNIFF_BYTES = 8192;

/** Unchanged lines shown around each hunk */
export const DIFF_CONTEXT_LINES = 4;

/**
 * One side of a diff as read from disk
 */
export type DiffSide =
  | { state: "missing" }
  | { state: "binary" }
  | { state: "error"; message: string }
  | { state: "text"; content: string };

export type FileDiff =
  | { status: "missing"; relativePath: string }
  | { status: "binary"; relativePath: string }
  | { status: "error"; relativePath: string; message: string }
  | { status: "identical"; relativePath: string }
  | { status: "changed"; relativePath: string; patch: string; added: number; removed: number };

export interface FileDiffRequest {
  relativePath: string;
  /** Live file; may not exist when the file was deleted */
  currentPath: string;
  /** Checkpoint copy; absent when the file did not exist at checkpoint time */
  checkpointPath?: string;
}

/**
 * Read one side of a diff
 */
export async function readSide(filePath: string | undefined): Promise<DiffSide> {
  if (filePath === undefined) {
    return { state: "missing" };
  }

  let raw: Buffer;
  try {
    raw = await fs.readFile(filePath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return { state: "missing" };
    }
    return { state: "error", message: errorMessage(error) };
  }

  if (raw.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
    return { state: "binary" };
  }
  return { state: "text", content: raw.toString("utf-8") };
}

/**
 * Compare the checkpoint copy of a file with its live version.
 * A missing side diffs as an empty file.
 */
export async function createFileDiff(request: FileDiffRequest): Promise<FileDiff> {
  const { relativePath } = request;
  const [before, after] = await Promise.all([
    readSide(request.checkpointPath),
    readSide(request.currentPath),
  ]);

  if (before.state === "missing" && after.state === "missing") {
    return { status: "missing", relativePath };
  }
  if (before.state === "error") {
    return { status: "error", relativePath, message: before.message };
  }
  if (after.state === "error") {
    return { status: "error", relativePath, message: after.message };
  }
  if (before.state === "binary" || after.state === "binary") {
    return { status: "binary", relativePath };
  }

  const oldContent = before.state === "text" ? before.content : "";
  const newContent = after.state === "text" ? after.content : "";
  if (oldContent === newContent) {
    return { status: "identical", relativePath };
  }

  const oldName = `checkpoint/${relativePath}`;
  const newName = `current/${relativePath}`;
  const options = { context: DIFF_CONTEXT_LINES };

  const patch = diff.createTwoFilesPatch(
    oldName,
    newName,
    oldContent,
    newContent,
    undefined,
    undefined,
    options,
  );

  let added = 0;
  let removed = 0;
  const structured = diff.structuredPatch(
    oldName,
    newName,
    oldContent,
    newContent,
    undefined,
    undefined,
    options,
  );
  for (const hunk of structured.hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith("+")) added++;
      else if (line.startsWith("-")) removed++;
    }
  }

  return { status: "changed", relativePath, patch, added, removed };
}

/**
 * Render a diff for the terminal
 */
export function formatFileDiff(fileDiff: FileDiff): string {
  switch (fileDiff.status) {
    case "missing":
      return chalk.yellow(`${fileDiff.relativePath}: not found in the checkpoint or on disk`);
    case "binary":
      return chalk.yellow(`${fileDiff.relativePath}: binary file, diff not shown`);
    case "error":
      return chalk.red(`${fileDiff.relativePath}: could not read file: ${fileDiff.message}`);
    case "identical":
      return chalk.dim(`${fileDiff.relativePath}: identical to the checkpoint`);
    case "changed":
      return formatPatch(fileDiff.patch, fileDiff.added, fileDiff.removed);
  }
}

function formatPatch(patch: string, added: number, removed: number): string {
  const output: string[] = [];
  let inHeader = true;

  for (const line of patch.split("\n")) {
    if (!line || line.startsWith("====")) continue;

    if (line.startsWith("@@")) {
      inHeader = false;
      output.push(chalk.cyan(line));
    } else if (inHeader) {
      output.push(chalk.gray(line));
    } else if (line.startsWith("+")) {
      output.push(chalk.green(line));
    } else if (line.startsWith("-")) {
      output.push(chalk.red(line));
    } else {
      output.push(chalk.gray(line));
    }
  }

  output.push(chalk.dim(`Stats: ${chalk.green(`+${added}`)} ${chalk.red(`-${removed}`)}`));
  return output.join("\n");
}
