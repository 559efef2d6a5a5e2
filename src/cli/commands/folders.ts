/**
 * Folders command - Manage the persisted list of monitored folders
 */

import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { FolderRegistry } from "../../config/folders.js";
import { ValidationError } from "../../utils/errors.js";
import { isDirectory } from "../../utils/files.js";
import { loadContext, type GlobalOptions } from "../context.js";

export function registerFoldersCommand(program: Command): void {
  const foldersCmd = program.command("folders").description("Manage monitored folders");

  foldersCmd
    .command("list")
    .description("List monitored folders")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      const { registry } = await loadContext(program.opts<GlobalOptions>());
      await runFoldersList(registry, options);
    });

  foldersCmd
    .command("add <path>")
    .description("Add a folder to monitor")
    .action(async (folder: string) => {
      const { registry } = await loadContext(program.opts<GlobalOptions>());
      await runFoldersAdd(registry, folder);
    });

  foldersCmd
    .command("remove <path>")
    .alias("rm")
    .description("Stop monitoring a folder")
    .action(async (folder: string) => {
      const { registry } = await loadContext(program.opts<GlobalOptions>());
      await runFoldersRemove(registry, folder);
    });
}

export async function runFoldersList(
  registry: FolderRegistry,
  options: { json?: boolean } = {},
): Promise<void> {
  const folders = await registry.folders();

  if (options.json) {
    console.log(JSON.stringify(folders, null, 2));
    return;
  }

  if (folders.length === 0) {
    p.log.info("No folders are monitored. Add one with `foldback folders add <path>`.");
    return;
  }

  const lines: string[] = [];
  for (const [index, folder] of folders.entries()) {
    const missing = (await isDirectory(folder)) ? "" : chalk.red(" (missing)");
    lines.push(`${chalk.dim(`${index + 1}.`)} ${folder}${missing}`);
  }
  p.log.info(lines.join("\n"));
}

export async function runFoldersAdd(registry: FolderRegistry, folder: string): Promise<void> {
  const resolved = path.resolve(folder);
  if (!(await isDirectory(resolved))) {
    throw new ValidationError(`Not a directory: ${resolved}`, { field: "path" });
  }

  if (await registry.add(resolved)) {
    p.log.success(`Now monitoring ${chalk.cyan(resolved)}`);
  } else {
    p.log.warning(`Already monitoring ${resolved}`);
  }
}

export async function runFoldersRemove(registry: FolderRegistry, folder: string): Promise<void> {
  const resolved = path.resolve(folder);
  if (await registry.remove(resolved)) {
    p.log.success(`Stopped monitoring ${chalk.cyan(resolved)}`);
  } else {
    p.log.warning(`Not a monitored folder: ${resolved}`);
  }
}
