/**
 * Watch command - Monitor folders and drive checkpoints from stdin
 */

import path from "node:path";
import * as readline from "node:readline";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { MonitorHub } from "../../app/hub.js";
import { createFileDiff, formatFileDiff } from "../../diff/renderer.js";
import { isOutside } from "../../monitor/ignore.js";
import type { WatchSession } from "../../monitor/session.js";
import { CHANGE_KINDS, type ChangeKind, type ChangeNotification } from "../../monitor/types.js";
import { formatError } from "../../utils/errors.js";
import { toPosixPath } from "../../utils/files.js";
import { loadContext, type GlobalOptions } from "../context.js";

/**
 * Parsed stdin command
 */
export type WatchCommand =
  | { name: "changes"; kind?: ChangeKind; search?: string }
  | { name: "checkpoint" }
  | { name: "cancel" }
  | { name: "rollback"; file?: string }
  | { name: "diff"; file: string }
  | { name: "clear" }
  | { name: "reload" }
  | { name: "folders" }
  | { name: "help" }
  | { name: "quit" }
  | { name: "invalid"; message: string };

const HELP_TEXT = [
  "changes [kind] [search]  List recorded changes (kind: created, modified, deleted, moved)",
  "checkpoint               Snapshot every folder without a checkpoint",
  "cancel                   Discard checkpoints, keeping current files",
  "rollback [file]          Restore everything, or one file, to the checkpoint",
  "diff <file>              Show a file's changes since the checkpoint",
  "clear                    Forget recorded changes (only without a checkpoint)",
  "reload                   Re-read ignore files",
  "folders                  List watched folders",
  "help                     Show this help",
  "quit                     Stop watching and exit",
].join("\n");

const KIND_COLORS: Record<ChangeKind, (text: string) => string> = {
  created: chalk.green,
  modified: chalk.yellow,
  deleted: chalk.red,
  moved: chalk.blue,
};

export function registerWatchCommand(program: Command): void {
  program
    .command("watch [paths...]")
    .description("Watch folders (default: the monitored folder list) and accept commands on stdin")
    .option("-q, --quiet", "Do not print changes as they happen")
    .action(async (paths: string[], options: { quiet?: boolean }) => {
      const { config, registry } = await loadContext(program.opts<GlobalOptions>());
      const hub = new MonitorHub(registry, config);
      await runWatch(hub, paths, options);
    });
}

/**
 * Run an interactive watch until `quit` or end of input
 */
export async function runWatch(
  hub: MonitorHub,
  paths: string[],
  options: { quiet?: boolean } = {},
): Promise<void> {
  const folders = await hub.start(paths);
  if (folders.length === 0) {
    p.log.warning("No folders to watch. Pass paths or add some with `foldback folders add <path>`.");
    await hub.stop();
    return;
  }

  p.intro(chalk.cyan(`Watching ${folders.length} folder(s)`));
  p.log.info(formatFolderList(hub));
  p.log.message(chalk.dim("Type `help` for commands."));

  const printer = options.quiet ? Promise.resolve() : printNotifications(hub);

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  try {
    for await (const line of rl) {
      const command = parseWatchCommand(line);
      if (command === null) continue;
      const keepGoing = await executeWatchCommand(hub, command);
      if (!keepGoing) break;
    }
  } finally {
    rl.close();
    await hub.stop();
    await printer;
  }

  p.outro("Stopped watching. Checkpoints were discarded.");
}

async function printNotifications(hub: MonitorHub): Promise<void> {
  const multiple = hub.folders().length > 1;
  for await (const notification of hub.notifications) {
    console.log(formatNotification(hub, notification, multiple));
  }
}

export function formatNotification(
  hub: MonitorHub,
  notification: ChangeNotification,
  showFolder: boolean,
): string {
  const kind = KIND_COLORS[notification.kind](notification.kind.padEnd(8));
  const prefix = showFolder ? `${folderIndex(hub, notification.root)}:` : "";
  return `${chalk.dim(notification.timestamp)} ${kind} ${prefix}${notification.path}`;
}

/**
 * Parse one input line. Blank lines parse to null.
 */
export function parseWatchCommand(line: string): WatchCommand | null {
  const [name, ...args] = line.trim().split(/\s+/).filter(Boolean);
  if (name === undefined) return null;

  switch (name.toLowerCase()) {
    case "changes":
    case "ls": {
      const [first, second] = args;
      if (first === undefined) return { name: "changes" };
      const kind = CHANGE_KINDS.find((k) => k === first.toLowerCase());
      if (kind) return { name: "changes", kind, search: second };
      return { name: "changes", search: first };
    }
    case "checkpoint":
      return { name: "checkpoint" };
    case "cancel":
      return { name: "cancel" };
    case "rollback":
      return { name: "rollback", file: args.join(" ") || undefined };
    case "diff": {
      const file = args.join(" ");
      if (!file) return { name: "invalid", message: "Usage: diff <file>" };
      return { name: "diff", file };
    }
    case "clear":
      return { name: "clear" };
    case "reload":
      return { name: "reload" };
    case "folders":
      return { name: "folders" };
    case "help":
    case "?":
      return { name: "help" };
    case "quit":
    case "exit":
    case "q":
      return { name: "quit" };
    default:
      return { name: "invalid", message: `Unknown command '${name}'. Type \`help\` for commands.` };
  }
}

/**
 * Execute a parsed command. Returns false when the loop should end.
 * Errors are reported and never end the loop.
 */
export async function executeWatchCommand(hub: MonitorHub, command: WatchCommand): Promise<boolean> {
  try {
    switch (command.name) {
      case "changes":
        showChanges(hub, command.kind, command.search);
        return true;
      case "checkpoint":
        await checkpoint(hub);
        return true;
      case "cancel":
        await cancel(hub);
        return true;
      case "rollback":
        await (command.file ? rollbackFile(hub, command.file) : rollbackAll(hub));
        return true;
      case "diff":
        await showDiff(hub, command.file);
        return true;
      case "clear":
        clear(hub);
        return true;
      case "reload":
        for (const session of hub.sessions()) session.reloadIgnorePatterns();
        p.log.success("Ignore patterns reloaded");
        return true;
      case "folders":
        p.log.info(formatFolderList(hub));
        return true;
      case "help":
        p.log.message(HELP_TEXT);
        return true;
      case "quit":
        return false;
      case "invalid":
        p.log.error(command.message);
        return true;
    }
  } catch (error) {
    p.log.error(formatError(error));
    return true;
  }
}

// =============================================================================
// Command handlers
// =============================================================================

function showChanges(hub: MonitorHub, kind?: ChangeKind, search?: string): void {
  const changes = hub.listChanges({ kind, search });
  if (changes.length === 0) {
    p.log.info("No changes recorded");
    return;
  }

  const multiple = hub.folders().length > 1;
  const lines = changes.map((entry) => {
    const prefix = multiple ? `${folderIndex(hub, entry.folder)}:` : "";
    const label = KIND_COLORS[entry.kind](entry.kind.padEnd(8));
    return `${label} ${prefix}${entry.path} ${chalk.dim(entry.timestamp)}`;
  });
  p.log.info(lines.join("\n"));
}

async function checkpoint(hub: MonitorHub): Promise<void> {
  const outcomes = await hub.checkpointAll();
  if (outcomes.length === 0) {
    p.log.warning("Every folder already has a checkpoint");
    return;
  }

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      p.log.error(`${outcome.folder}: checkpoint failed: ${outcome.error}`);
      continue;
    }
    p.log.success(`${outcome.folder}: checkpoint of ${outcome.value.fileCount} file(s)`);
    for (const warning of outcome.value.warnings) {
      p.log.warning(`  not captured: ${warning.path} (${warning.error})`);
    }
  }
}

async function cancel(hub: MonitorHub): Promise<void> {
  const outcomes = await hub.cancelAll();
  if (outcomes.length === 0) {
    p.log.warning("No active checkpoint");
    return;
  }
  for (const outcome of outcomes) {
    if (outcome.ok) {
      p.log.success(`${outcome.folder}: checkpoint discarded`);
    } else {
      p.log.error(`${outcome.folder}: ${outcome.error}`);
    }
  }
}

async function rollbackAll(hub: MonitorHub): Promise<void> {
  const outcomes = await hub.rollbackAll();
  if (outcomes.length === 0) {
    p.log.warning("No active checkpoint");
    return;
  }

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      p.log.error(`${outcome.folder}: rollback failed: ${outcome.error}`);
      continue;
    }
    const { restored, removed, failures } = outcome.value;
    const summary = `${restored.length} restored, ${removed.length} removed`;
    if (failures.length === 0) {
      p.log.success(`${outcome.folder}: rolled back (${summary})`);
    } else {
      p.log.warning(`${outcome.folder}: rolled back with ${failures.length} error(s) (${summary})`);
      for (const failure of failures) {
        p.log.warning(`  ${failure.path}: ${failure.error}`);
      }
    }
  }
}

async function rollbackFile(hub: MonitorHub, file: string): Promise<void> {
  const target = resolveFileArgument(hub, file);
  if (typeof target === "string") {
    p.log.error(target);
    return;
  }
  if (!target.session.hasCheckpoint) {
    p.log.warning(`${target.session.root}: no active checkpoint`);
    return;
  }

  if (await target.session.rollbackFile(target.relativePath)) {
    p.log.success(`Restored ${target.relativePath}`);
  } else {
    p.log.error(`Could not restore ${target.relativePath}`);
  }
}

async function showDiff(hub: MonitorHub, file: string): Promise<void> {
  const target = resolveFileArgument(hub, file);
  if (typeof target === "string") {
    p.log.error(target);
    return;
  }
  const { session, relativePath } = target;
  if (!session.hasCheckpoint) {
    p.log.warning(`${session.root}: no active checkpoint to diff against`);
    return;
  }

  const currentPath = session.resolvePath(relativePath);
  if (currentPath === null) {
    p.log.error(`Path is outside ${session.root}: ${relativePath}`);
    return;
  }

  const fileDiff = await createFileDiff({
    relativePath,
    currentPath,
    checkpointPath: await session.getCheckpointPath(relativePath),
  });
  console.log(formatFileDiff(fileDiff));
}

function clear(hub: MonitorHub): void {
  const refused = hub.sessions().filter((session) => !session.clearAllChanges());
  if (refused.length === 0) {
    p.log.success("Changes cleared");
    return;
  }
  for (const session of refused) {
    p.log.warning(`${session.root}: checkpoint active, cancel or roll back first`);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function folderIndex(hub: MonitorHub, folder: string): number {
  return hub.folders().indexOf(folder) + 1;
}

function formatFolderList(hub: MonitorHub): string {
  return hub
    .sessions()
    .map((session, i) => {
      const marker = session.hasCheckpoint ? chalk.magenta(" [checkpoint]") : "";
      return `${chalk.dim(`${i + 1}.`)} ${session.root}${marker}`;
    })
    .join("\n");
}

/**
 * Resolve a file argument to a session and a root-relative path.
 *
 * Accepted forms: an absolute path inside a watched folder, a relative
 * path when exactly one folder is watched, or `<index>:<relative-path>`.
 * Returns an error message when the argument cannot be resolved.
 */
export function resolveFileArgument(
  hub: MonitorHub,
  argument: string,
): { session: WatchSession; relativePath: string } | string {
  const sessions = hub.sessions();

  if (path.isAbsolute(argument)) {
    for (const session of sessions) {
      const relative = path.relative(session.root, argument);
      if (!isOutside(relative)) {
        return { session, relativePath: toPosixPath(relative) };
      }
    }
    return `Not inside a watched folder: ${argument}`;
  }

  const indexed = /^(\d+):(.+)$/.exec(argument);
  if (indexed) {
    const [, index, relativePath] = indexed;
    const session = sessions[Number(index) - 1];
    if (!session || relativePath === undefined) {
      return `No watched folder #${index}. Type \`folders\` to list them.`;
    }
    return { session, relativePath };
  }

  const [only] = sessions;
  if (sessions.length === 1 && only) {
    return { session: only, relativePath: argument };
  }
  return "Several folders are watched: use <folder-number>:<path>";
}
