#!/usr/bin/env node

/**
 * foldback CLI entry point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { CONFIG_PATHS } from "../config/paths.js";
import { registerFoldersCommand } from "./commands/folders.js";
import { registerWatchCommand } from "./commands/watch.js";
import { registerDiffCommand } from "./commands/diff.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("foldback")
  .description("Watch folders, checkpoint them and roll changes back")
  .version(VERSION, "-v, --version", "Output the current version")
  .option("-c, --config <path>", "Configuration file", CONFIG_PATHS.config)
  .option("--log-level <level>", "Log level (silly, trace, debug, info, warn, error, fatal)");

registerFoldersCommand(program);
registerWatchCommand(program);
registerDiffCommand(program);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
