/**
 * Shared setup for CLI commands
 */

import { FolderRegistry } from "../config/folders.js";
import { CONFIG_PATHS } from "../config/paths.js";
import type { FoldbackConfig } from "../config/schema.js";
import { ValidationError } from "../utils/errors.js";
import { LOG_LEVELS, initializeLogging, type LogLevel } from "../utils/logger.js";

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  config: string;
  logLevel?: string;
}

export interface CliContext {
  config: FoldbackConfig;
  registry: FolderRegistry;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
  if (!level) {
    throw new ValidationError(
      `Unknown log level '${value}'. Expected one of: ${LOG_LEVELS.join(", ")}`,
      { field: "logLevel" },
    );
  }
  return level;
}

/**
 * Load the configuration and set up logging. The --log-level flag wins
 * over the configured level.
 */
export async function loadContext(options: GlobalOptions): Promise<CliContext> {
  const level = parseLogLevel(options.logLevel);
  const registry = new FolderRegistry(options.config);
  const config = await registry.load();
  initializeLogging(CONFIG_PATHS.logs, level ?? config.logLevel);
  return { config, registry };
}
