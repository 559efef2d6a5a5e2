/**
 * Centralized configuration paths
 *
 * All foldback state is stored in ~/.foldback/ unless FOLDBACK_HOME points elsewhere.
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for all foldback configuration
 */
export const FOLDBACK_HOME = process.env["FOLDBACK_HOME"] || join(homedir(), ".foldback");

/**
 * Configuration paths
 */
export const CONFIG_PATHS = {
  /** Base directory: ~/.foldback/ */
  home: FOLDBACK_HOME,

  /** Main config file with the monitored folder list: ~/.foldback/config.json */
  config: join(FOLDBACK_HOME, "config.json"),

  /** Logs directory: ~/.foldback/logs/ */
  logs: join(FOLDBACK_HOME, "logs"),
} as const;

/**
 * Per-root file holding extra ignore patterns
 */
export const IGNORE_FILENAME = ".foldbackignore";

/**
 * Prefix of checkpoint staging directories
 */
export const STAGING_PREFIX = "foldback-";
