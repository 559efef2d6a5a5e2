/**
 * Configuration loader for foldback
 *
 * Reads ~/.foldback/config.json (JSON5 accepted, so hand edits may carry
 * comments and trailing commas). A missing file yields the defaults.
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import { FoldbackConfigSchema, createDefaultConfig, type FoldbackConfig } from "./schema.js";
import { ConfigError } from "../utils/errors.js";
import { isErrnoException } from "../utils/files.js";
import { CONFIG_PATHS } from "./paths.js";

/**
 * Load configuration, falling back to defaults when the file does not exist
 */
export async function loadConfig(configPath: string = CONFIG_PATHS.config): Promise<FoldbackConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return createDefaultConfig();
    }
    throw new ConfigError("Failed to read configuration", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError("Configuration is not valid JSON", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = FoldbackConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    throw new ConfigError("Invalid configuration", { issues, configPath });
  }

  return result.data;
}

/**
 * Save configuration as pretty-printed JSON
 */
export async function saveConfig(
  config: FoldbackConfig,
  configPath: string = CONFIG_PATHS.config,
): Promise<void> {
  try {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
  } catch (error) {
    throw new ConfigError("Failed to save configuration", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
