/**
 * Persisted list of monitored folders
 */

import path from "node:path";
import { loadConfig, saveConfig } from "./loader.js";
import { CONFIG_PATHS } from "./paths.js";
import type { FoldbackConfig } from "./schema.js";
import { isDirectory } from "../utils/files.js";

/**
 * Ordered, de-duplicated set of absolute folder paths stored in the
 * `folders` key of the configuration file. Every mutation is written back
 * immediately; the rest of the configuration is preserved.
 */
export class FolderRegistry {
  private config: FoldbackConfig | null = null;

  constructor(private readonly configPath: string = CONFIG_PATHS.config) {}

  /**
   * Load (or reload) the configuration file
   */
  async load(): Promise<FoldbackConfig> {
    this.config = await loadConfig(this.configPath);
    return this.config;
  }

  /**
   * Monitored folders in insertion order
   */
  async folders(): Promise<string[]> {
    const config = await this.ensureLoaded();
    return [...config.folders];
  }

  async has(folder: string): Promise<boolean> {
    const config = await this.ensureLoaded();
    return config.folders.includes(path.resolve(folder));
  }

  /**
   * Add a folder. Returns true if it was new.
   */
  async add(folder: string): Promise<boolean> {
    const config = await this.ensureLoaded();
    const normalized = path.resolve(folder);
    if (config.folders.includes(normalized)) {
      return false;
    }
    config.folders.push(normalized);
    await saveConfig(config, this.configPath);
    return true;
  }

  /**
   * Remove a folder. Returns true if it existed.
   */
  async remove(folder: string): Promise<boolean> {
    const config = await this.ensureLoaded();
    const normalized = path.resolve(folder);
    const index = config.folders.indexOf(normalized);
    if (index === -1) {
      return false;
    }
    config.folders.splice(index, 1);
    await saveConfig(config, this.configPath);
    return true;
  }

  /**
   * Drop folders that are no longer directories. Returns the dropped paths.
   */
  async prune(exists: (folder: string) => Promise<boolean> = isDirectory): Promise<string[]> {
    const config = await this.ensureLoaded();
    const kept: string[] = [];
    const dropped: string[] = [];
    for (const folder of config.folders) {
      if (await exists(folder)) {
        kept.push(folder);
      } else {
        dropped.push(folder);
      }
    }
    if (dropped.length > 0) {
      config.folders = kept;
      await saveConfig(config, this.configPath);
    }
    return dropped;
  }

  private async ensureLoaded(): Promise<FoldbackConfig> {
    return this.config ?? this.load();
  }
}
