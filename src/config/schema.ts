/**
 * Configuration schema for foldback
 */

import { z } from "zod";

/**
 * Watcher tuning passed through to chokidar
 */
export const WatcherConfigSchema = z.object({
  usePolling: z.boolean().default(false),
  pollIntervalMs: z.number().int().min(10).default(100),
  /** Wait for a file size to settle this long before reporting it; 0 disables */
  awaitWriteFinishMs: z.number().int().min(0).default(200),
});

export type WatcherConfig = z.infer<typeof WatcherConfigSchema>;

/**
 * Complete foldback configuration
 */
export const FoldbackConfigSchema = z.object({
  /** Absolute paths of monitored folders, in insertion order */
  folders: z.array(z.string().min(1)).default([]),
  /** How long the engine ignores events for a path it has just written */
  suppressionMs: z.number().int().min(100).default(3000),
  /** Pending change notifications kept per session before the oldest is dropped */
  notificationCapacity: z.number().int().min(1).max(10000).default(256),
  /** Parent directory for checkpoint staging directories (default: OS temp dir) */
  stagingDir: z.string().min(1).optional(),
  logLevel: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  watcher: WatcherConfigSchema.default({}),
});

export type FoldbackConfig = z.infer<typeof FoldbackConfigSchema>;

/**
 * Create the default configuration
 */
export function createDefaultConfig(): FoldbackConfig {
  return FoldbackConfigSchema.parse({});
}
