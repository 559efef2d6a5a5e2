/**
 * Diff command - Compare a file with a saved copy
 */

import path from "node:path";
import { Command } from "commander";
import { createFileDiff, formatFileDiff } from "../../diff/renderer.js";

export function registerDiffCommand(program: Command): void {
  program
    .command("diff <current> [checkpoint]")
    .description("Show a unified diff between a saved copy and the current file")
    .action(async (current: string, checkpoint: string | undefined) => {
      await runDiff(current, checkpoint);
    });
}

export async function runDiff(current: string, checkpoint?: string): Promise<void> {
  const fileDiff = await createFileDiff({
    relativePath: path.basename(current),
    currentPath: path.resolve(current),
    checkpointPath: checkpoint === undefined ? undefined : path.resolve(checkpoint),
  });
  console.log(formatFileDiff(fileDiff));
  if (fileDiff.status === "error") {
    process.exitCode = 1;
  }
}
