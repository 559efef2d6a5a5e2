/**
 * Tests for the folders command
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import * as p from "@clack/prompts";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FolderRegistry } from "../../config/folders.js";
import { ValidationError } from "../../utils/errors.js";
import { runFoldersAdd, runFoldersList, runFoldersRemove } from "./folders.js";

vi.mock("@clack/prompts", () => ({
  log: {
    info: vi.fn(),
    success: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  },
}));

describe("folders command", () => {
  let base: string;
  let project: string;
  let registry: FolderRegistry;

  beforeEach(async () => {
    vi.clearAllMocks();
    base = await fs.mkdtemp(path.join(os.tmpdir(), "foldback-cli-folders-"));
    project = path.join(base, "project");
    await fs.mkdir(project);
    registry = new FolderRegistry(path.join(base, "config.json"));
  });

  afterEach(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  it("should add a directory once", async () => {
    await runFoldersAdd(registry, project);
    await runFoldersAdd(registry, project);

    expect(await registry.folders()).toEqual([project]);
    expect(p.log.warning).toHaveBeenCalledWith(`Already monitoring ${project}`);
  });

  it("should refuse paths that are not directories", async () => {
    await expect(runFoldersAdd(registry, path.join(base, "missing"))).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(await registry.folders()).toEqual([]);
  });

  it("should remove a folder and warn about unknown ones", async () => {
    await registry.add(project);

    await runFoldersRemove(registry, project);
    await runFoldersRemove(registry, project);

    expect(await registry.folders()).toEqual([]);
    expect(p.log.warning).toHaveBeenCalledWith(`Not a monitored folder: ${project}`);
  });

  it("should print the list as JSON", async () => {
    await registry.add(project);
    const print = vi.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      await runFoldersList(registry, { json: true });

      expect(print).toHaveBeenCalledWith(JSON.stringify([project], null, 2));
    } finally {
      print.mockRestore();
    }
  });

  it("should hint at folders add when the list is empty", async () => {
    await runFoldersList(registry);

    expect(p.log.info).toHaveBeenCalledWith(
      "No folders are monitored. Add one with `foldback folders add <path>`.",
    );
  });
});
