/**
 * Tests for the diff renderer
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import chalk from "chalk";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { createFileDiff, formatFileDiff, readSide } from "./renderer.js";

describe("diff renderer", () => {
  let dir: string;
  let originalLevel: typeof chalk.level;

  const file = (name: string) => path.join(dir, name);

  beforeAll(() => {
    originalLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "foldback-diff-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("readSide", () => {
    it("should report a missing or absent path", async () => {
      expect(await readSide(undefined)).toEqual({ state: "missing" });
      expect(await readSide(file("nope.txt"))).toEqual({ state: "missing" });
    });

    it("should read text", async () => {
      await fs.writeFile(file("a.txt"), "hello\n");

      expect(await readSide(file("a.txt"))).toEqual({ state: "text", content: "hello\n" });
    });

    it("should detect a NUL byte as binary", async () => {
      await fs.writeFile(file("img.bin"), Buffer.from([0x89, 0x50, 0x00, 0x47]));

      expect(await readSide(file("img.bin"))).toEqual({ state: "binary" });
    });

    it("should only sniff the first 8192 bytes", async () => {
      const content = Buffer.concat([Buffer.alloc(8192, 0x61), Buffer.from([0x00])]);
      await fs.writeFile(file("late-nul.txt"), content);

      const side = await readSide(file("late-nul.txt"));

      expect(side.state).toBe("text");
    });

    it("should report read errors", async () => {
      await fs.mkdir(file("folder"));

      const side = await readSide(file("folder"));

      expect(side.state).toBe("error");
    });
  });

  describe("createFileDiff", () => {
    it("should report a file missing on both sides", async () => {
      const result = await createFileDiff({
        relativePath: "gone.txt",
        currentPath: file("gone.txt"),
        checkpointPath: file("also-gone.txt"),
      });

      expect(result).toEqual({ status: "missing", relativePath: "gone.txt" });
    });

    it("should report identical files", async () => {
      await fs.writeFile(file("old.txt"), "same\n");
      await fs.writeFile(file("new.txt"), "same\n");

      const result = await createFileDiff({
        relativePath: "x.txt",
        currentPath: file("new.txt"),
        checkpointPath: file("old.txt"),
      });

      expect(result).toEqual({ status: "identical", relativePath: "x.txt" });
    });

    it("should refuse binary content", async () => {
      await fs.writeFile(file("old.bin"), "text\n");
      await fs.writeFile(file("new.bin"), Buffer.from([0x00, 0x01]));

      const result = await createFileDiff({
        relativePath: "x.bin",
        currentPath: file("new.bin"),
        checkpointPath: file("old.bin"),
      });

      expect(result.status).toBe("binary");
    });

    it("should report unreadable sides", async () => {
      await fs.mkdir(file("dir"));

      const result = await createFileDiff({ relativePath: "dir", currentPath: file("dir") });

      expect(result.status).toBe("error");
    });

    it("should produce a unified patch with counts", async () => {
      await fs.writeFile(file("old.txt"), "a\nb\nc\n");
      await fs.writeFile(file("new.txt"), "a\nB\nc\n");

      const result = await createFileDiff({
        relativePath: "notes/f.txt",
        currentPath: file("new.txt"),
        checkpointPath: file("old.txt"),
      });

      expect(result.status).toBe("changed");
      if (result.status === "changed") {
        expect(result.added).toBe(1);
        expect(result.removed).toBe(1);
        expect(result.patch).toContain("--- checkpoint/notes/f.txt\n+++ current/notes/f.txt\n");
        expect(result.patch).toContain("@@ -1,3 +1,3 @@\n a\n-b\n+B\n c\n");
      }
    });

    it("should diff a file created since the checkpoint against nothing", async () => {
      await fs.writeFile(file("new.txt"), "one\ntwo\n");

      const result = await createFileDiff({ relativePath: "new.txt", currentPath: file("new.txt") });

      expect(result).toMatchObject({ status: "changed", added: 2, removed: 0 });
    });

    it("should diff a deleted file against nothing", async () => {
      await fs.writeFile(file("old.txt"), "one\n");

      const result = await createFileDiff({
        relativePath: "old.txt",
        currentPath: file("deleted.txt"),
        checkpointPath: file("old.txt"),
      });

      expect(result).toMatchObject({ status: "changed", added: 0, removed: 1 });
    });

    it("should keep four lines of context", async () => {
      const before = Array.from({ length: 20 }, (_, i) => `line ${i + 1}`).join("\n") + "\n";
      const after = before.replace("line 10\n", "line ten\n");
      await fs.writeFile(file("old.txt"), before);
      await fs.writeFile(file("new.txt"), after);

      const result = await createFileDiff({
        relativePath: "f.txt",
        currentPath: file("new.txt"),
        checkpointPath: file("old.txt"),
      });

      expect(result.status).toBe("changed");
      if (result.status === "changed") {
        expect(result.patch).toContain("@@ -6,9 +6,9 @@\n line 6\n");
      }
    });
  });

  describe("formatFileDiff", () => {
    it("should describe states without a patch", () => {
      expect(formatFileDiff({ status: "missing", relativePath: "a.txt" })).toBe(
        "a.txt: not found in the checkpoint or on disk",
      );
      expect(formatFileDiff({ status: "binary", relativePath: "a.bin" })).toBe(
        "a.bin: binary file, diff not shown",
      );
      expect(formatFileDiff({ status: "identical", relativePath: "a.txt" })).toBe(
        "a.txt: identical to the checkpoint",
      );
      expect(
        formatFileDiff({ status: "error", relativePath: "a.txt", message: "EACCES" }),
      ).toBe("a.txt: could not read file: EACCES");
    });

    it("should render the patch followed by stats", async () => {
      await fs.writeFile(file("old.txt"), "a\nb\nc\n");
      await fs.writeFile(file("new.txt"), "a\nB\nc\n");
      const result = await createFileDiff({
        relativePath: "f.txt",
        currentPath: file("new.txt"),
        checkpointPath: file("old.txt"),
      });

      expect(formatFileDiff(result)).toBe(
        [
          "--- checkpoint/f.txt",
          "+++ current/f.txt",
          "@@ -1,3 +1,3 @@",
          " a",
          "-b",
          "+B",
          " c",
          "Stats: +1 -1",
        ].join("\n"),
      );
    });
  });
});
