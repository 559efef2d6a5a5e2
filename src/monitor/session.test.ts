/**
 * Tests for the watch session
 */

import type { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { CheckpointError } from "../utils/errors.js";
import { WatchSession, decodeWatcherEvent, formatTimestamp } from "./session.js";
import type { ChangeNotification } from "./types.js";

interface FakeWatcher extends EventEmitter {
  target: string;
  options: unknown;
  close: Mock<() => Promise<void>>;
}

const chokidarState = vi.hoisted(() => {
  const watchers: FakeWatcher[] = [];
  return { watchers };
});

vi.mock("chokidar", async () => {
  const { EventEmitter } = await import("node:events");

  class Watcher extends EventEmitter implements FakeWatcher {
    close = vi.fn(async (): Promise<void> => undefined);

    constructor(
      readonly target: string,
      readonly options: unknown,
    ) {
      super();
    }
  }

  return {
    watch: vi.fn((target: string, options: unknown) => {
      const watcher = new Watcher(target, options);
      chokidarState.watchers.push(watcher);
      setImmediate(() => watcher.emit("ready"));
      return watcher;
    }),
  };
});

const NOW = new Date("2024-01-15T10:00:00.750Z");
const TS = "2024-01-15T10:00:00Z";

describe("decodeWatcherEvent", () => {
  it.each([
    ["add", "created", false],
    ["change", "modified", false],
    ["unlink", "deleted", false],
    ["addDir", "created", true],
    ["unlinkDir", "deleted", true],
  ])("%s → %s (directory: %s)", (eventName, kind, isDirectory) => {
    expect(decodeWatcherEvent(eventName, "/root/x")).toEqual({
      kind,
      path: "/root/x",
      isDirectory,
    });
  });

  it("should ignore non-change events", () => {
    expect(decodeWatcherEvent("ready", "")).toBeNull();
    expect(decodeWatcherEvent("raw", "/root/x")).toBeNull();
  });
});

describe("formatTimestamp", () => {
  it("should truncate to whole seconds", () => {
    expect(formatTimestamp(NOW)).toBe(TS);
  });
});

describe("WatchSession", () => {
  let root: string;
  let stagingParent: string;
  let session: WatchSession;

  const live = (relative: string) => path.join(root, relative);
  const read = (relative: string) => fs.readFile(live(relative), "utf-8");
  const lastWatcher = (): FakeWatcher => {
    const watcher = chokidarState.watchers.at(-1);
    if (!watcher) throw new Error("no watcher was created");
    return watcher;
  };

  beforeEach(async () => {
    chokidarState.watchers.length = 0;
    root = await fs.mkdtemp(path.join(os.tmpdir(), "foldback-session-"));
    stagingParent = await fs.mkdtemp(path.join(os.tmpdir(), "foldback-staging-"));
    await fs.writeFile(live("a.txt"), "alpha\n");
    await fs.mkdir(live("src"));
    await fs.writeFile(live("src/main.ts"), "export {};\n");

    session = new WatchSession(root, {
      stagingDir: stagingParent,
      notificationCapacity: 8,
      now: () => NOW,
    });
  });

  afterEach(async () => {
    await session.stop();
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(stagingParent, { recursive: true, force: true });
  });

  describe("lifecycle", () => {
    it("should watch the root once started", async () => {
      await session.start();

      expect(session.state).toBe("running");
      expect(chokidarState.watchers).toHaveLength(1);
      expect(lastWatcher().target).toBe(root);
      expect(lastWatcher().options).toMatchObject({
        ignoreInitial: true,
        usePolling: false,
        awaitWriteFinish: { stabilityThreshold: 200 },
      });
    });

    it("should not start twice", async () => {
      await session.start();
      await session.start();

      expect(chokidarState.watchers).toHaveLength(1);
    });

    it("should disable awaitWriteFinish when set to 0", async () => {
      const quick = new WatchSession(root, { awaitWriteFinishMs: 0, usePolling: true });
      try {
        await quick.start();
        expect(lastWatcher().options).toMatchObject({ awaitWriteFinish: false, usePolling: true });
      } finally {
        await quick.stop();
      }
    });

    it("should close the watcher and channel on stop", async () => {
      await session.start();
      const watcher = lastWatcher();

      await session.stop();
      await session.stop();

      expect(session.state).toBe("stopped");
      expect(watcher.close).toHaveBeenCalledTimes(1);
      expect(session.notifications.closed).toBe(true);
    });

    it("should not restart after stop", async () => {
      await session.start();
      await session.stop();
      await session.start();

      expect(session.state).toBe("stopped");
      expect(chokidarState.watchers).toHaveLength(1);
    });

    it("should tolerate stop on a session that never started", async () => {
      await expect(session.stop()).resolves.toBeUndefined();
      expect(session.state).toBe("stopped");
    });

    it("should discard the snapshot on stop without restoring", async () => {
      await session.start();
      const { stagingDir } = await session.createCheckpoint();
      await fs.writeFile(live("a.txt"), "edited\n");

      await session.stop();

      expect(session.hasCheckpoint).toBe(false);
      expect(await read("a.txt")).toBe("edited\n");
      await expect(fs.access(stagingDir)).rejects.toThrow();
    });
  });

  describe("watcher events", () => {
    it("should record file events reported by the watcher", async () => {
      await session.start();

      lastWatcher().emit("all", "add", live("new.txt"));
      lastWatcher().emit("all", "change", live("new.txt"));
      lastWatcher().emit("all", "unlink", live("src/main.ts"));

      expect(session.getChanges()).toEqual({
        "new.txt": { kind: "created", timestamp: TS },
        "src/main.ts": { kind: "deleted", timestamp: TS },
      });
    });

    it("should skip directory events", async () => {
      await session.start();

      lastWatcher().emit("all", "addDir", live("lib"));
      lastWatcher().emit("all", "unlinkDir", live("src"));

      expect(session.getChanges()).toEqual({});
    });

    it("should log watcher errors without throwing", async () => {
      await session.start();

      expect(() => lastWatcher().emit("error", new Error("EMFILE"))).not.toThrow();
      expect(session.state).toBe("running");
    });
  });

  describe("handleEvent", () => {
    it("should publish a notification with the effective kind", () => {
      session.handleEvent({ kind: "created", path: live("n.txt"), isDirectory: false });
      const notification = session.handleEvent({
        kind: "modified",
        path: live("n.txt"),
        isDirectory: false,
      });

      expect(notification).toEqual({ root, path: "n.txt", kind: "created", timestamp: TS });
    });

    it("should record a move at its destination", () => {
      session.handleEvent({ kind: "moved", path: live("src/renamed.ts"), isDirectory: false });

      expect(session.getChanges()).toEqual({ "src/renamed.ts": { kind: "moved", timestamp: TS } });
    });

    it("should drop ignored paths and paths outside the root", () => {
      expect(
        session.handleEvent({ kind: "created", path: live("node_modules/x/i.js"), isDirectory: false }),
      ).toBeNull();
      expect(
        session.handleEvent({ kind: "modified", path: live("server.log"), isDirectory: false }),
      ).toBeNull();
      expect(
        session.handleEvent({
          kind: "created",
          path: path.join(path.dirname(root), "elsewhere.txt"),
          isDirectory: false,
        }),
      ).toBeNull();

      expect(session.getChanges()).toEqual({});
    });

    it("should apply reloaded ignore patterns", async () => {
      await fs.writeFile(live(".foldbackignore"), "drafts\n");
      session.reloadIgnorePatterns();

      expect(session.ignorePatterns).toContain("drafts");
      expect(
        session.handleEvent({ kind: "created", path: live("drafts/idea.md"), isDirectory: false }),
      ).toBeNull();
    });
  });

  describe("listeners and notifications", () => {
    it("should notify listeners and the channel", () => {
      const seen: ChangeNotification[] = [];
      session.onChange((n) => {
        seen.push(n);
      });

      session.handleEvent({ kind: "created", path: live("x.txt"), isDirectory: false });

      const expected = { root, path: "x.txt", kind: "created", timestamp: TS };
      expect(seen).toEqual([expected]);
      expect(session.notifications.drain()).toEqual([expected]);
    });

    it("should stop notifying after unsubscribe", () => {
      const listener = vi.fn();
      const unsubscribe = session.onChange(listener);

      unsubscribe();
      session.handleEvent({ kind: "created", path: live("x.txt"), isDirectory: false });

      expect(listener).not.toHaveBeenCalled();
    });

    it("should isolate failing listeners", async () => {
      const after = vi.fn();
      session.onChange(() => {
        throw new Error("sync failure");
      });
      session.onChange(async () => {
        throw new Error("async failure");
      });
      session.onChange(after);

      const notification = session.handleEvent({
        kind: "created",
        path: live("x.txt"),
        isDirectory: false,
      });
      await new Promise((resolve) => setImmediate(resolve));

      expect(notification).not.toBeNull();
      expect(after).toHaveBeenCalledTimes(1);
      expect(session.getChanges()["x.txt"]?.kind).toBe("created");
    });

    it("should drop the oldest notifications beyond capacity", () => {
      for (let i = 0; i < 10; i++) {
        session.handleEvent({ kind: "created", path: live(`f${i}.txt`), isDirectory: false });
      }

      const pending = session.notifications.drain();
      expect(pending).toHaveLength(8);
      expect(pending[0]?.path).toBe("f2.txt");
      expect(session.notifications.dropped).toBe(2);
    });
  });

  describe("checkpoints", () => {
    it("should show only changes made after the checkpoint", async () => {
      session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false });

      const result = await session.createCheckpoint();

      expect(result.fileCount).toBe(2);
      expect(result.warnings).toEqual([]);
      expect(session.hasCheckpoint).toBe(true);
      expect(session.getChanges()).toEqual({});

      session.handleEvent({ kind: "created", path: live("new.txt"), isDirectory: false });
      expect(Object.keys(session.getChanges())).toEqual(["new.txt"]);
    });

    it("should restore the tree on rollback and clear all changes", async () => {
      await session.createCheckpoint();

      await fs.writeFile(live("a.txt"), "edited\n");
      session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false });
      await fs.writeFile(live("new.txt"), "new\n");
      session.handleEvent({ kind: "created", path: live("new.txt"), isDirectory: false });

      const result = await session.rollback();

      expect(result.success).toBe(true);
      expect(await read("a.txt")).toBe("alpha\n");
      await expect(fs.access(live("new.txt"))).rejects.toThrow();
      expect(session.hasCheckpoint).toBe(false);
      expect(session.getChanges()).toEqual({});
    });

    it("should report a rollback without a checkpoint", async () => {
      const result = await session.rollback();

      expect(result.success).toBe(false);
      expect(result.reason).toBe("no-checkpoint");
    });

    it("should drop the echo of its own restorative write", async () => {
      await session.createCheckpoint();
      await fs.writeFile(live("a.txt"), "edited\n");
      session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false });

      expect(await session.rollbackFile("a.txt")).toBe(true);

      expect(
        session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false }),
      ).toBeNull();
      expect(session.getChanges()).toEqual({});

      // the suppression is used up: a later user edit is recorded
      session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false });
      expect(session.getChanges()["a.txt"]?.kind).toBe("modified");
    });

    it("should keep files and history on cancel", async () => {
      session.handleEvent({ kind: "modified", path: live("src/main.ts"), isDirectory: false });
      await session.createCheckpoint();
      await fs.writeFile(live("a.txt"), "kept\n");
      session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false });

      expect(await session.cancelCheckpoint()).toBe(true);
      expect(await session.cancelCheckpoint()).toBe(false);

      expect(await read("a.txt")).toBe("kept\n");
      expect(Object.keys(session.getChanges()).sort()).toEqual(["a.txt", "src/main.ts"]);
    });

    it("should refuse to clear changes while a checkpoint is active", async () => {
      session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false });
      await session.createCheckpoint();

      expect(session.clearAllChanges()).toBe(false);

      await session.cancelCheckpoint();
      expect(session.clearAllChanges()).toBe(true);
      expect(session.getChanges()).toEqual({});
    });

    it("should expose checkpoint copies and live paths", async () => {
      const { stagingDir } = await session.createCheckpoint();

      expect(await session.getCheckpointPath("src/main.ts")).toBe(
        path.join(stagingDir, "src", "main.ts"),
      );
      expect(await session.getCheckpointPath("nope.txt")).toBeUndefined();
      expect(session.resolvePath("src/main.ts")).toBe(live("src/main.ts"));
      expect(session.resolvePath("../escape")).toBeNull();
    });

    it("should serialize a rollback issued while a checkpoint is being created", async () => {
      await fs.writeFile(live("a.txt"), "at checkpoint\n");

      const checkpoint = session.createCheckpoint();
      const rollback = session.rollback();

      await checkpoint;
      const result = await rollback;

      expect(result.success).toBe(true);
      expect(await read("a.txt")).toBe("at checkpoint\n");
    });

    it("should leave the tree byte-identical after a rollback with no changes", async () => {
      await fs.writeFile(live("data.bin"), Buffer.from([0x00, 0xff, 0x10, 0x0a]));

      await session.createCheckpoint();
      const result = await session.rollback();

      expect(result.success).toBe(true);
      expect(await read("a.txt")).toBe("alpha\n");
      expect(await read("src/main.ts")).toBe("export {};\n");
      expect([...(await fs.readFile(live("data.bin")))]).toEqual([0x00, 0xff, 0x10, 0x0a]);
      expect(session.getChanges()).toEqual({});
    });

    it("should keep ignored paths out of the snapshot and the change table", async () => {
      await fs.mkdir(live(".git"));
      await fs.writeFile(live(".git/HEAD"), "ref: refs/heads/main\n");
      await fs.writeFile(live("scratch.tmp"), "tmp\n");

      const { stagingDir } = await session.createCheckpoint();
      session.handleEvent({ kind: "modified", path: live(".git/HEAD"), isDirectory: false });
      session.handleEvent({ kind: "created", path: live("scratch.tmp"), isDirectory: false });

      await expect(fs.access(path.join(stagingDir, ".git"))).rejects.toThrow();
      await expect(fs.access(path.join(stagingDir, "scratch.tmp"))).rejects.toThrow();
      expect(session.getChanges()).toEqual({});
    });

    it("should replace an existing checkpoint", async () => {
      const first = await session.createCheckpoint();
      await fs.writeFile(live("a.txt"), "second state\n");
      const second = await session.createCheckpoint();

      expect(second.stagingDir).not.toBe(first.stagingDir);
      await expect(fs.access(first.stagingDir)).rejects.toThrow();

      await fs.writeFile(live("a.txt"), "third state\n");
      await session.rollback();
      expect(await read("a.txt")).toBe("second state\n");
    });

    it("should end the checkpoint when a replacement snapshot cannot be created", async () => {
      const parent = path.join(stagingParent, "parent");
      session = new WatchSession(root, { stagingDir: parent, now: () => NOW });
      session.handleEvent({ kind: "modified", path: live("a.txt"), isDirectory: false });
      await session.createCheckpoint();

      await fs.rm(parent, { recursive: true, force: true });
      await fs.writeFile(parent, "not a directory\n");

      await expect(session.createCheckpoint()).rejects.toBeInstanceOf(CheckpointError);

      expect(session.hasCheckpoint).toBe(false);
      expect(Object.keys(session.getChanges())).toEqual(["a.txt"]);
      expect(await session.cancelCheckpoint()).toBe(false);

      session.handleEvent({ kind: "created", path: live("b.txt"), isDirectory: false });
      expect(Object.keys(session.getChanges()).sort()).toEqual(["a.txt", "b.txt"]);
      expect(session.clearAllChanges()).toBe(true);
    });
  });
});
