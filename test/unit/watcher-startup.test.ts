import { afterEach, describe, expect, test, vi } from "vitest";
import { FSWatcher, watch } from "chokidar";
import { setLogLevel } from "../../src/logger.ts";
import { startFileWatcher } from "../../src/watch/watcher.ts";

vi.mock("chokidar", async (importOriginal) => {
  const actual = await importOriginal<typeof import("chokidar")>();
  return { ...actual, watch: vi.fn(actual.watch) };
});

afterEach(() => {
  setLogLevel("info");
});

describe("startFileWatcher", () => {
  test("ready rejects when the watcher fails before its initial scan", async () => {
    setLogLevel("silent");
    const failing = new FSWatcher();
    vi.mocked(watch).mockImplementationOnce(() => failing);
    const trigger = vi.fn((_reason?: string) => ({ delivered: 0, failed: 0 }));

    const watcher = startFileWatcher({ root: "/nonexistent-site", trigger });
    failing.emit("error", new Error("EMFILE: too many open files"));

    await expect(watcher.ready).rejects.toThrow("EMFILE: too many open files");
    await watcher.close();
    expect(trigger).not.toHaveBeenCalled();
  });
});
