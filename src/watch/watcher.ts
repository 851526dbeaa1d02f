import { relative, sep } from "node:path";
import { watch, type WatchOptions } from "chokidar";
import { scopedLogger } from "../logger.ts";
import type { ChangeTrigger } from "../trigger/change-trigger.ts";

const log = scopedLogger("watch");

const DEFAULT_DEBOUNCE_MS = 100;

/**
 * Directories never watched, whatever the caller passes.
 */
const IGNORED_DIRECTORIES = new Set(["node_modules", ".git"]);

export type FileWatcherOptions = {
  root: string;
  trigger: ChangeTrigger;
  /** Quiet period after the last event before the reload fires. */
  debounceMs?: number;
  watchOptions?: WatchOptions;
};

export type FileWatcher = {
  /**
   * Resolves once the initial scan is done and events will be reported;
   * rejects if the watcher errors first.
   */
  ready: Promise<void>;
  close(): Promise<void>;
};

/**
 * Whether a path under `root` is excluded from watching: dotfiles, dot
 * directories, `.git` and `node_modules`.
 */
export function isIgnoredPath(root: string, path: string): boolean {
  const rel = relative(root, path);
  if (rel === "") return false;
  return rel
    .split(sep)
    .some((segment) => IGNORED_DIRECTORIES.has(segment) || segment.startsWith("."));
}

export function resolveWatchOptions(root: string, options: WatchOptions = {}): WatchOptions {
  const { ignored = [], ...otherOptions } = options;
  return {
    ignored: [
      (path: string) => isIgnoredPath(root, path),
      ...(Array.isArray(ignored) ? ignored : [ignored]),
    ],
    ignoreInitial: true,
    ignorePermissionErrors: true,
    ...otherOptions,
  };
}

/**
 * Watch `root` and call the trigger once per burst of changes.
 */
export function startFileWatcher(options: FileWatcherOptions): FileWatcher {
  const { root, trigger, debounceMs = DEFAULT_DEBOUNCE_MS } = options;
  const watcher = watch(root, resolveWatchOptions(root, options.watchOptions));

  const changed = new Set<string>();
  let timer: NodeJS.Timeout | undefined;

  const flush = () => {
    timer = undefined;
    const paths = Array.from(changed);
    changed.clear();
    const reason = paths.length === 1 ? paths[0] : `${paths.length} files changed`;
    trigger(reason);
  };

  const onChange = (event: string) => (path: string) => {
    const rel = relative(root, path);
    log.debug(`${event} ${rel}`);
    changed.add(rel);
    if (timer) clearTimeout(timer);
    timer = setTimeout(flush, debounceMs);
  };

  watcher.on("add", onChange("add"));
  watcher.on("change", onChange("change"));
  watcher.on("unlink", onChange("unlink"));
  watcher.on("addDir", onChange("addDir"));
  watcher.on("unlinkDir", onChange("unlinkDir"));
  watcher.on("error", (err) => {
    log.error("file watcher error:", err);
  });

  // An error before the initial scan finishes means watching never started
  const ready = new Promise<void>((resolve, reject) => {
    watcher.once("error", reject);
    watcher.once("ready", () => {
      log.info(`watching ${root}`);
      resolve();
    });
  });

  return {
    ready,
    async close() {
      if (timer) clearTimeout(timer);
      timer = undefined;
      changed.clear();
      await watcher.close();
    },
  };
}
