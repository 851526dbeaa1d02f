import { spawn, type ChildProcess } from "node:child_process";
import { scopedLogger } from "../logger.ts";

const log = scopedLogger("watch");

/** Environment variable holding the URL a watcher POSTs to. */
export const TRIGGER_URL_ENV = "RELOAD_TRIGGER_URL";

export type ExternalWatcherOptions = {
  command: string;
  cwd: string;
  triggerUrl: string;
  onOutput?: (line: string) => void;
};

export type ExternalWatcher = {
  child: ChildProcess;
  stop(): Promise<void>;
};

function forwardLines(onLine: (line: string) => void) {
  let pending = "";
  return (data: Buffer) => {
    pending += data.toString();
    const lines = pending.split("\n");
    pending = lines.pop() ?? "";
    for (const line of lines) {
      if (line.trim()) onLine(line.trimEnd());
    }
  };
}

/**
 * Run a file-watching command through the shell in `cwd`. The command is
 * expected to POST to `$RELOAD_TRIGGER_URL` whenever files change.
 */
export function startExternalWatcher(options: ExternalWatcherOptions): Promise<ExternalWatcher> {
  const { command, cwd, triggerUrl } = options;
  const onOutput = options.onOutput ?? ((line: string) => log.info(line));

  return new Promise((resolve, reject) => {
    const child = spawn(command, [], {
      cwd,
      shell: true,
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, [TRIGGER_URL_ENV]: triggerUrl },
    });

    let started = false;
    let exited = false;

    child.stdout?.on("data", forwardLines(onOutput));
    child.stderr?.on("data", forwardLines(onOutput));

    child.on("spawn", () => {
      started = true;
      log.info(`started: ${command}`);
      resolve({ child, stop });
    });

    child.on("error", (err) => {
      if (!started) {
        reject(err);
        return;
      }
      log.error(`watch command failed: ${err.message}`);
    });

    child.on("exit", (code, signal) => {
      exited = true;
      if (started) {
        log.warn(`watch command exited (${signal ?? `code ${code}`})`);
      }
    });

    function stop(): Promise<void> {
      if (exited) return Promise.resolve();
      return new Promise((resolveStop) => {
        child.once("exit", () => resolveStop());
        child.kill("SIGTERM");
      });
    }
  });
}
