import type http from "node:http";
import { open, type FileHandle } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { scopedLogger } from "../logger.ts";
import { sendError } from "../http.ts";
import { contentTypeFor, isHtmlPath } from "./mime.ts";
import { resolveRequestPath, statusForFsError, type Resolution } from "./resolve.ts";

const log = scopedLogger("http");

const ALLOWED_METHODS = "GET, HEAD";

export type StaticResponderOptions = {
  root: string;
  /** Appended to every HTML file served; omit to serve HTML unchanged. */
  injectScript?: string;
};

export type RequestHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
) => Promise<void>;

type ResolveError = Extract<Resolution, { kind: "error" }>;

function logResolveError(req: http.IncomingMessage, resolution: ResolveError): void {
  const line = `${req.method} ${req.url} → ${resolution.status} (${resolution.reason})`;
  if (resolution.status === 500) {
    log.error(line, resolution.cause);
  } else {
    log.debug(line);
  }
}

function isPrematureClose(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ERR_STREAM_PREMATURE_CLOSE";
}

/**
 * The file changed size between `stat` and the read, so the body no longer
 * matches the Content-Length already sent.
 */
export class FileChangedError extends Error {
  constructor(path: string, expected: number, actual: number) {
    super(`${path} changed while being served (expected ${expected} bytes, read ${actual})`);
    this.name = "FileChangedError";
  }
}

/**
 * Exactly `size` bytes of `file`, then `suffix`. Throws FileChangedError when
 * the file turns out shorter.
 */
export async function* fileWithSuffix(
  file: FileHandle,
  path: string,
  size: number,
  suffix: string,
): AsyncGenerator<Buffer> {
  let read = 0;
  if (size > 0) {
    for await (const chunk of file.createReadStream({ autoClose: false, start: 0, end: size - 1 })) {
      if (!Buffer.isBuffer(chunk)) continue;
      read += chunk.length;
      yield chunk;
    }
  }
  if (read < size) {
    throw new FileChangedError(path, size, read);
  }
  if (suffix) yield Buffer.from(suffix);
}

/**
 * Serve files under `root` for GET and HEAD requests.
 */
export function createStaticResponder(options: StaticResponderOptions): RequestHandler {
  const { root, injectScript } = options;

  return async (req, res) => {
    if (req.method !== "GET" && req.method !== "HEAD") {
      log.debug(`${req.method} ${req.url} → 405`);
      sendError(req, res, 405, { allow: ALLOWED_METHODS });
      return;
    }

    const resolution = await resolveRequestPath(req.url ?? "/", root);

    if (resolution.kind === "redirect") {
      log.debug(`${req.method} ${req.url} → 302 ${resolution.location}`);
      res.writeHead(302, { location: resolution.location, "content-length": 0 });
      res.end();
      return;
    }

    if (resolution.kind === "error") {
      logResolveError(req, resolution);
      sendError(req, res, resolution.status);
      return;
    }

    let file: FileHandle;
    try {
      file = await open(resolution.path, "r");
    } catch (err) {
      const status = statusForFsError(err);
      logResolveError(req, {
        kind: "error",
        status,
        reason: `cannot open ${resolution.path}`,
        cause: err,
      });
      sendError(req, res, status);
      return;
    }

    try {
      const { size } = await file.stat();
      const suffix = injectScript !== undefined && isHtmlPath(resolution.path) ? injectScript : "";

      res.writeHead(200, {
        "content-type": contentTypeFor(resolution.path),
        "content-length": size + Buffer.byteLength(suffix),
      });
      log.debug(`${req.method} ${req.url} → 200 ${resolution.path}`);

      if (req.method === "HEAD") {
        res.end();
        return;
      }

      await pipeline(fileWithSuffix(file, resolution.path, size, suffix), res);
    } catch (err) {
      if (isPrematureClose(err)) {
        log.debug(`${req.method} ${req.url}: client went away`);
      } else if (err instanceof FileChangedError) {
        log.warn(`${req.method} ${req.url}: ${err.message}`);
        res.destroy();
      } else if (!res.headersSent) {
        log.error(`${req.method} ${req.url} → 500`, err);
        sendError(req, res, 500);
      } else {
        log.error(`${req.method} ${req.url}: failed while streaming`, err);
        res.destroy();
      }
    } finally {
      await file.close();
    }
  };
}
