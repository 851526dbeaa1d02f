import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { isAbsolute, join, relative, resolve as resolvePath, sep } from "node:path";

export const INDEX_FILE = "index.html";

export type ResolveErrorStatus = 400 | 403 | 404 | 500;

export type Resolution =
  | { kind: "file"; path: string }
  | { kind: "redirect"; location: string }
  | { kind: "error"; status: ResolveErrorStatus; reason: string; cause?: unknown };

function fail(status: ResolveErrorStatus, reason: string, cause?: unknown): Resolution {
  return { kind: "error", status, reason, cause };
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Map a filesystem error to the status the client sees.
 */
export function statusForFsError(err: unknown): ResolveErrorStatus {
  switch (errorCode(err)) {
    case "ENOENT":
    case "ENOTDIR":
    case "ENAMETOOLONG":
    case "ELOOP":
      return 404;
    case "EACCES":
    case "EPERM":
      return 403;
    default:
      return 500;
  }
}

/**
 * Split a request target into its decoded path and raw query. Returns
 * `null` when the target is not an absolute path or does not decode as UTF-8.
 */
export function decodeRequestPath(
  target: string,
): { pathname: string; rawPath: string; query: string | undefined } | null {
  const queryStart = target.indexOf("?");
  const rawPath = queryStart === -1 ? target : target.slice(0, queryStart);
  const query = queryStart === -1 ? undefined : target.slice(queryStart + 1);
  if (!rawPath.startsWith("/")) return null;

  let pathname: string;
  try {
    pathname = decodeURIComponent(rawPath);
  } catch {
    return null;
  }
  if (pathname.includes("\0")) return null;
  return { pathname, rawPath, query };
}

/**
 * Whether `target` is `root` itself or lies beneath it.
 */
export function isInsideRoot(root: string, target: string): boolean {
  const rel = relative(root, target);
  if (rel === ".." || rel.startsWith(`..${sep}`)) return false;
  return !isAbsolute(rel);
}

/**
 * Resolve a request target to a file under `root`.
 *
 * Directories requested without a trailing slash redirect to the slashed URL
 * so relative links in their index page resolve against the directory.
 * Directories with a trailing slash serve their `index.html`, or 404 when it
 * is missing. Paths that normalize to somewhere outside `root` are 404.
 */
export async function resolveRequestPath(target: string, root: string): Promise<Resolution> {
  const decoded = decodeRequestPath(target);
  if (!decoded) {
    return fail(400, `request target is not an absolute UTF-8 path: ${target}`);
  }

  const rootDir = resolvePath(root);
  const filePath = join(rootDir, decoded.pathname);
  if (!isInsideRoot(rootDir, filePath)) {
    return fail(404, `${decoded.pathname} is outside the root directory`);
  }

  let stats: Stats;
  try {
    stats = await stat(filePath);
  } catch (err) {
    return fail(statusForFsError(err), `cannot stat ${filePath}`, err);
  }

  if (stats.isFile()) {
    return { kind: "file", path: filePath };
  }
  if (!stats.isDirectory()) {
    return fail(404, `${filePath} is not a regular file`);
  }

  if (!decoded.rawPath.endsWith("/")) {
    const query = decoded.query === undefined ? "" : `?${decoded.query}`;
    return { kind: "redirect", location: `${decoded.rawPath}/${query}` };
  }

  const indexPath = join(filePath, INDEX_FILE);
  try {
    const indexStats = await stat(indexPath);
    if (indexStats.isFile()) {
      return { kind: "file", path: indexPath };
    }
    return fail(404, `${indexPath} is not a regular file`);
  } catch (err) {
    return fail(statusForFsError(err), `no ${INDEX_FILE} in ${filePath}`, err);
  }
}
