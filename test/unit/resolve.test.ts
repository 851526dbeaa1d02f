import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { join } from "node:path";
import {
  decodeRequestPath,
  isInsideRoot,
  resolveRequestPath,
  statusForFsError,
} from "../../src/static/resolve.ts";
import { makeSite, removeSite } from "../helpers.ts";

let root: string;

beforeAll(async () => {
  root = await makeSite({
    "index.html": "<h1>home</h1>",
    "a.txt": "a",
    "hello world.txt": "spaced",
    "docs/index.html": "<h1>docs</h1>",
    "empty/": "",
  });
});

afterAll(async () => {
  await removeSite(root);
});

describe("decodeRequestPath", () => {
  test("splits off the query and decodes the path", () => {
    expect(decodeRequestPath("/a%20b/c.txt?x=1&y")).toEqual({
      pathname: "/a b/c.txt",
      rawPath: "/a%20b/c.txt",
      query: "x=1&y",
    });
  });

  test("rejects relative targets", () => {
    expect(decodeRequestPath("a.txt")).toBeNull();
    expect(decodeRequestPath("*")).toBeNull();
  });

  test("rejects malformed percent-encoding and NUL bytes", () => {
    expect(decodeRequestPath("/%E0%A4%A")).toBeNull();
    expect(decodeRequestPath("/a%00b")).toBeNull();
  });
});

describe("isInsideRoot", () => {
  test("accepts the root and paths beneath it", () => {
    expect(isInsideRoot("/site", "/site")).toBe(true);
    expect(isInsideRoot("/site", "/site/a/b.html")).toBe(true);
    expect(isInsideRoot("/site", "/site/..hidden")).toBe(true);
  });

  test("rejects paths outside", () => {
    expect(isInsideRoot("/site", "/etc/passwd")).toBe(false);
    expect(isInsideRoot("/site", "/")).toBe(false);
    expect(isInsideRoot("/site", "/site-other/x")).toBe(false);
  });
});

describe("resolveRequestPath", () => {
  test("serves index.html for the root", async () => {
    expect(await resolveRequestPath("/", root)).toEqual({
      kind: "file",
      path: join(root, "index.html"),
    });
  });

  test("resolves a file and ignores the query", async () => {
    expect(await resolveRequestPath("/a.txt?v=2", root)).toEqual({
      kind: "file",
      path: join(root, "a.txt"),
    });
  });

  test("decodes percent-encoded names", async () => {
    expect(await resolveRequestPath("/hello%20world.txt", root)).toEqual({
      kind: "file",
      path: join(root, "hello world.txt"),
    });
  });

  test("redirects a directory without a trailing slash, keeping the query", async () => {
    expect(await resolveRequestPath("/docs", root)).toEqual({
      kind: "redirect",
      location: "/docs/",
    });
    expect(await resolveRequestPath("/docs?tab=1", root)).toEqual({
      kind: "redirect",
      location: "/docs/?tab=1",
    });
  });

  test("serves a directory's index.html", async () => {
    expect(await resolveRequestPath("/docs/", root)).toEqual({
      kind: "file",
      path: join(root, "docs", "index.html"),
    });
  });

  test("404s a directory without an index file", async () => {
    const result = await resolveRequestPath("/empty/", root);
    expect(result.kind).toBe("error");
    expect(result.kind === "error" && result.status).toBe(404);
  });

  test("404s a missing file and a file used as a directory", async () => {
    const missing = await resolveRequestPath("/missing.txt", root);
    const notDir = await resolveRequestPath("/a.txt/child", root);
    expect(missing.kind === "error" && missing.status).toBe(404);
    expect(notDir.kind === "error" && notDir.status).toBe(404);
  });

  test("404s paths that escape the root", async () => {
    for (const target of ["/../../etc/passwd", "/..%2f..%2fetc/passwd", "/docs/../../x"]) {
      const result = await resolveRequestPath(target, root);
      expect(result.kind).toBe("error");
      expect(result.kind === "error" && result.status).toBe(404);
    }
  });

  test("400s targets that are not absolute UTF-8 paths", async () => {
    const relative = await resolveRequestPath("a.txt", root);
    const malformed = await resolveRequestPath("/%E0%A4%A", root);
    expect(relative.kind === "error" && relative.status).toBe(400);
    expect(malformed.kind === "error" && malformed.status).toBe(400);
  });
});

describe("statusForFsError", () => {
  const fsError = (code: string) => Object.assign(new Error(code), { code });

  test("maps error codes to statuses", () => {
    expect(statusForFsError(fsError("ENOENT"))).toBe(404);
    expect(statusForFsError(fsError("ENOTDIR"))).toBe(404);
    expect(statusForFsError(fsError("EACCES"))).toBe(403);
    expect(statusForFsError(fsError("EPERM"))).toBe(403);
    expect(statusForFsError(fsError("EIO"))).toBe(500);
    expect(statusForFsError("not an error")).toBe(500);
  });
});
