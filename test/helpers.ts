import http from "node:http";
import net from "node:net";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import WebSocket from "ws";

/**
 * Create a temp directory holding `files` (relative path → contents). Paths
 * ending in "/" create empty directories.
 */
export async function makeSite(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "reload-serve-test-"));
  for (const [path, content] of Object.entries(files)) {
    if (path.endsWith("/")) {
      await mkdir(join(root, path), { recursive: true });
      continue;
    }
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content);
  }
  return root;
}

export async function removeSite(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

export type TestClient = {
  ws: WebSocket;
  messages: string[];
  closed: Promise<number>;
  close(): Promise<void>;
};

export function connectClient(url: string): Promise<TestClient> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    const messages: string[] = [];
    ws.on("message", (data) => messages.push(data.toString()));
    const closed = new Promise<number>((resolveClosed) => {
      ws.on("close", (code) => resolveClosed(code));
    });

    ws.once("open", () => {
      ws.off("error", reject);
      ws.on("error", () => {});
      resolve({
        ws,
        messages,
        closed,
        async close() {
          if (ws.readyState !== ws.CLOSED) {
            ws.close();
            await closed;
          }
        },
      });
    });
    ws.once("error", reject);
  });
}

export type RawResponse = {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
};

/**
 * Plain request that sends `path` byte for byte, without the URL
 * normalization `fetch` applies.
 */
export function rawRequest(
  port: number,
  path: string,
  options: { method?: string; headers?: http.OutgoingHttpHeaders } = {},
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: "127.0.0.1", port, path, method: options.method ?? "GET", headers: options.headers },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString("utf-8"),
          }),
        );
        res.on("error", reject);
      },
    );
    req.on("error", reject);
    req.end();
  });
}

export function listenOnFreePort(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (addr && typeof addr !== "string") {
        resolve(addr.port);
      } else {
        reject(new Error("Failed to get port"));
      }
    });
  });
}

export function closeHttp(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.closeAllConnections();
    server.close(() => resolve());
  });
}

export const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Write `request` verbatim to a fresh TCP connection and collect everything
 * the server sends until it closes the connection.
 */
export function rawExchange(port: number, request: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, "127.0.0.1", () => socket.write(request));
    const chunks: Buffer[] = [];
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("close", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    socket.on("error", reject);
  });
}
