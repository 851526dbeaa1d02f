import http from "node:http";
import { Socket } from "node:net";
import type { Duplex } from "node:stream";
import { scopedLogger } from "./logger.ts";
import type { ReloadEndpoint } from "./reload/reload-endpoint.ts";
import { pathnameOf, sendError } from "./http.ts";
import type { RequestHandler } from "./static/static-responder.ts";

const log = scopedLogger("dispatch");

export type DispatcherOptions = {
  reloadEndpoint: ReloadEndpoint;
  reloadPath: string;
  /** Handler for plain requests; without one they get 426 (websocket-only port). */
  serveStatic?: RequestHandler;
};

export type Dispatcher = {
  handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void;
  handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void;
};

/**
 * Answer an upgrade we won't take on the raw socket, then drop it.
 */
function rejectUpgrade(socket: Duplex, status: number): void {
  const message = http.STATUS_CODES[status] ?? "";
  socket.once("finish", () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${status} ${message}\r\n` +
      "Connection: close\r\n" +
      "Content-Type: text/plain; charset=utf-8\r\n" +
      `Content-Length: ${Buffer.byteLength(message)}\r\n` +
      "\r\n" +
      message,
  );
}

/**
 * Answer a request that arrived on the upgrade path as plain HTTP/1.1, ignoring
 * the upgrade offer. Node's parser has let go of the socket, so the
 * connection closes once the response is written.
 */
function respondWithoutUpgrade(
  req: http.IncomingMessage,
  socket: Socket,
  handleRequest: Dispatcher["handleRequest"],
): void {
  const res = new http.ServerResponse(req);
  res.shouldKeepAlive = false;
  res.assignSocket(socket);
  res.once("finish", () => {
    res.detachSocket(socket);
    socket.end();
  });
  handleRequest(req, res);
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const { reloadEndpoint, reloadPath, serveStatic } = options;

  const handleRequest: Dispatcher["handleRequest"] = (req, res) => {
    if (pathnameOf(req.url) === reloadPath || !serveStatic) {
      log.debug(`${req.method} ${req.url} → 426`);
      sendError(req, res, 426, { upgrade: "websocket" });
      return;
    }

    serveStatic(req, res).catch((err: unknown) => {
      log.error(`${req.method} ${req.url}: unhandled error`, err);
      if (!res.headersSent) {
        sendError(req, res, 500);
      } else {
        res.destroy();
      }
    });
  };

  return {
    handleRequest,

    handleUpgrade(req, socket, head) {
      socket.on("error", (err) => {
        log.debug(`upgrade socket error: ${err.message}`);
      });

      const upgrade = req.headers.upgrade?.toLowerCase();
      if (pathnameOf(req.url) === reloadPath && upgrade === "websocket") {
        reloadEndpoint.handleUpgrade(req, socket, head);
        return;
      }

      if (serveStatic && socket instanceof Socket) {
        log.debug(`ignoring ${upgrade ?? "unnamed"} upgrade offer for ${req.url}`);
        respondWithoutUpgrade(req, socket, handleRequest);
        return;
      }

      log.debug(`rejected upgrade to ${req.url} (${upgrade ?? "no upgrade header"})`);
      rejectUpgrade(socket, 400);
    },
  };
}

/**
 * Node HTTP server that routes through `dispatcher`.
 */
export function createDispatchServer(dispatcher: Dispatcher): http.Server {
  const server = http.createServer((req, res) => dispatcher.handleRequest(req, res));
  server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    dispatcher.handleUpgrade(req, socket, head);
  });
  server.on("clientError", (err: Error, socket: Duplex) => {
    log.debug(`client error: ${err.message}`);
    if (socket.writable) {
      socket.end("HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n");
    } else {
      socket.destroy();
    }
  });
  return server;
}
