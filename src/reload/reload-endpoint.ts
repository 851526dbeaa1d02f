import type http from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, type WebSocket } from "ws";
import { scopedLogger } from "../logger.ts";
import {
  nextClientId,
  type ClientConnection,
  type ReloadChannel,
  type SubscriptionHandle,
} from "./reload-channel.ts";
import { CONNECTED, encodeMessage, type ReloadMessage } from "./protocol.ts";

const log = scopedLogger("ws");

const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
const CLOSE_GRACE_MS = 1_000;

/**
 * `handshaking → registered → closed`. Each push received while `registered`
 * is a self-loop; `closed` is terminal.
 */
export type ConnectionState = "handshaking" | "registered" | "closed";

export type ReloadEndpointOptions = {
  channel: ReloadChannel;
  /** Ping period in ms; `0` disables the heartbeat. */
  heartbeatInterval?: number;
};

class WebSocketClient implements ClientConnection {
  readonly id = nextClientId();
  state: ConnectionState = "handshaking";
  alive = true;
  handle: SubscriptionHandle | undefined;

  constructor(
    readonly ws: WebSocket,
    private readonly onSendError: (client: WebSocketClient, err: Error) => void,
  ) {}

  push(message: ReloadMessage): boolean {
    if (this.state !== "registered" || this.ws.readyState !== this.ws.OPEN) {
      return false;
    }
    this.ws.send(encodeMessage(message), (err) => {
      if (err) this.onSendError(this, err);
    });
    return true;
  }

  close(): void {
    if (this.ws.readyState === this.ws.OPEN || this.ws.readyState === this.ws.CONNECTING) {
      this.ws.close(1001, "Server shutting down");
    }
  }
}

/**
 * Completes websocket upgrades for the reload path and keeps each client in
 * the channel until its socket closes or errors.
 */
export class ReloadEndpoint {
  private readonly wss = new WebSocketServer({ noServer: true, clientTracking: false });
  private readonly clients = new Set<WebSocketClient>();
  private readonly channel: ReloadChannel;
  private readonly heartbeat: NodeJS.Timeout | undefined;
  private closing: Promise<void> | undefined;

  constructor(options: ReloadEndpointOptions) {
    this.channel = options.channel;
    const interval = options.heartbeatInterval ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    if (interval > 0) {
      this.heartbeat = setInterval(() => this.checkAlive(), interval);
      this.heartbeat.unref();
    }
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.closing) {
      socket.destroy();
      return;
    }
    log.debug(`upgrade ${req.url ?? ""} from ${req.socket.remoteAddress ?? "unknown"}`);
    this.wss.handleUpgrade(req, socket, head, (ws) => this.accept(ws));
  }

  private accept(ws: WebSocket): void {
    if (this.closing) {
      ws.terminate();
      return;
    }
    const client = new WebSocketClient(ws, (failed, err) => {
      log.debug(`send to client #${failed.id} failed: ${err.message}`);
      this.drop(failed);
    });

    ws.on("pong", () => {
      client.alive = true;
    });
    ws.on("close", () => this.drop(client));
    ws.on("error", (err) => {
      log.debug(`client #${client.id} error: ${err.message}`);
      this.drop(client);
    });

    this.clients.add(client);
    client.handle = this.channel.register(client);
    client.state = "registered";
    ws.send(encodeMessage(CONNECTED));
    log.info(`client #${client.id} connected (${this.channel.size} connected)`);
  }

  private drop(client: WebSocketClient): void {
    if (client.state === "closed") return;
    client.state = "closed";
    this.clients.delete(client);
    if (client.handle) this.channel.unregister(client.handle);
    log.info(`client #${client.id} disconnected (${this.channel.size} connected)`);
  }

  private checkAlive(): void {
    for (const client of this.clients) {
      if (!client.alive) {
        log.debug(`client #${client.id} missed a heartbeat`);
        client.ws.terminate();
        this.drop(client);
        continue;
      }
      client.alive = false;
      client.ws.ping();
    }
  }

  /**
   * Close every client with 1001 "going away", terminating any that have not
   * finished the close handshake after a short grace period.
   */
  close(): Promise<void> {
    if (!this.closing) this.closing = this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    if (this.heartbeat) clearInterval(this.heartbeat);

    const pending = Array.from(this.clients, (client) => waitForClose(client.ws));
    for (const client of this.clients) client.close();

    const grace = setTimeout(() => {
      for (const client of this.clients) client.ws.terminate();
    }, CLOSE_GRACE_MS);
    grace.unref();

    await Promise.all(pending);
    clearTimeout(grace);

    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

function waitForClose(ws: WebSocket): Promise<void> {
  if (ws.readyState === ws.CLOSED) return Promise.resolve();
  return new Promise((resolve) => ws.once("close", () => resolve()));
}
