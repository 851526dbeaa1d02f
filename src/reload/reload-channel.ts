import { scopedLogger } from "../logger.ts";
import { RELOAD, type ReloadMessage } from "./protocol.ts";

const log = scopedLogger("reload");

/**
 * One live-reload subscriber as seen by the channel.
 */
export interface ClientConnection {
  readonly id: number;

  /**
   * Hand `message` to the transport. Returns `false` (or throws) when the
   * connection can no longer deliver, e.g. the socket is closing.
   */
  push(message: ReloadMessage): boolean;

  close(): void;
}

export type SubscriptionHandle = Readonly<{ id: number }>;

export type BroadcastResult = {
  delivered: number;
  failed: number;
};

let nextConnectionId = 1;

/**
 * Process-unique connection id for {@link ClientConnection} implementations.
 */
export function nextClientId(): number {
  return nextConnectionId++;
}

/**
 * Registry of connected live-reload clients.
 *
 * Every operation runs to completion on the event loop before another starts,
 * so `register`, `unregister` and `broadcast` never interleave. `broadcast`
 * iterates a snapshot: a connection registered while it is delivering is left
 * for the next broadcast, and a connection unregistered meanwhile is skipped.
 */
export class ReloadChannel {
  private readonly connections = new Map<number, ClientConnection>();

  get size(): number {
    return this.connections.size;
  }

  register(connection: ClientConnection): SubscriptionHandle {
    if (!this.connections.has(connection.id)) {
      this.connections.set(connection.id, connection);
      log.debug(`client #${connection.id} registered (${this.connections.size} connected)`);
    }
    return Object.freeze({ id: connection.id });
  }

  unregister(handle: SubscriptionHandle): boolean {
    const removed = this.connections.delete(handle.id);
    if (removed) {
      log.debug(`client #${handle.id} unregistered (${this.connections.size} connected)`);
    }
    return removed;
  }

  has(handle: SubscriptionHandle): boolean {
    return this.connections.has(handle.id);
  }

  broadcast(message: ReloadMessage = RELOAD): BroadcastResult {
    const snapshot = Array.from(this.connections.values());
    const failedConnections: ClientConnection[] = [];
    let delivered = 0;

    for (const connection of snapshot) {
      // Skip clients removed by an earlier push in this same loop
      if (this.connections.get(connection.id) !== connection) continue;

      let ok: boolean;
      try {
        ok = connection.push(message);
      } catch (err) {
        log.debug(`push to client #${connection.id} failed:`, err);
        ok = false;
      }
      if (ok) {
        delivered++;
      } else {
        failedConnections.push(connection);
      }
    }

    for (const connection of failedConnections) {
      this.unregister(connection);
    }

    log.debug(
      `broadcast ${message.type}: ${delivered} delivered, ${failedConnections.length} failed`,
    );
    return { delivered, failed: failedConnections.length };
  }

  /**
   * Close and forget every connection.
   */
  closeAll(): void {
    const snapshot = Array.from(this.connections.values());
    this.connections.clear();
    for (const connection of snapshot) {
      try {
        connection.close();
      } catch (err) {
        log.debug(`closing client #${connection.id} failed:`, err);
      }
    }
  }
}
