/**
 * Messages sent from the server to live-reload clients. The channel is
 * one-way: anything a client sends is discarded.
 *
 * All payloads have a `type` property that can be used with type narrowing.
 */
export type ReloadMessage = ConnectedMessage | ReloadEvent;

/**
 * Sent once after the websocket handshake completes.
 */
export type ConnectedMessage = {
  type: "connected";
};

/**
 * Something under the root changed; the page should reload. Carries no
 * other data.
 */
export type ReloadEvent = {
  type: "reload";
};

export const CONNECTED: ConnectedMessage = Object.freeze({ type: "connected" });

export const RELOAD: ReloadEvent = Object.freeze({ type: "reload" });

export function encodeMessage(message: ReloadMessage): string {
  return JSON.stringify(message);
}
