import { scopedLogger } from "../logger.ts";
import type { BroadcastResult, ReloadChannel } from "../reload/reload-channel.ts";

const log = scopedLogger("trigger");

/**
 * Broadcasts one reload per call. Safe to call from anywhere, at any time,
 * including while requests are in flight or another broadcast just ran.
 */
export type ChangeTrigger = (reason?: string) => BroadcastResult;

export function createChangeTrigger(channel: ReloadChannel): ChangeTrigger {
  return (reason) => {
    const result = channel.broadcast();
    const suffix = result.failed > 0 ? `, ${result.failed} dropped` : "";
    log.info(
      `reload${reason ? ` (${reason})` : ""}: notified ${result.delivered} client(s)${suffix}`,
    );
    return result;
  };
}
