import http from "node:http";
import { scopedLogger } from "../logger.ts";
import { listen } from "../port.ts";
import { pathnameOf, sendError } from "../http.ts";
import type { ChangeTrigger } from "./change-trigger.ts";

const log = scopedLogger("trigger");

/** Only loopback: the trigger is for watchers on this machine. */
export const TRIGGER_HOST = "127.0.0.1";

const TRIGGER_PATHS = new Set(["/", "/reload"]);

export type TriggerServerOptions = {
  port: number;
  trigger: ChangeTrigger;
};

export type TriggerServer = {
  server: http.Server;
  port: number;
  url: string;
};

/**
 * Listener for out-of-process watchers: `POST /reload` causes one broadcast
 * and answers with the delivery counts as JSON.
 */
export async function startTriggerServer(options: TriggerServerOptions): Promise<TriggerServer> {
  const { trigger } = options;

  const server = http.createServer((req, res) => {
    const pathname = pathnameOf(req.url);
    if (!TRIGGER_PATHS.has(pathname)) {
      sendError(req, res, 404);
      return;
    }
    if (req.method !== "POST") {
      sendError(req, res, 405, { allow: "POST" });
      return;
    }

    // The body, if any, carries nothing we use
    req.resume();
    const result = trigger(`${req.method} ${pathname}`);
    const body = JSON.stringify(result);
    res.writeHead(200, {
      "content-type": "application/json; charset=utf-8",
      "content-length": Buffer.byteLength(body),
    });
    res.end(body);
  });

  const port = await listen(server, options.port, TRIGGER_HOST);
  const url = `http://${TRIGGER_HOST}:${port}/reload`;
  log.debug(`listening on ${url}`);
  return { server, port, url };
}
