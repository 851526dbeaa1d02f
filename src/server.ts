import type http from "node:http";
import type { ServerConfig } from "./config.ts";
import { createDispatcher, createDispatchServer } from "./dispatcher.ts";
import { scopedLogger } from "./logger.ts";
import { closeServer, listen } from "./port.ts";
import { renderClientScript } from "./reload/inject.ts";
import { ReloadChannel } from "./reload/reload-channel.ts";
import { ReloadEndpoint } from "./reload/reload-endpoint.ts";
import { createStaticResponder } from "./static/static-responder.ts";
import { createChangeTrigger, type ChangeTrigger } from "./trigger/change-trigger.ts";
import { startTriggerServer } from "./trigger/trigger-server.ts";
import { startExternalWatcher, type ExternalWatcher } from "./watch/external-watcher.ts";
import { startFileWatcher, type FileWatcher } from "./watch/watcher.ts";

const log = scopedLogger();

export type LiveServerOptions = {
  heartbeatInterval?: number;
  debounceMs?: number;
};

export type LiveServerUrls = {
  http: string;
  ws: string;
  trigger: string;
};

export type LiveServer = {
  config: ServerConfig;
  channel: ReloadChannel;
  trigger: ChangeTrigger;
  ports: { http: number; ws: number; trigger: number };
  urls: LiveServerUrls;
  close(): Promise<void>;
};

function displayHost(host: string): string {
  if (host === "0.0.0.0" || host === "::") return "localhost";
  return host.includes(":") ? `[${host}]` : host;
}

async function closeHttpServer(server: http.Server): Promise<void> {
  const closing = closeServer(server);
  server.closeAllConnections();
  await closing;
}

/**
 * Bind every listener for `config` and start watching when asked to. Rejects
 * with ServerStartError, after releasing whatever was already bound, when a
 * port cannot be bound.
 */
export async function startLiveServer(
  config: ServerConfig,
  options: LiveServerOptions = {},
): Promise<LiveServer> {
  const channel = new ReloadChannel();
  const reloadEndpoint = new ReloadEndpoint({
    channel,
    heartbeatInterval: options.heartbeatInterval,
  });
  const trigger = createChangeTrigger(channel);

  const servers: http.Server[] = [];
  let fileWatcher: FileWatcher | undefined;
  let externalWatcher: ExternalWatcher | undefined;

  const close = async () => {
    await Promise.all([fileWatcher?.close(), externalWatcher?.stop()]);
    await reloadEndpoint.close();
    channel.closeAll();
    await Promise.all(servers.map(closeHttpServer));
  };

  try {
    let wsPort: number | undefined;
    if (config.wsPort !== undefined) {
      const wsServer = createDispatchServer(
        createDispatcher({ reloadEndpoint, reloadPath: config.reloadPath }),
      );
      servers.push(wsServer);
      wsPort = await listen(wsServer, config.wsPort, config.host);
    }

    const triggerServer = await startTriggerServer({ port: config.triggerPort, trigger });
    servers.push(triggerServer.server);

    const injectScript = config.inject
      ? await renderClientScript({ port: wsPort, path: config.reloadPath })
      : undefined;
    const httpServer = createDispatchServer(
      createDispatcher({
        reloadEndpoint,
        reloadPath: config.reloadPath,
        serveStatic: createStaticResponder({ root: config.root, injectScript }),
      }),
    );
    servers.push(httpServer);
    const httpPort = await listen(httpServer, config.port, config.host);

    if (config.watch) {
      fileWatcher = startFileWatcher({
        root: config.root,
        trigger,
        debounceMs: options.debounceMs,
      });
      await fileWatcher.ready;
    }

    if (config.watchCommand) {
      externalWatcher = await startExternalWatcher({
        command: config.watchCommand,
        cwd: config.root,
        triggerUrl: triggerServer.url,
      });
    }

    const host = displayHost(config.host);
    const resolvedWsPort = wsPort ?? httpPort;
    return {
      config,
      channel,
      trigger,
      ports: { http: httpPort, ws: resolvedWsPort, trigger: triggerServer.port },
      urls: {
        http: `http://${host}:${httpPort}/`,
        ws: `ws://${host}:${resolvedWsPort}${config.reloadPath}`,
        trigger: triggerServer.url,
      },
      close,
    };
  } catch (err) {
    await close().catch((closeErr: unknown) => {
      log.debug("cleanup after failed start:", closeErr);
    });
    throw err;
  }
}
