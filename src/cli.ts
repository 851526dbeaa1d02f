import { networkInterfaces } from "node:os";
import open from "open";

import type { ServerConfig } from "./config.ts";
import { logger } from "./logger.ts";
import { startLiveServer, type LiveServer, type LiveServerOptions } from "./server.ts";

export type StartOptions = LiveServerOptions & {
  name: string;
  version: string;
  /** Install SIGINT/SIGTERM handlers that close the server and exit. */
  handleSignals?: boolean;
};

/**
 * Private IPv4 addresses of this machine, for reaching the server from other
 * devices on the LAN.
 */
export function lanAddresses(): string[] {
  const addresses: string[] = [];
  for (const infos of Object.values(networkInterfaces())) {
    for (const info of infos ?? []) {
      if (info.family === "IPv4" && !info.internal && isPrivateIPv4(info.address)) {
        addresses.push(info.address);
      }
    }
  }
  return addresses;
}

export function isPrivateIPv4(address: string): boolean {
  const [a, b] = address.split(".").map(Number);
  return a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168);
}

function printBanner(server: LiveServer, options: StartOptions): void {
  const { config, urls, ports } = server;
  logger.info(`${options.name} ${options.version}`);
  logger.info(`addr: ${urls.http}`);
  logger.info(`root dir: ${config.root}`);
  logger.info(`live reload: ${urls.ws}`);
  logger.info(`trigger: POST ${urls.trigger}`);

  if (config.host === "0.0.0.0") {
    const addresses = lanAddresses();
    if (addresses.length > 0) {
      logger.info("Available (IPv4 LAN) address(es):");
      for (const ip of addresses) {
        logger.info(`\t--host ${ip} --port ${ports.http} | http://${ip}:${ports.http}/`);
      }
    }
  }
}

export async function startReloadServe(
  config: ServerConfig,
  options: StartOptions,
): Promise<LiveServer> {
  const server = await startLiveServer(config, options);
  printBanner(server, options);

  if (options.handleSignals) {
    let stopping = false;
    const shutdown = () => {
      if (stopping) return;
      stopping = true;
      logger.info("\n[reload-serve] Shutting down...");
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error("[reload-serve] Error during shutdown:", err);
          process.exit(1);
        },
      );
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  }

  if (config.open) {
    logger.info("[reload-serve] Opening browser...");
    try {
      await open(server.urls.http);
    } catch (err) {
      logger.warn("[reload-serve] Could not open a browser:", err);
    }
  }

  logger.info("\n[reload-serve] Ready. Press Ctrl+C to stop.\n");
  return server;
}
