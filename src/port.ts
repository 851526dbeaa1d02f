import type { Server } from "node:net";
import { ServerStartError } from "./errors.ts";

/**
 * Bind `server` to host:port and resolve with the bound port. There is no
 * fallback port: a failed bind rejects with ServerStartError.
 */
export function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(new ServerStartError(host, port, { cause: err }));
    };
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const addr = server.address();
      resolve(addr !== null && typeof addr !== "string" ? addr.port : port);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
