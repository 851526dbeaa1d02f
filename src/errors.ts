/**
 * Invalid command-line flag or config file value.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * A listener could not be bound, so the server never became servable.
 */
export class ServerStartError extends Error {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Cannot listen on ${host}:${port}${reason}`, options);
    this.name = "ServerStartError";
    this.host = host;
    this.port = port;
  }
}
