import { readFile } from "node:fs/promises";
import { join, resolve as resolvePath } from "node:path";
import { parseArgs } from "node:util";
import { ConfigError } from "./errors.ts";
import { parseLogLevel, type LogLevel } from "./logger.ts";

export const CONFIG_FILE_NAME = ".reload-serve.json";

export const DEFAULTS = {
  host: "127.0.0.1",
  port: 4000,
  wsPort: 8090,
  triggerPort: 8091,
  root: ".",
  reloadPath: "/__livereload",
} as const;

export type ServerConfig = Readonly<{
  host: string;
  port: number;
  /** Separate websocket listener; `undefined` shares the HTTP port. */
  wsPort?: number;
  /** Always bound to 127.0.0.1. */
  triggerPort: number;
  root: string;
  watch: boolean;
  watchCommand?: string;
  reloadPath: string;
  inject: boolean;
  open: boolean;
  logLevel: LogLevel;
}>;

type ConfigFile = {
  host?: string;
  port?: number;
  wsPort?: number;
  triggerPort?: number;
  watch?: boolean;
  watchCommand?: string;
  reloadPath?: string;
  inject?: boolean;
  logLevel?: string;
};

export type CliArgs = {
  root?: string;
  host?: string;
  port?: string;
  wsPort?: string;
  triggerPort?: string;
  watch?: boolean;
  watchCommand?: string;
  noInject?: boolean;
  open?: boolean;
  logLevel?: string;
  help?: boolean;
  version?: boolean;
};

function parseArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      host: { type: "string" },
      port: { type: "string", short: "p" },
      "ws-port": { type: "string" },
      "trigger-port": { type: "string" },
      watch: { type: "boolean", short: "w" },
      "watch-command": { type: "string" },
      "no-inject": { type: "boolean" },
      open: { type: "boolean" },
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    strict: true,
    allowPositionals: true,
  });
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parseArgv>;
  try {
    parsed = parseArgv(argv);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), { cause: err });
  }
  const { values, positionals } = parsed;

  return {
    root: positionals[0],
    host: values.host,
    port: values.port,
    wsPort: values["ws-port"],
    triggerPort: values["trigger-port"],
    watch: values.watch,
    watchCommand: values["watch-command"],
    noInject: values["no-inject"],
    open: values.open,
    logLevel: values["log-level"],
    help: values.help,
    version: values.version,
  };
}

/** `NaN` unless `value` is plain decimal digits. */
function decimal(value: string): number {
  return /^\d+$/.test(value) ? Number(value) : Number.NaN;
}

export function parsePort(value: string | number, flag: string): number {
  const port = typeof value === "number" ? value : decimal(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${flag} must be an integer between 0 and 65535, got "${value}"`);
  }
  return port;
}

function optional<T>(
  source: Record<string, unknown>,
  key: string,
  check: (value: unknown) => value is T,
  expected: string,
): T | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!check(value)) {
    throw new ConfigError(`${CONFIG_FILE_NAME}: "${key}" must be ${expected}`);
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseConfigFile(content: string): ConfigFile {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILE_NAME} is not valid JSON`, { cause: err });
  }
  if (!isRecord(data)) {
    throw new ConfigError(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }
  return {
    host: optional(data, "host", isString, "a string"),
    port: optional(data, "port", isNumber, "a number"),
    wsPort: optional(data, "wsPort", isNumber, "a number"),
    triggerPort: optional(data, "triggerPort", isNumber, "a number"),
    watch: optional(data, "watch", isBoolean, "a boolean"),
    watchCommand: optional(data, "watchCommand", isString, "a string"),
    reloadPath: optional(data, "reloadPath", isString, "a string"),
    inject: optional(data, "inject", isBoolean, "a boolean"),
    logLevel: optional(data, "logLevel", isString, "a string"),
  };
}

export async function loadConfigFile(root: string): Promise<ConfigFile | null> {
  const configPath = join(root, CONFIG_FILE_NAME);
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(`Cannot read ${configPath}`, { cause: err });
  }
  return parseConfigFile(content);
}

function resolveLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return "info";
  const level = parseLogLevel(value);
  if (!level) {
    throw new ConfigError(
      `Unknown log level "${value}". Use debug, info, warn, error or silent`,
    );
  }
  return level;
}

function normalizeReloadPath(value: string): string {
  const path = value.startsWith("/") ? value : `/${value}`;
  if (path === "/") {
    throw new ConfigError("The reload path cannot be the site root");
  }
  if (!/^[\w./~-]+$/.test(path)) {
    throw new ConfigError(`Invalid reload path "${value}"`);
  }
  return path;
}

/**
 * Merge CLI flags over the config file in the root directory over defaults.
 * The result is frozen and lives for the whole process.
 */
export async function resolveConfig(cliArgs: CliArgs): Promise<ServerConfig> {
  const root = resolvePath(cliArgs.root ?? DEFAULTS.root);
  const file = (await loadConfigFile(root)) ?? {};

  const port = parsePort(cliArgs.port ?? file.port ?? DEFAULTS.port, "--port");
  const wsPortValue = cliArgs.wsPort ?? file.wsPort ?? DEFAULTS.wsPort;
  const wsPort = parsePort(wsPortValue, "--ws-port");

  return Object.freeze({
    host: cliArgs.host ?? file.host ?? DEFAULTS.host,
    port,
    wsPort: wsPort === port && port !== 0 ? undefined : wsPort,
    triggerPort: parsePort(
      cliArgs.triggerPort ?? file.triggerPort ?? DEFAULTS.triggerPort,
      "--trigger-port",
    ),
    root,
    watch: cliArgs.watch ?? file.watch ?? false,
    watchCommand: cliArgs.watchCommand ?? file.watchCommand,
    reloadPath: normalizeReloadPath(file.reloadPath ?? DEFAULTS.reloadPath),
    inject: cliArgs.noInject ? false : (file.inject ?? true),
    open: cliArgs.open ?? false,
    logLevel: resolveLogLevel(cliArgs.logLevel ?? file.logLevel),
  });
}
