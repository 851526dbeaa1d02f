#!/usr/bin/env -S node --import tsx
import { createRequire } from "node:module";
import { parseCliArgs, resolveConfig, type CliArgs } from "../src/config.ts";
import { startReloadServe } from "../src/cli.ts";
import { ConfigError, ServerStartError } from "../src/errors.ts";
import { logger, setLogLevel } from "../src/logger.ts";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { name: string; version: string };

const HELP = `Usage: reload-serve [root] [options]

Serves [root] (default ".") and reloads connected browsers when files change.

Options:
  --host <addr>            Address to bind (default: 127.0.0.1)
  --port, -p <port>        HTTP port (default: 4000)
  --ws-port <port>         Live-reload websocket port (default: 8090)
  --trigger-port <port>    Local reload trigger port (default: 8091)
  --watch, -w              Watch the root directory and reload on change
  --watch-command <cmd>    Run <cmd> in the root; it should POST to $RELOAD_TRIGGER_URL
  --no-inject              Do not add the live-reload script to HTML pages
  --open                   Open the browser after starting
  --log-level <lvl>        debug, info, warn, error or silent (default: info)
  --version, -v            Show version
  --help, -h               Show this help message

Config file: .reload-serve.json in the root directory; flags take precedence.`;

function fail(err: unknown): never {
  if (err instanceof ConfigError || err instanceof ServerStartError) {
    logger.error(`[reload-serve] ${err.message}`);
  } else {
    logger.error("[reload-serve] Failed to start:", err);
  }
  process.exit(1);
}

let args: CliArgs;
try {
  args = parseCliArgs(process.argv.slice(2));
} catch (err) {
  fail(err);
}

if (args.help) {
  console.log(HELP);
  process.exit(0);
}

if (args.version) {
  console.log(`${pkg.name} v${pkg.version}`);
  process.exit(0);
}

try {
  const config = await resolveConfig(args);
  setLogLevel(config.logLevel);
  await startReloadServe(config, {
    name: pkg.name,
    version: pkg.version,
    handleSignals: true,
  });
} catch (err) {
  fail(err);
}
