#!/usr/bin/env node
import "dotenv/config";
import { runApp } from "./app.js";
import { USAGE, parseCli } from "./cli.js";
import { systemClipboard } from "./clipboard.js";
import { configFromEnv, resolveConfig, resolvePath } from "./config.js";
import { createClient } from "./drivers/index.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createFileLogger } from "./logger.js";
import { ConnectionRegistry } from "./registry.js";
import { TerminalSession } from "./terminal/session.js";
import { DatabaseClientUI } from "./ui/client-ui.js";

async function main(argv: string[]): Promise<number> {
  const cli = parseCli(argv);
  if (cli.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new ConfigError("sqlpane needs an interactive terminal.");
  }

  const config = resolveConfig({ ...configFromEnv(), ...cli.overrides });
  const logger = createFileLogger(config.logFile, config.logLevel);
  logger.info("Starting sqlpane");

  const registry = new ConnectionRegistry(createClient, { poolSize: config.poolSize, logger }, logger);
  const ui = new DatabaseClientUI({ registry, config, logger, clipboard: systemClipboard });
  if (cli.file !== undefined) await ui.openSqliteFile(resolvePath(cli.file));

  const terminal = TerminalSession.open();
  try {
    await runApp(ui, terminal);
  } finally {
    terminal.release();
    await registry.disconnect();
  }
  logger.info("Exiting");
  return 0;
}

void main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`sqlpane: ${errorMessage(e)}\n`);
    process.exit(1);
  },
);
