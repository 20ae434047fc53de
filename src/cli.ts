import { parseArgs } from "node:util";
import { ConfigError } from "./errors.js";

export const USAGE = `Usage: sqlpane [options]

Options:
  --file <path>        open a SQLite database file
  --log-file <path>    write the log to <path> (default: sqlpane-debug.log)
  --log-level <level>  off, error, warn, info or debug (default: off)
  --timeout <ms>       time limit for database and table list fetches
  --max-rows <n>       rows kept from a SELECT result
  -h, --help           show this help`;

export interface CliOptions {
  /** SQLite file to open directly. */
  file?: string;
  help: boolean;
  /** Flag values keyed like `AppConfig`; they win over the environment. */
  overrides: Record<string, unknown>;
}

const OPTIONS = {
  file: { type: "string" },
  "log-file": { type: "string" },
  "log-level": { type: "string" },
  timeout: { type: "string" },
  "max-rows": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true }).values;
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }
}

export function parseCli(argv: string[]): CliOptions {
  const values = parseFlags(argv);

  const overrides: Record<string, unknown> = {};
  if (values["log-file"] !== undefined) overrides.logFile = values["log-file"];
  if (values["log-level"] !== undefined) overrides.logLevel = values["log-level"];
  if (values.timeout !== undefined) overrides.fetchTimeoutMs = values.timeout;
  if (values["max-rows"] !== undefined) overrides.maxResultRows = values["max-rows"];

  return { file: values.file, help: values.help ?? false, overrides };
}
