import { appendFileSync } from "node:fs";

export type LogLevel = "off" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["off", "error", "warn", "info", "debug"];

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export const silentLogger: Logger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
};

type Sink = (line: string) => void;

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Builds a logger that formats `<ISO time> <LEVEL> <message>` lines and hands
 * them to `sink` when `level` lets them through.
 */
export function createLogger(level: LogLevel, sink: Sink, now: () => Date = () => new Date()): Logger {
  const threshold = rank(level);
  const emit = (at: Exclude<LogLevel, "off">, message: string): void => {
    if (threshold < rank(at)) return;
    sink(`${now().toISOString()} ${at.toUpperCase()} ${message}\n`);
  };
  return {
    error: (m) => emit("error", m),
    warn: (m) => emit("warn", m),
    info: (m) => emit("info", m),
    debug: (m) => emit("debug", m),
  };
}

/**
 * File-backed logger. stdout belongs to the terminal UI, so nothing is ever
 * written there; a failing log write is dropped rather than crashing the UI.
 */
export function createFileLogger(path: string, level: LogLevel): Logger {
  if (level === "off") return silentLogger;
  let broken = false;
  return createLogger(level, (line) => {
    if (broken) return;
    try {
      appendFileSync(path, line);
    } catch (e) {
      broken = true;
      process.stderr.write(`sqlpane: logging to ${path} disabled: ${e instanceof Error ? e.message : String(e)}\n`);
    }
  });
}
