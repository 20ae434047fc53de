import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

export const ConfigSchema = Type.Object({
  logFile: Type.String({ default: "sqlpane-debug.log", minLength: 1 }),
  logLevel: Type.Union(
    [Type.Literal("off"), Type.Literal("error"), Type.Literal("warn"), Type.Literal("info"), Type.Literal("debug")],
    { default: "off" },
  ),
  /** Upper bound for the lazy database/table list fetches. */
  fetchTimeoutMs: Type.Integer({ default: 5000, minimum: 1 }),
  maxResultRows: Type.Integer({ default: 1000, minimum: 1 }),
  poolSize: Type.Integer({ default: 5, minimum: 1, maximum: 100 }),
  debugHistory: Type.Integer({ default: 100, minimum: 1 }),
  /** Pre-fills the connection form. */
  defaults: Type.Object(
    {
      username: Type.String({ default: "" }),
      hostname: Type.String({ default: "" }),
      port: Type.String({ default: "" }),
    },
    { default: {} },
  ),
});

export type AppConfig = Static<typeof ConfigSchema>;

export function resolveConfig(raw?: Record<string, unknown>): AppConfig {
  const candidate = Value.Convert(ConfigSchema, Value.Default(ConfigSchema, Value.Clone(raw ?? {})));
  if (Value.Check(ConfigSchema, candidate)) return candidate;

  const first = Value.Errors(ConfigSchema, candidate).First();
  const where = first?.path ? first.path.slice(1).replace(/\//g, ".") : "config";
  throw new ConfigError(`Invalid configuration at ${where}: ${first?.message ?? "unknown error"}`);
}

/**
 * Collects configuration from `SQLPANE_*` environment variables. Unset
 * variables are left out so schema defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  const put = (key: string, name: string) => {
    const value = env[name];
    if (value !== undefined && value !== "") raw[key] = value;
  };
  put("logFile", "SQLPANE_LOG_FILE");
  put("logLevel", "SQLPANE_LOG");
  put("fetchTimeoutMs", "SQLPANE_FETCH_TIMEOUT_MS");
  put("maxResultRows", "SQLPANE_MAX_ROWS");
  put("poolSize", "SQLPANE_POOL_SIZE");
  put("debugHistory", "SQLPANE_DEBUG_HISTORY");

  const defaults: Record<string, string> = {};
  for (const [key, name] of [
    ["username", "SQLPANE_USER"],
    ["hostname", "SQLPANE_HOST"],
    ["port", "SQLPANE_PORT"],
  ] as const) {
    const value = env[name];
    if (value !== undefined) defaults[key] = value;
  }
  if (Object.keys(defaults).length > 0) raw.defaults = defaults;
  return raw;
}

/**
 * Expand $ENV_VAR references in a string to their process.env values.
 * Throws if the variable is not set.
 */
export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_match, name: string) => {
    const val = env[name];
    if (val === undefined) {
      throw new ConfigError(`Environment variable $${name} is not set. Set it before connecting.`);
    }
    return val;
  });
}

/**
 * Resolve a path, expanding ~ to home directory and $ENV_VAR references.
 */
export function resolvePath(p: string, env: NodeJS.ProcessEnv = process.env): string {
  let resolved = expandEnv(p, env);
  if (resolved.startsWith("~/")) {
    resolved = resolved.replace("~", env.HOME ?? "/tmp");
  }
  return resolved;
}
