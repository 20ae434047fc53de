import type { BackendKind } from "../drivers/base.js";
import { UnsupportedOperationError } from "../errors.js";

export type FormField = "username" | "password" | "hostname" | "port";

export const FORM_FIELDS: readonly FormField[] = ["username", "password", "hostname", "port"];

const LABELS: Record<FormField, string> = {
  username: "Username",
  password: "Password",
  hostname: "Hostname",
  port: "Port",
};

export interface ConnectionInput {
  username: string;
  password: string;
  hostname: string;
  port: string;
  currentField: FormField;
}

export function emptyConnectionInput(prefill: Partial<Record<Exclude<FormField, "password">, string>> = {}): ConnectionInput {
  return {
    username: prefill.username ?? "",
    password: "",
    hostname: prefill.hostname ?? "",
    port: prefill.port ?? "",
    currentField: "username",
  };
}

/** Moves focus by `delta` fields, stopping at the first and last field. */
export function moveField(input: ConnectionInput, delta: number): ConnectionInput {
  const index = FORM_FIELDS.indexOf(input.currentField) + delta;
  const clamped = Math.max(0, Math.min(index, FORM_FIELDS.length - 1));
  return { ...input, currentField: FORM_FIELDS[clamped] ?? input.currentField };
}

export function isLastField(input: ConnectionInput): boolean {
  return input.currentField === FORM_FIELDS[FORM_FIELDS.length - 1];
}

function withFocusedValue(input: ConnectionInput, value: string): ConnectionInput {
  const next = { ...input };
  next[input.currentField] = value;
  return next;
}

export function typeChar(input: ConnectionInput, ch: string): ConnectionInput {
  return withFocusedValue(input, input[input.currentField] + ch);
}

export function eraseChar(input: ConnectionInput): ConnectionInput {
  return withFocusedValue(input, input[input.currentField].slice(0, -1));
}

/** Form rows as displayed: password masked, focused field marked with ` <`. */
export function formLines(input: ConnectionInput): string[] {
  return FORM_FIELDS.map((field) => {
    const value = field === "password" ? "*".repeat(input.password.length) : input[field];
    return `${LABELS[field]}: ${value}${field === input.currentField ? " <" : ""}`;
  });
}

export type ServerBackend = Exclude<BackendKind, "sqlite">;

export const UNSUPPORTED_BACKEND_MESSAGE = "SQLite is not implemented yet.";

/** Narrows to a backend the form can reach; SQLite is only opened with `--file`. */
export function requireServerBackend(kind: BackendKind): ServerBackend {
  if (kind === "sqlite") throw new UnsupportedOperationError(UNSUPPORTED_BACKEND_MESSAGE);
  return kind;
}

/** Database each server backend connects to before one is picked. */
export const DEFAULT_DATABASE: Record<ServerBackend, string> = {
  postgres: "postgres",
  mysql: "mysql",
};

export function connectionUrl(kind: ServerBackend, input: ConnectionInput, database: string): string {
  const user = encodeURIComponent(input.username);
  const password = encodeURIComponent(input.password);
  return `${kind}://${user}:${password}@${input.hostname}:${input.port}/${database}`;
}
