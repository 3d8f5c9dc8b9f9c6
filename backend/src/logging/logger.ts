import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";

type BackendLogLevel = "debug" | "info" | "warn" | "error";
type BackendLogScope = "app" | "http" | "github" | "history";

const LEVELS: readonly BackendLogLevel[] = ["debug", "info", "warn", "error"];
const DEFAULT_LEVEL: BackendLogLevel = "info";

const SCOPES: Record<BackendLogScope, { envKey: string; enabledByDefault: boolean }> = {
  app: { envKey: "TIMELINE_LOG_APP", enabledByDefault: true },
  http: { envKey: "TIMELINE_LOG_HTTP", enabledByDefault: true },
  github: { envKey: "TIMELINE_LOG_GITHUB", enabledByDefault: false },
  history: { envKey: "TIMELINE_LOG_HISTORY", enabledByDefault: true },
};

const SCOPE_NAMES: readonly BackendLogScope[] = ["app", "http", "github", "history"];

const TRUTHY_FLAGS = new Set(["1", "true", "yes", "on"]);
const FALSY_FLAGS = new Set(["0", "false", "no", "off"]);

const MAX_STRING_LENGTH = 200;
const MAX_DEPTH = 3;

export function parseBooleanEnvFlag(rawValue: string | undefined, defaultValue: boolean): boolean {
  const normalized = rawValue?.trim().toLowerCase();

  if (normalized === undefined) {
    return defaultValue;
  }

  if (TRUTHY_FLAGS.has(normalized)) {
    return true;
  }

  return FALSY_FLAGS.has(normalized) ? false : defaultValue;
}

export function parseBackendLogLevel(rawValue: string | undefined): BackendLogLevel {
  const normalized = rawValue?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? DEFAULT_LEVEL;
}

function activeLogLevel(): BackendLogLevel {
  return parseBackendLogLevel(process.env.TIMELINE_LOG_LEVEL);
}

// Vitest sets VITEST=true; logs stay quiet there unless TIMELINE_LOG_FORCE is on.
function loggingAllowed(): boolean {
  if (parseBooleanEnvFlag(process.env.TIMELINE_LOG_FORCE, false)) {
    return true;
  }

  return process.env.NODE_ENV !== "test" && process.env.VITEST !== "true";
}

export function isBackendLogScopeEnabled(scope: BackendLogScope): boolean {
  const { envKey, enabledByDefault } = SCOPES[scope];
  return loggingAllowed() && parseBooleanEnvFlag(process.env[envKey], enabledByDefault);
}

function toLoggable(value: unknown, depth: number): unknown {
  if (typeof value === "string") {
    return value.length > MAX_STRING_LENGTH
      ? `${value.slice(0, MAX_STRING_LENGTH)}... (truncated, len=${value.length})`
      : value;
  }

  if (value instanceof Error) {
    return { name: value.name, message: toLoggable(value.message, depth) };
  }

  if (value === null || typeof value !== "object") {
    return typeof value === "bigint" ? value.toString() : value;
  }

  if (depth >= MAX_DEPTH) {
    return "[max-depth]";
  }

  if (Array.isArray(value)) {
    return value.map((item) => toLoggable(item, depth + 1));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, toLoggable(entry, depth + 1)]),
  );
}

export function stringifyMetadata(metadata: Record<string, unknown> | undefined): string {
  if (!metadata || Object.keys(metadata).length === 0) {
    return "";
  }

  return JSON.stringify(toLoggable(metadata, 0));
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

// <dir>/YYYYMM/YYYYMMDD/app.log, in local time
export function resolveLogFilePath(logDir: string, now: Date): string {
  const yearMonth = `${now.getFullYear()}${pad2(now.getMonth() + 1)}`;
  const yearMonthDay = `${yearMonth}${pad2(now.getDate())}`;
  return path.join(logDir, yearMonth, yearMonthDay, "app.log");
}

let fileSinkFailed = false;

function writeToFileSink(line: string, now: Date) {
  const logDir = process.env.TIMELINE_LOG_DIR?.trim();
  if (!logDir || fileSinkFailed) {
    return;
  }

  const filePath = resolveLogFilePath(logDir, now);

  try {
    mkdirSync(path.dirname(filePath), { recursive: true });
    appendFileSync(filePath, `${line}\n`, "utf8");
  } catch (error) {
    fileSinkFailed = true;
    console.error(
      `[${now.toISOString()}] [error] [app] log-file:disabled ${stringifyMetadata({ filePath, error })}`,
    );
  }
}

const CONSOLE_WRITERS: Record<BackendLogLevel, (line: string) => void> = {
  debug: (line) => console.info(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function logBackendEvent(
  scope: BackendLogScope,
  level: BackendLogLevel,
  message: string,
  metadata?: Record<string, unknown>,
) {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(activeLogLevel()) || !isBackendLogScopeEnabled(scope)) {
    return;
  }

  const now = new Date();
  const metadataChunk = stringifyMetadata(metadata);
  const line = [`[${now.toISOString()}] [${level}] [${scope}]`, message, metadataChunk]
    .filter((part) => part.length > 0)
    .join(" ");

  writeToFileSink(line, now);
  CONSOLE_WRITERS[level](line);
}

export function getBackendLoggingConfigSnapshot(): Record<string, unknown> {
  return {
    level: activeLogLevel(),
    logDir: process.env.TIMELINE_LOG_DIR?.trim() || null,
    scopes: Object.fromEntries(
      SCOPE_NAMES.map((scope) => [scope, isBackendLogScopeEnabled(scope)]),
    ),
  };
}

export type { BackendLogLevel, BackendLogScope };
