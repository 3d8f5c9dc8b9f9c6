export type AppConfig = Readonly<{
  account: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  commitFetchConcurrency: number;
  port: number;
  host: string;
}>;

export class AppConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AppConfigError";
  }
}

export const DEFAULT_ACCOUNT = "develop-suda";
export const DEFAULT_API_BASE_URL = "https://api.github.com";
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_COMMIT_FETCH_CONCURRENCY = 1;
export const MAX_COMMIT_FETCH_CONCURRENCY = 10;
export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = "0.0.0.0";
const MIN_PORT = 1;
const MAX_PORT = 65535;

type Environment = Record<string, string | undefined>;

export function parsePort(raw: string): number {
  const parsed = Number(raw);

  if (!Number.isInteger(parsed) || parsed < MIN_PORT || parsed > MAX_PORT) {
    throw new AppConfigError(`Invalid port: ${raw}. Use an integer between ${MIN_PORT}-${MAX_PORT}.`);
  }

  return parsed;
}

function parsePositiveInteger(raw: string, label: string, max?: number): number {
  const parsed = Number(raw);

  if (!Number.isInteger(parsed) || parsed < 1 || (max !== undefined && parsed > max)) {
    const range = max === undefined ? "a positive integer" : `an integer between 1-${max}`;
    throw new AppConfigError(`Invalid ${label}: ${raw}. Use ${range}.`);
  }

  return parsed;
}

export function parseAccount(raw: string): string {
  const account = raw.trim();

  if (!account || account.includes("/")) {
    throw new AppConfigError(`Invalid account: "${raw}". Use a single GitHub user name.`);
  }

  return account;
}

function readEnv(env: Environment, key: string): string | null {
  const value = env[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

export function loadAppConfig(
  env: Environment = process.env,
  overrides: Partial<AppConfig> = {},
): AppConfig {
  const account = readEnv(env, "TIMELINE_ACCOUNT");
  const apiBaseUrl = readEnv(env, "TIMELINE_API_BASE_URL");
  const timeout = readEnv(env, "TIMELINE_REQUEST_TIMEOUT_MS");
  const concurrency = readEnv(env, "TIMELINE_COMMIT_CONCURRENCY");
  const port = readEnv(env, "PORT");
  const host = readEnv(env, "HOST");

  const config: AppConfig = {
    account: account === null ? DEFAULT_ACCOUNT : parseAccount(account),
    apiBaseUrl: (apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ""),
    requestTimeoutMs:
      timeout === null ? DEFAULT_REQUEST_TIMEOUT_MS : parsePositiveInteger(timeout, "request timeout"),
    commitFetchConcurrency:
      concurrency === null
        ? DEFAULT_COMMIT_FETCH_CONCURRENCY
        : parsePositiveInteger(concurrency, "commit fetch concurrency", MAX_COMMIT_FETCH_CONCURRENCY),
    port: port === null ? DEFAULT_PORT : parsePort(port),
    host: host ?? DEFAULT_HOST,
  };

  return Object.freeze({ ...config, ...overrides });
}
