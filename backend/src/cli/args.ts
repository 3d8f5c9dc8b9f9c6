import { type AppConfig, AppConfigError, parseAccount, parsePort } from "../config/app-config.js";

export type CliConfigOverrides = Partial<Pick<AppConfig, "account" | "port" | "host">>;

export type CliParseResult =
  | {
      kind: "help";
      message: string;
    }
  | {
      kind: "run";
      overrides: CliConfigOverrides;
    };

export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgsError";
  }
}

export function formatHelp(binaryName = "commit-timeline"): string {
  return [
    "commit-timeline",
    "",
    "Serves the combined commit history of one GitHub account's public repositories.",
    "",
    "Usage:",
    `  ${binaryName} [--account <name>] [--port <number>] [--host <host>]`,
    "",
    "Examples:",
    `  ${binaryName}`,
    `  ${binaryName} --account octo-user`,
    `  ${binaryName} --port 4000 --host 127.0.0.1`,
    "",
    "Options:",
    "  -a, --account <name>  GitHub account to aggregate (default: TIMELINE_ACCOUNT or develop-suda)",
    "  -p, --port <number>   UI/API server port (default: PORT or 8080)",
    "      --host <host>     Host interface (default: HOST or 0.0.0.0)",
    "  -h, --help            Show help",
  ].join("\n");
}

function requireValue(flag: string, next: string | undefined): string {
  if (!next || next.startsWith("-")) {
    throw new CliArgsError(`Missing value for ${flag}.`);
  }

  return next;
}

function rethrowAsArgsError<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof AppConfigError) {
      throw new CliArgsError(error.message);
    }

    throw error;
  }
}

function readInlineValue(token: string, flag: string): string {
  const value = token.slice(flag.length + 1);
  if (!value.trim()) {
    throw new CliArgsError(`${flag} value cannot be empty.`);
  }

  return value;
}

export function parseCliArgs(argv: string[]): CliParseResult {
  const overrides: { -readonly [K in keyof CliConfigOverrides]: CliConfigOverrides[K] } = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";
    const next = argv[index + 1];

    if (token === "-h" || token === "--help") {
      return {
        kind: "help",
        message: formatHelp(),
      };
    }

    if (token === "-p" || token === "--port") {
      const value = requireValue(token, next);
      overrides.port = rethrowAsArgsError(() => parsePort(value));
      index += 1;
      continue;
    }

    if (token.startsWith("--port=")) {
      const value = readInlineValue(token, "--port");
      overrides.port = rethrowAsArgsError(() => parsePort(value));
      continue;
    }

    if (token === "-a" || token === "--account") {
      const value = requireValue(token, next);
      overrides.account = rethrowAsArgsError(() => parseAccount(value));
      index += 1;
      continue;
    }

    if (token.startsWith("--account=")) {
      const value = readInlineValue(token, "--account");
      overrides.account = rethrowAsArgsError(() => parseAccount(value));
      continue;
    }

    if (token === "--host") {
      overrides.host = requireValue(token, next);
      index += 1;
      continue;
    }

    if (token.startsWith("--host=")) {
      overrides.host = readInlineValue(token, "--host");
      continue;
    }

    if (token.startsWith("-")) {
      throw new CliArgsError(`Unknown flag: ${token}`);
    }

    throw new CliArgsError(`Unexpected argument: ${token}`);
  }

  return {
    kind: "run",
    overrides,
  };
}
