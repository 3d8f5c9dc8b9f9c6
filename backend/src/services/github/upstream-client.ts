import { UpstreamApiError, UpstreamTransportError } from "../../domain/upstream-errors.js";
import { logBackendEvent } from "../../logging/logger.js";

export const GITHUB_V3_MEDIA_TYPE = "application/vnd.github.v3+json";
export const UPSTREAM_USER_AGENT = "commit-timeline";

export type UpstreamRequestOptions = {
  accept: string;
  timeoutMs: number;
};

function elapsedMs(startedAt: bigint): number {
  return Number((Number(process.hrtime.bigint() - startedAt) / 1_000_000).toFixed(1));
}

function toTransportError(url: string, error: unknown, signal: AbortSignal, timeoutMs: number) {
  if (signal.aborted) {
    return new UpstreamTransportError(url, `GitHub API request timed out after ${timeoutMs}ms`, true);
  }

  const cause = error instanceof Error ? error.message : String(error);
  return new UpstreamTransportError(url, `GitHub API request failed: ${cause}`, false);
}

/**
 * Issues a GET against the upstream API and resolves with the raw body text.
 *
 * Non-2xx responses reject with {@link UpstreamApiError}; network failures and
 * timeouts reject with {@link UpstreamTransportError}. The body is read to the
 * end on every path, including failures.
 */
export async function getUpstream(url: string, options: UpstreamRequestOptions): Promise<string> {
  const { accept, timeoutMs } = options;
  const signal = AbortSignal.timeout(timeoutMs);
  const startedAt = process.hrtime.bigint();

  logBackendEvent("github", "debug", "upstream:request", { url, timeoutMs });

  let response: Response;
  let body: string;

  try {
    response = await fetch(url, {
      method: "GET",
      headers: {
        Accept: accept,
        "User-Agent": UPSTREAM_USER_AGENT,
      },
      signal,
    });
    body = await response.text();
  } catch (error) {
    const transportError = toTransportError(url, error, signal, timeoutMs);

    logBackendEvent("github", "error", "upstream:error", {
      url,
      durationMs: elapsedMs(startedAt),
      timedOut: transportError.timedOut,
      message: transportError.message,
    });

    throw transportError;
  }

  logBackendEvent("github", response.ok ? "info" : "warn", "upstream:response", {
    url,
    status: response.status,
    durationMs: elapsedMs(startedAt),
    bodyLength: body.length,
  });

  if (!response.ok) {
    throw new UpstreamApiError(url, response.status, response.statusText, body);
  }

  return body;
}
