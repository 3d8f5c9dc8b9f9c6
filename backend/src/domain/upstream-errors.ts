export class UpstreamTransportError extends Error {
  readonly url: string;
  readonly timedOut: boolean;

  constructor(url: string, message: string, timedOut: boolean) {
    super(message);
    this.name = "UpstreamTransportError";
    this.url = url;
    this.timedOut = timedOut;
  }
}

export class UpstreamApiError extends Error {
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly body: string;

  constructor(url: string, status: number, statusText: string, body: string) {
    const statusLine = statusText ? `${status} ${statusText}` : String(status);
    super(`GitHub API error: ${statusLine} - ${body}`);
    this.name = "UpstreamApiError";
    this.url = url;
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }
}

export class UpstreamDecodeError extends Error {
  readonly url: string;
  readonly detail: string;

  constructor(url: string, detail: string) {
    super(`Unexpected GitHub API response: ${detail}`);
    this.name = "UpstreamDecodeError";
    this.url = url;
    this.detail = detail;
  }
}

export type UpstreamError = UpstreamTransportError | UpstreamApiError | UpstreamDecodeError;

export function isUpstreamTransportError(error: unknown): error is UpstreamTransportError {
  return error instanceof UpstreamTransportError;
}

export function isUpstreamApiError(error: unknown): error is UpstreamApiError {
  return error instanceof UpstreamApiError;
}

export function isUpstreamDecodeError(error: unknown): error is UpstreamDecodeError {
  return error instanceof UpstreamDecodeError;
}

export function isUpstreamError(error: unknown): error is UpstreamError {
  return isUpstreamTransportError(error) || isUpstreamApiError(error) || isUpstreamDecodeError(error);
}

export function describeUpstreamError(error: unknown): Record<string, string | number | boolean> {
  if (isUpstreamApiError(error)) {
    return { kind: "api", url: error.url, status: error.status, message: error.message };
  }

  if (isUpstreamTransportError(error)) {
    return { kind: "transport", url: error.url, timedOut: error.timedOut, message: error.message };
  }

  if (isUpstreamDecodeError(error)) {
    return { kind: "decode", url: error.url, message: error.message };
  }

  return { kind: "unknown", message: error instanceof Error ? error.message : String(error) };
}
