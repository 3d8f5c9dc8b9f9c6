import type { ApiError } from "@commit-timeline/contracts";

export class ApiRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
  }
}

function isApiError(value: unknown): value is ApiError {
  return (
    typeof value === "object" &&
    value !== null &&
    "error" in value &&
    typeof value.error === "string" &&
    value.error.length > 0
  );
}

async function toApiRequestError(response: Response): Promise<ApiRequestError> {
  let body: unknown;

  try {
    body = await response.json();
  } catch {
    body = undefined;
  }

  if (isApiError(body)) {
    return new ApiRequestError(response.status, body.error);
  }

  return new ApiRequestError(response.status, `Request failed: ${response.status}`);
}

export async function fetchJson<T>(input: string, init?: RequestInit): Promise<T> {
  const response = await fetch(input, init);

  if (!response.ok) {
    throw await toApiRequestError(response);
  }

  return (await response.json()) as T;
}
