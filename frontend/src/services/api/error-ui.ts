import { ApiRequestError } from "./client";

type UiError = {
  message: string;
  retryable: boolean;
};

export function toUiError(error: unknown, fallback = "Unexpected request failure"): UiError {
  if (error instanceof ApiRequestError) {
    return {
      message: error.message,
      retryable: error.status >= 500 || error.status === 429,
    };
  }

  if (error instanceof Error && error.message) {
    return {
      message: error.message,
      retryable: true,
    };
  }

  return {
    message: fallback,
    retryable: true,
  };
}
