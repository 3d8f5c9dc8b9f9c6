// Normalizes error output; flow is route exception -> sendRouteError -> { error } JSON.
import type { ApiError } from "@commit-timeline/contracts";
import type { Response } from "express";
import { isUpstreamError } from "../domain/upstream-errors.js";

export function sendApiError(res: Response, status: number, message: string) {
  const body: ApiError = { error: message };
  res.status(status).json(body);
}

export function sendRouteError(res: Response, error: unknown) {
  if (isUpstreamError(error)) {
    sendApiError(res, 500, error.message);
    return;
  }

  sendApiError(res, 500, "Unexpected server error.");
}
