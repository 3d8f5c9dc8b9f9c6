import type { RequestHandler } from "express";
import { isBackendLogScopeEnabled, logBackendEvent } from "./logger.js";

export function toApiRequestLogLine(method: string, path: string, status: number, durationMs?: number): string {
  const line = `${method.toUpperCase()} ${path} ${status}`;
  return durationMs === undefined ? line : `${line} ${durationMs.toFixed(1)}ms`;
}

export function createHttpRequestLoggingMiddleware(): RequestHandler {
  return (req, res, next) => {
    if (!req.path.startsWith("/api") || !isBackendLogScopeEnabled("http")) {
      next();
      return;
    }

    const requestPath = req.path;
    const startedAt = process.hrtime.bigint();
    let completed = false;

    const logRequest = () => {
      if (completed) {
        return;
      }

      completed = true;

      const status = res.statusCode;
      const level = status >= 500 ? "error" : status >= 400 ? "warn" : "info";
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;

      logBackendEvent("http", level, toApiRequestLogLine(req.method, requestPath, status, durationMs));
    };

    res.on("finish", logRequest);
    res.on("close", logRequest);

    next();
  };
}
