// Wires API route modules into the Express app; request flow is client -> /api/* route handlers.
import express from "express";
import cors from "cors";
import { type AppConfig, loadAppConfig } from "./config/app-config.js";
import { createGitHistoryRouter } from "./routes/git-history.route.js";
import healthRoute from "./routes/health.route.js";
import { createHttpRequestLoggingMiddleware } from "./logging/http-logging.middleware.js";

export function createApp(config: AppConfig = loadAppConfig()) {
  const app = express();

  app.use(cors());
  app.use(createHttpRequestLoggingMiddleware());

  app.use("/api", healthRoute);
  app.use("/api", createGitHistoryRouter(config));

  return app;
}
