// Starts the API-only server for development; runtime flow is process boot -> createApp(config) -> listen(port).
import { createApp } from "./app.js";
import { loadAppConfig } from "./config/app-config.js";
import {
  getBackendLoggingConfigSnapshot,
  logBackendEvent,
} from "./logging/logger.js";

const config = loadAppConfig();
const app = createApp(config);

logBackendEvent("app", "info", "server:boot", {
  port: config.port,
  account: config.account,
  nodeEnv: process.env.NODE_ENV ?? "development",
  logging: getBackendLoggingConfigSnapshot(),
});

app.listen(config.port, config.host, () => {
  logBackendEvent("app", "info", "server:listening", {
    url: `http://localhost:${config.port}`,
  });
});
