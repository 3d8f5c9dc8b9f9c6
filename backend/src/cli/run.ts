import { access } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import { createApp } from "../app.js";
import { type AppConfig, AppConfigError, loadAppConfig } from "../config/app-config.js";
import { getBackendLoggingConfigSnapshot, logBackendEvent } from "../logging/logger.js";
import { CliArgsError, parseCliArgs } from "./args.js";

function resolvePackageRoot(): string {
  return path.resolve(fileURLToPath(new URL("../../..", import.meta.url)));
}

function toLaunchUrl(host: string, port: number): string {
  const launchHost = host === "0.0.0.0" ? "localhost" : host;
  return `http://${launchHost}:${port}`;
}

async function assertFrontendBuildReady(frontendDistDir: string, indexHtmlPath: string): Promise<void> {
  try {
    await access(frontendDistDir);
    await access(indexHtmlPath);
  } catch {
    throw new Error(
      "Frontend build artifacts are missing. Run `npm run build:frontend` before starting commit-timeline.",
    );
  }
}

export function mountFrontend(app: express.Express, frontendDistDir: string): void {
  const indexHtmlPath = path.resolve(frontendDistDir, "index.html");

  app.use("/static", express.static(path.resolve(frontendDistDir, "static"), { index: false }));
  app.get("/", (_req, res) => {
    res.sendFile(indexHtmlPath);
  });
}

async function listen(app: express.Express, config: AppConfig): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, config.host);
    server.once("error", reject);
    server.once("listening", resolve);
  });
}

export async function runCli(argv: string[]): Promise<void> {
  try {
    const parsed = parseCliArgs(argv);

    if (parsed.kind === "help") {
      console.log(parsed.message);
      return;
    }

    const config = loadAppConfig(process.env, parsed.overrides);
    const frontendDistDir = path.resolve(resolvePackageRoot(), "frontend", "dist");
    const launchUrl = toLaunchUrl(config.host, config.port);

    await assertFrontendBuildReady(frontendDistDir, path.resolve(frontendDistDir, "index.html"));

    const app = createApp(config);
    mountFrontend(app, frontendDistDir);

    logBackendEvent("app", "info", "server:boot", {
      account: config.account,
      port: config.port,
      host: config.host,
      commitFetchConcurrency: config.commitFetchConcurrency,
      logging: getBackendLoggingConfigSnapshot(),
    });

    await listen(app, config);

    logBackendEvent("app", "info", "server:listening", { url: launchUrl });
  } catch (error) {
    if (error instanceof CliArgsError || error instanceof AppConfigError) {
      console.error(`[commit-timeline] ${error.message}`);
      console.error("Run with --help for usage.");
      process.exitCode = 1;
      return;
    }

    const message = error instanceof Error ? error.message : "Unable to start commit-timeline.";
    logBackendEvent("app", "error", "server:start-failed", { message });
    console.error(`[commit-timeline] ${message}`);
    process.exitCode = 1;
  }
}
