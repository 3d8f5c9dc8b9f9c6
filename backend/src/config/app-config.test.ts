import { describe, expect, it } from "vitest";
import { AppConfigError, loadAppConfig } from "./app-config.js";

describe("loadAppConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadAppConfig({})).toEqual({
      account: "develop-suda",
      apiBaseUrl: "https://api.github.com",
      requestTimeoutMs: 10_000,
      commitFetchConcurrency: 1,
      port: 8080,
      host: "0.0.0.0",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadAppConfig({
      TIMELINE_ACCOUNT: " octo-user ",
      TIMELINE_API_BASE_URL: "http://github.internal/api/v3/",
      TIMELINE_REQUEST_TIMEOUT_MS: "2500",
      TIMELINE_COMMIT_CONCURRENCY: "4",
      PORT: "3000",
      HOST: "127.0.0.1",
    });

    expect(config).toEqual({
      account: "octo-user",
      apiBaseUrl: "http://github.internal/api/v3",
      requestTimeoutMs: 2500,
      commitFetchConcurrency: 4,
      port: 3000,
      host: "127.0.0.1",
    });
  });

  it("applies explicit overrides last and freezes the result", () => {
    const config = loadAppConfig({ PORT: "3000" }, { port: 4000, account: "someone" });

    expect(config.port).toBe(4000);
    expect(config.account).toBe("someone");
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects invalid ports", () => {
    expect(() => loadAppConfig({ PORT: "70000" })).toThrow(AppConfigError);
    expect(() => loadAppConfig({ PORT: "abc" })).toThrow(
      "Invalid port: abc. Use an integer between 1-65535.",
    );
  });

  it("rejects non-positive timeouts and oversized pools", () => {
    expect(() => loadAppConfig({ TIMELINE_REQUEST_TIMEOUT_MS: "0" })).toThrow(
      "Invalid request timeout: 0. Use a positive integer.",
    );
    expect(() => loadAppConfig({ TIMELINE_COMMIT_CONCURRENCY: "11" })).toThrow(
      "Invalid commit fetch concurrency: 11. Use an integer between 1-10.",
    );
  });

  it("rejects account names containing a slash", () => {
    expect(() => loadAppConfig({ TIMELINE_ACCOUNT: "owner/repo" })).toThrow(
      'Invalid account: "owner/repo". Use a single GitHub user name.',
    );
  });
});
