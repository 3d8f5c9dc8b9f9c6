import { describe, expect, it } from "vitest";
import {
  UpstreamApiError,
  UpstreamDecodeError,
  UpstreamTransportError,
  describeUpstreamError,
  isUpstreamError,
} from "./upstream-errors.js";

const REPOS_URL = "https://api.github.test/users/u/repos?type=public&per_page=100";

describe("UpstreamApiError", () => {
  it("includes status, status text and body in the message", () => {
    const error = new UpstreamApiError(REPOS_URL, 404, "Not Found", '{"message":"Not Found"}');

    expect(error.message).toBe('GitHub API error: 404 Not Found - {"message":"Not Found"}');
  });

  it("omits an empty status text", () => {
    expect(new UpstreamApiError(REPOS_URL, 502, "", "").message).toBe("GitHub API error: 502 - ");
  });
});

describe("isUpstreamError", () => {
  it("recognizes the three upstream failure classes only", () => {
    expect(isUpstreamError(new UpstreamTransportError(REPOS_URL, "down", false))).toBe(true);
    expect(isUpstreamError(new UpstreamApiError(REPOS_URL, 500, "Server Error", ""))).toBe(true);
    expect(isUpstreamError(new UpstreamDecodeError(REPOS_URL, "expected a JSON array"))).toBe(true);
    expect(isUpstreamError(new Error("other"))).toBe(false);
    expect(isUpstreamError("nope")).toBe(false);
  });
});

describe("describeUpstreamError", () => {
  it("summarizes each failure class for logs", () => {
    expect(describeUpstreamError(new UpstreamTransportError(REPOS_URL, "timed out", true))).toEqual({
      kind: "transport",
      url: REPOS_URL,
      timedOut: true,
      message: "timed out",
    });
    expect(describeUpstreamError(new UpstreamDecodeError(REPOS_URL, "expected a JSON array"))).toEqual({
      kind: "decode",
      url: REPOS_URL,
      message: "Unexpected GitHub API response: expected a JSON array",
    });
    expect(describeUpstreamError("boom")).toEqual({ kind: "unknown", message: "boom" });
  });
});
