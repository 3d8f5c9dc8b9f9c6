import { afterEach, describe, expect, it, vi } from "vitest";
import {
  UpstreamApiError,
  UpstreamTransportError,
} from "../../domain/upstream-errors.js";
import { GITHUB_V3_MEDIA_TYPE, getUpstream } from "./upstream-client.js";

const URL_UNDER_TEST = "https://api.github.test/users/octo-user/repos?type=public&per_page=100";

function rejectOnAbort(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) {
      reject(new Error("missing signal"));
      return;
    }

    signal.addEventListener("abort", () => reject(signal.reason));
  });
}

describe("getUpstream", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the raw body and sends the requested media type", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response('[{"name":"a"}]', { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      getUpstream(URL_UNDER_TEST, { accept: GITHUB_V3_MEDIA_TYPE, timeoutMs: 1000 }),
    ).resolves.toBe('[{"name":"a"}]');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(input).toBe(URL_UNDER_TEST);
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      Accept: "application/vnd.github.v3+json",
      "User-Agent": "commit-timeline",
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("rejects non-2xx responses with status, status text, and body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        new Response('{"message":"Not Found"}', { status: 404, statusText: "Not Found" }),
      ),
    );

    const error = await getUpstream(URL_UNDER_TEST, {
      accept: GITHUB_V3_MEDIA_TYPE,
      timeoutMs: 1000,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamApiError);
    expect(error).toMatchObject({
      status: 404,
      statusText: "Not Found",
      body: '{"message":"Not Found"}',
      url: URL_UNDER_TEST,
      message: 'GitHub API error: 404 Not Found - {"message":"Not Found"}',
    });
  });

  it("classifies network failures as transport errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const error = await getUpstream(URL_UNDER_TEST, {
      accept: GITHUB_V3_MEDIA_TYPE,
      timeoutMs: 1000,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamTransportError);
    expect(error).toMatchObject({
      timedOut: false,
      message: "GitHub API request failed: fetch failed",
    });
  });

  it("aborts slow requests once the timeout elapses", async () => {
    vi.stubGlobal("fetch", vi.fn(rejectOnAbort));

    const error = await getUpstream(URL_UNDER_TEST, {
      accept: GITHUB_V3_MEDIA_TYPE,
      timeoutMs: 20,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamTransportError);
    expect(error).toMatchObject({
      timedOut: true,
      message: "GitHub API request timed out after 20ms",
    });
  });
});
