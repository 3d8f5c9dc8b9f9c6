import type { RepositorySummary } from "../../domain/history-types.js";
import { logBackendEvent } from "../../logging/logger.js";
import { decodeRepositoryList } from "./github-payload.decoder.js";
import { GITHUB_V3_MEDIA_TYPE, getUpstream } from "./upstream-client.js";

export const UPSTREAM_PAGE_SIZE = 100;

export type GithubRequestSettings = {
  apiBaseUrl: string;
  requestTimeoutMs: number;
};

export function buildRepositoryListUrl(apiBaseUrl: string, account: string): string {
  const params = new URLSearchParams({ type: "public", per_page: String(UPSTREAM_PAGE_SIZE) });
  return `${apiBaseUrl}/users/${encodeURIComponent(account)}/repos?${params.toString()}`;
}

// Single page only; accounts with more than 100 public repositories are truncated.
export async function listPublicRepositories(
  account: string,
  settings: GithubRequestSettings,
): Promise<RepositorySummary[]> {
  const url = buildRepositoryListUrl(settings.apiBaseUrl, account);
  const body = await getUpstream(url, {
    accept: GITHUB_V3_MEDIA_TYPE,
    timeoutMs: settings.requestTimeoutMs,
  });
  const repositories = decodeRepositoryList(url, body);

  logBackendEvent("github", "info", "repositories:listed", {
    account,
    count: repositories.length,
  });

  return repositories;
}
