import type { RawCommit } from "../../domain/history-types.js";
import { logBackendEvent } from "../../logging/logger.js";
import { decodeCommitList } from "./github-payload.decoder.js";
import { type GithubRequestSettings, UPSTREAM_PAGE_SIZE } from "./repository-lister.js";
import { GITHUB_V3_MEDIA_TYPE, getUpstream } from "./upstream-client.js";

export function buildCommitListUrl(apiBaseUrl: string, repositoryFullName: string): string {
  const path = repositoryFullName
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
  const params = new URLSearchParams({ per_page: String(UPSTREAM_PAGE_SIZE) });

  return `${apiBaseUrl}/repos/${path}/commits?${params.toString()}`;
}

/** Lists the default branch's most recent commits, newest first as the upstream returns them. */
export async function listCommits(
  repositoryFullName: string,
  settings: GithubRequestSettings,
): Promise<RawCommit[]> {
  const url = buildCommitListUrl(settings.apiBaseUrl, repositoryFullName);
  const body = await getUpstream(url, {
    accept: GITHUB_V3_MEDIA_TYPE,
    timeoutMs: settings.requestTimeoutMs,
  });
  const commits = decodeCommitList(url, body);

  logBackendEvent("github", "debug", "commits:listed", {
    repository: repositoryFullName,
    count: commits.length,
  });

  return commits;
}
