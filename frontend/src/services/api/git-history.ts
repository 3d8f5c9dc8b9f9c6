import type { GitHistoryResponse } from "@commit-timeline/contracts";
import { fetchJson } from "./client";

type RequestOptions = {
  signal?: AbortSignal;
};

export async function getGitHistory(options?: RequestOptions): Promise<GitHistoryResponse> {
  return await fetchJson<GitHistoryResponse>("/api/git-history", { signal: options?.signal });
}
