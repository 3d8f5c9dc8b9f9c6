// Serves the aggregated commit feed; flow is GET /api/git-history -> buildHistory -> CommitHistoryItem[] JSON.
import { Router } from "express";
import type { CommitHistoryItem, GitHistoryResponse } from "@commit-timeline/contracts";
import type { CommitHistoryEntry } from "../domain/history-types.js";
import { describeUpstreamError } from "../domain/upstream-errors.js";
import { logBackendEvent } from "../logging/logger.js";
import { buildHistory, type HistoryConfig } from "../services/history/history-aggregator.js";
import { sendRouteError } from "./http.js";

export function toCommitHistoryItem(entry: CommitHistoryEntry): CommitHistoryItem {
  return {
    repository_name: entry.repositoryName,
    commit_message: entry.commitMessage,
    commit_sha: entry.commitShaShort,
    commit_time: entry.commitTime,
    commit_url: entry.commitUrl,
  };
}

export function createGitHistoryRouter(config: HistoryConfig): Router {
  const router = Router();

  router.get("/git-history", async (_req, res) => {
    try {
      const entries = await buildHistory(config);
      const body: GitHistoryResponse = entries.map(toCommitHistoryItem);
      res.json(body);
    } catch (error) {
      logBackendEvent("history", "error", "history:failed", {
        account: config.account,
        error: describeUpstreamError(error),
      });
      sendRouteError(res, error);
    }
  });

  return router;
}
