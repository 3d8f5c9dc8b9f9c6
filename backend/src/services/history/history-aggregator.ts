// Builds the flat commit history; flow is list repositories (fatal) -> list commits per repository (tolerated) -> merge.
import type { AppConfig } from "../../config/app-config.js";
import type {
  CommitHistoryEntry,
  RawCommit,
  RepositorySummary,
} from "../../domain/history-types.js";
import { describeUpstreamError } from "../../domain/upstream-errors.js";
import { logBackendEvent } from "../../logging/logger.js";
import { listCommits } from "../github/commit-fetcher.js";
import { SHORT_SHA_LENGTH } from "../github/github-payload.decoder.js";
import { listPublicRepositories } from "../github/repository-lister.js";
import { mapWithConcurrency } from "./bounded-pool.js";

export type HistoryConfig = Pick<
  AppConfig,
  "account" | "apiBaseUrl" | "requestTimeoutMs" | "commitFetchConcurrency"
>;

type RepositoryCommits =
  | { ok: true; repository: RepositorySummary; commits: RawCommit[] }
  | { ok: false; repository: RepositorySummary };

export function toCommitShaShort(sha: string): string {
  return sha.slice(0, SHORT_SHA_LENGTH);
}

export function toCommitHistoryEntry(
  repository: RepositorySummary,
  commit: RawCommit,
): CommitHistoryEntry {
  return {
    repositoryName: repository.name,
    commitMessage: commit.message,
    commitShaShort: toCommitShaShort(commit.sha),
    commitTime: commit.authorDate,
    commitUrl: commit.htmlUrl,
  };
}

async function fetchRepositoryCommits(
  repository: RepositorySummary,
  config: HistoryConfig,
): Promise<RepositoryCommits> {
  try {
    const commits = await listCommits(repository.fullName, config);

    logBackendEvent("history", "debug", "history:repository-fetched", {
      repository: repository.name,
      commitCount: commits.length,
    });

    return { ok: true, repository, commits };
  } catch (error) {
    logBackendEvent("history", "warn", "history:repository-skipped", {
      repository: repository.name,
      fullName: repository.fullName,
      error: describeUpstreamError(error),
    });

    return { ok: false, repository };
  }
}

/**
 * Aggregates the default-branch commits of every public repository of
 * `config.account` into one list, grouped by repository in listing order.
 *
 * Rejects only when the repository listing itself fails. A repository whose
 * commits cannot be fetched is logged and contributes no entries.
 */
export async function buildHistory(config: HistoryConfig): Promise<CommitHistoryEntry[]> {
  logBackendEvent("history", "info", "history:start", { account: config.account });

  const repositories = await listPublicRepositories(config.account, config);
  const outcomes = await mapWithConcurrency(
    repositories,
    config.commitFetchConcurrency,
    async (repository) => await fetchRepositoryCommits(repository, config),
  );

  const entries: CommitHistoryEntry[] = [];
  let skipped = 0;

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      skipped += 1;
      continue;
    }

    for (const commit of outcome.commits) {
      entries.push(toCommitHistoryEntry(outcome.repository, commit));
    }
  }

  logBackendEvent("history", "info", "history:done", {
    account: config.account,
    repositories: repositories.length,
    skippedRepositories: skipped,
    entries: entries.length,
  });

  return entries;
}
