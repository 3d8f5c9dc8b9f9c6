// Defines shared API contracts; data flows backend responses -> frontend clients using the same types.

export type CommitHistoryItem = {
  repository_name: string;
  commit_message: string;
  commit_sha: string;
  commit_time: string;
  commit_url: string;
};

export type GitHistoryResponse = CommitHistoryItem[];

export type ApiError = {
  error: string;
};

export type HealthResponse = { ok: boolean };
