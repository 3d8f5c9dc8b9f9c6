export type RepositorySummary = Readonly<{
  name: string;
  fullName: string;
  description: string;
  htmlUrl: string;
}>;

export type RawCommit = Readonly<{
  sha: string;
  message: string;
  authorName: string;
  authorEmail: string;
  authorDate: string;
  htmlUrl: string;
}>;

export type CommitHistoryEntry = Readonly<{
  repositoryName: string;
  commitMessage: string;
  commitShaShort: string;
  commitTime: string;
  commitUrl: string;
}>;
