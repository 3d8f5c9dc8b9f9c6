import type { CommitHistoryItem } from "@commit-timeline/contracts";

export type RepositoryGroup = {
  repositoryName: string;
  entries: CommitHistoryItem[];
};

// Consecutive entries of the same repository form one group; the feed arrives grouped already.
export function groupByRepository(entries: CommitHistoryItem[]): RepositoryGroup[] {
  const groups: RepositoryGroup[] = [];

  for (const entry of entries) {
    const current = groups[groups.length - 1];

    if (current && current.repositoryName === entry.repository_name) {
      current.entries.push(entry);
      continue;
    }

    groups.push({ repositoryName: entry.repository_name, entries: [entry] });
  }

  return groups;
}

export function firstMessageLine(message: string): string {
  return message.split(/\r?\n/, 1)[0]?.trim() ?? "";
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatCommitTime(isoTimestamp: string): string {
  const date = new Date(isoTimestamp);

  if (Number.isNaN(date.getTime())) {
    return isoTimestamp;
  }

  const day = `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
  return `${day} ${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())} UTC`;
}
