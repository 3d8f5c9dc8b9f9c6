import type { CommitHistoryItem } from "@commit-timeline/contracts";
import { firstMessageLine, formatCommitTime, groupByRepository } from "./history-format";

type CommitHistoryListProps = {
  entries: CommitHistoryItem[];
};

export function CommitHistoryList({ entries }: CommitHistoryListProps) {
  const groups = groupByRepository(entries);

  return (
    <div className="history-list">
      {groups.map((group, groupIndex) => (
        <section className="history-group" key={`${group.repositoryName}-${groupIndex}`}>
          <h2 className="history-group-title">
            {group.repositoryName}
            <span className="history-group-count">{group.entries.length}</span>
          </h2>
          <ol className="history-entries">
            {group.entries.map((entry, entryIndex) => (
              <li className="history-entry" key={`${entry.commit_sha}-${entryIndex}`}>
                <a className="history-sha" href={entry.commit_url} target="_blank" rel="noreferrer">
                  {entry.commit_sha}
                </a>
                <span className="history-message" title={entry.commit_message}>
                  {firstMessageLine(entry.commit_message)}
                </span>
                <time className="history-time" dateTime={entry.commit_time}>
                  {formatCommitTime(entry.commit_time)}
                </time>
              </li>
            ))}
          </ol>
        </section>
      ))}
    </div>
  );
}
