import type { ReactNode } from "react";
import { useQuery } from "@tanstack/react-query";
import { CommitHistoryList } from "./components/history/CommitHistoryList";
import { StatusBar } from "./components/layout/StatusBar";
import { getGitHistory } from "./services/api/git-history";
import { toUiError } from "./services/api/error-ui";
import { queryKeys } from "./services/query-keys";
import "./App.css";

function App() {
  const historyQuery = useQuery({
    queryKey: queryKeys.gitHistory,
    queryFn: async ({ signal }) => await getGitHistory({ signal }),
    retry: 1,
  });

  const entries = historyQuery.data ?? [];
  const repositoryCount = new Set(entries.map((entry) => entry.repository_name)).size;
  const historyError = historyQuery.isError
    ? toUiError(historyQuery.error, "Unable to load commit history.")
    : null;

  let content: ReactNode;

  if (historyQuery.isPending) {
    content = <p className="inline-note">Loading commit history...</p>;
  } else if (historyError) {
    content = (
      <div className="inline-error-block">
        <p className="error-note">Could not load commit history.</p>
        <p className="error-detail">{historyError.message}</p>
        {historyError.retryable ? (
          <button className="hud-button hud-button-compact" type="button" onClick={() => void historyQuery.refetch()}>
            retry
          </button>
        ) : null}
      </div>
    );
  } else if (entries.length === 0) {
    content = <p className="inline-note">No commit data available.</p>;
  } else {
    content = <CommitHistoryList entries={entries} />;
  }

  return (
    <div className="app-root">
      <header className="topbar">
        <h1 className="topbar-title">commit timeline</h1>
      </header>
      <main className="app-main">{content}</main>
      <StatusBar
        connected={!historyQuery.isError}
        commitCount={entries.length}
        repositoryCount={repositoryCount}
        message={historyError ? { tone: "error", text: historyError.message } : null}
      />
    </div>
  );
}

export default App;
