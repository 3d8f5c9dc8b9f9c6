type StatusBarProps = {
  connected: boolean;
  commitCount: number;
  repositoryCount: number;
  message: {
    tone: "info" | "error";
    text: string;
  } | null;
};

export function StatusBar({
  connected,
  commitCount,
  repositoryCount,
  message,
}: StatusBarProps) {
  return (
    <footer className="statusbar">
      <div className="statusbar-left">
        <span className="status-item">
          <span className={connected ? "status-dot status-dot-ok" : "status-dot status-dot-error"} />
          {connected ? "connected" : "disconnected"}
        </span>
        {message?.text ? (
          <span
            className={message.tone === "error" ? "status-message status-message-error" : "status-message"}
            role="status"
            aria-live="polite"
          >
            {message.text}
          </span>
        ) : null}
      </div>

      <div className="statusbar-right">
        <span className="status-item">repositories:{repositoryCount}</span>
        <span className="status-item">commits:{commitCount}</span>
      </div>
    </footer>
  );
}
