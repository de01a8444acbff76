import clsx from "clsx";
import type { SessionStatus } from "../../state/sessionStatus";

interface SyncStatusBarProps {
  status: SessionStatus;
  lastEditedAt?: string;
}

const SYNC_LABELS: Record<SessionStatus["syncStatus"], string> = {
  synced: "Synced",
  syncing: "Syncing",
  error: "Sync error"
};

export function SyncStatusBar({ status, lastEditedAt }: SyncStatusBarProps): JSX.Element {
  return (
    <footer className="sync-status-bar">
      <span className="sync-status-mode" role="status" aria-live="polite" aria-atomic="true">
        {status.mode}
      </span>
      <span className={clsx("sync-status-indicator", status.syncStatus)} data-sync-status={status.syncStatus}>
        {SYNC_LABELS[status.syncStatus]}
      </span>
      {lastEditedAt && (
        <time className="sync-status-edited" dateTime={lastEditedAt}>
          Last edited {lastEditedAt}
        </time>
      )}
      {status.helpText && <span className="sync-status-help">{status.helpText}</span>}
    </footer>
  );
}
