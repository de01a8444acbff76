import { blockTypeLabel } from "../lib/blockContent";
import { type EditSession, isSessionDirty } from "./editSessionState";

export type SyncStatus = "synced" | "syncing" | "error";

export interface SessionStatus {
  mode: string;
  syncStatus: SyncStatus;
  helpText: string;
}

export const EDITOR_HELP = "Ctrl+S: Save | Ctrl+R: Refresh | Esc: Cancel";
export const CONFIRMATION_HELP = "s: Save and exit | d: Discard | c: Cancel";
const LOADING_HELP = "Esc: Cancel";

function formatSeconds(delayMs: number): string {
  return String(Number((delayMs / 1000).toFixed(1)));
}

export function describeSessionStatus(session: EditSession): SessionStatus {
  const { phase, retryAttempt } = session;
  const { maxRetries } = session.options;
  switch (phase.kind) {
    case "idle":
      return { mode: "Loading", syncStatus: "syncing", helpText: LOADING_HELP };
    case "loading":
      return phase.reason === "refresh"
        ? { mode: "Refreshing...", syncStatus: "syncing", helpText: "" }
        : { mode: "Loading", syncStatus: "syncing", helpText: LOADING_HELP };
    case "editing": {
      let mode = "Editing";
      if (isSessionDirty(session)) {
        mode = "Modified *";
      } else if (phase.indicator === "saved") {
        mode = "Saved!";
      } else if (phase.indicator === "refreshed") {
        mode = "Refreshed";
      }
      return { mode, syncStatus: "synced", helpText: EDITOR_HELP };
    }
    case "saving": {
      let mode = "Saving...";
      if (retryAttempt > 0) {
        mode = `Retrying (${retryAttempt}/${maxRetries})`;
      } else if (session.pendingBlockType) {
        mode = `Converting to ${blockTypeLabel(session.pendingBlockType)}...`;
      }
      return { mode, syncStatus: "syncing", helpText: "" };
    }
    case "retry_waiting":
      return {
        mode: `Retrying in ${formatSeconds(phase.delayMs)}s... (${retryAttempt}/${maxRetries})`,
        syncStatus: "syncing",
        helpText: ""
      };
    case "confirming_exit":
      return { mode: "Unsaved Changes", syncStatus: "synced", helpText: CONFIRMATION_HELP };
    case "showing_error":
      return {
        mode: "Error",
        syncStatus: "error",
        helpText: phase.retryOffered ? "r: Retry | d: Dismiss" : "d: Dismiss"
      };
    case "exited":
      return { mode: "Closed", syncStatus: "synced", helpText: "" };
  }
}
