import { useEffect, useRef, type KeyboardEvent } from "react";
import { describeSyncError } from "../../lib/syncErrors";
import type { ClassifiedFailure } from "../../lib/types";
import type { ErrorAction, ErrorOrigin } from "../../state/editSessionState";
import { resolveErrorKeyAction } from "./keyboardContract";

interface SaveErrorPanelProps {
  error: ClassifiedFailure;
  origin: ErrorOrigin;
  retryOffered: boolean;
  onAcknowledge: (action: ErrorAction) => void;
}

export function SaveErrorPanel({ error, origin, retryOffered, onAcknowledge }: SaveErrorPanelProps): JSX.Element {
  const panelRef = useRef<HTMLDivElement | null>(null);
  const { title, hint } = describeSyncError(error);

  useEffect(() => {
    panelRef.current?.focus();
  }, []);

  const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>): void => {
    const action = resolveErrorKeyAction(
      {
        key: event.key,
        metaKey: event.metaKey,
        ctrlKey: event.ctrlKey,
        shiftKey: event.shiftKey,
        altKey: event.altKey
      },
      retryOffered
    );
    if (action.type === "none") {
      return;
    }
    event.preventDefault();
    onAcknowledge(action.action);
  };

  return (
    <div ref={panelRef} className="save-error-panel" role="alert" tabIndex={-1} onKeyDown={handleKeyDown}>
      <h2>{title}</h2>
      <p className="save-error-hint">{hint}</p>
      <p className="save-error-detail">
        {origin === "load" ? "Loading the block failed: " : "Saving the block failed: "}
        {error.message}
      </p>
      <div className="save-error-actions">
        {retryOffered && (
          <button type="button" className="primary" onClick={() => onAcknowledge("retry")}>
            Retry
          </button>
        )}
        <button type="button" onClick={() => onAcknowledge("dismiss")}>
          Dismiss
        </button>
      </div>
    </div>
  );
}
