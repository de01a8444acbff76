import { useEffect, useRef, type KeyboardEvent } from "react";
import type { ConfirmationChoice } from "../../state/editSessionState";
import { resolveConfirmationKeyAction } from "./keyboardContract";

interface UnsavedChangesDialogProps {
  choices: readonly ConfirmationChoice[];
  onRespond: (choice: ConfirmationChoice) => void;
}

const CHOICE_LABELS: Record<ConfirmationChoice, string> = {
  save: "Save and exit",
  discard: "Discard",
  cancel: "Cancel"
};

export function UnsavedChangesDialog({ choices, onRespond }: UnsavedChangesDialogProps): JSX.Element {
  const dialogRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    dialogRef.current?.focus();
  }, []);

  const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>): void => {
    const action = resolveConfirmationKeyAction({
      key: event.key,
      metaKey: event.metaKey,
      ctrlKey: event.ctrlKey,
      shiftKey: event.shiftKey,
      altKey: event.altKey
    });
    if (action.type === "none" || !choices.includes(action.choice)) {
      return;
    }
    event.preventDefault();
    onRespond(action.choice);
  };

  return (
    <div className="modal-backdrop">
      <div
        ref={dialogRef}
        className="modal unsaved-changes-dialog"
        role="dialog"
        aria-modal="true"
        aria-labelledby="unsaved-changes-title"
        tabIndex={-1}
        onKeyDown={handleKeyDown}
      >
        <h2 id="unsaved-changes-title">Unsaved Changes</h2>
        <p>You have unsaved changes. What would you like to do?</p>
        <div className="modal-actions">
          {choices.map((choice) => (
            <button
              key={choice}
              type="button"
              className={choice === "save" ? "primary" : undefined}
              onClick={() => onRespond(choice)}
            >
              {CHOICE_LABELS[choice]}
            </button>
          ))}
        </div>
        <p className="modal-hint">s: Save and exit | d: Discard | c: Cancel</p>
      </div>
    </div>
  );
}
