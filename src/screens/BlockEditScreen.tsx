import type { RemoteContentStore } from "../lib/blockStoreClient";
import { blockTypeLabel } from "../lib/blockContent";
import { EDITABLE_BLOCK_TYPES, type BlockType } from "../lib/types";
import { BlockEditor } from "../components/editor/BlockEditor";
import { transformShortcuts, type EditorKeyAction } from "../components/editor/keyboardContract";
import { SaveErrorPanel } from "../components/editor/SaveErrorPanel";
import { SyncStatusBar } from "../components/editor/SyncStatusBar";
import { UnsavedChangesDialog } from "../components/editor/UnsavedChangesDialog";
import type { ExitResult, SessionSettings, TimerScheduler } from "../state/editSessionController";
import { CONFIRMATION_CHOICES, isSessionDirty, type NavigationTarget } from "../state/editSessionState";
import { useBlockEditSession } from "../state/useBlockEditSession";

interface BlockEditScreenProps {
  blockId: string;
  pageId?: string;
  store: RemoteContentStore;
  settings?: SessionSettings;
  scheduler?: TimerScheduler;
  onExit?: (result: ExitResult) => void;
  onNavigate?: (target: NavigationTarget) => void;
}

const SHORTCUT_BY_TYPE = new Map<BlockType, string>(transformShortcuts().map(([key, type]) => [type, `Ctrl+${key.toUpperCase()}`]));

function optionLabel(type: BlockType): string {
  const shortcut = SHORTCUT_BY_TYPE.get(type);
  return shortcut ? `${blockTypeLabel(type)} (${shortcut})` : blockTypeLabel(type);
}

export function BlockEditScreen({
  blockId,
  pageId,
  store,
  settings,
  scheduler,
  onExit,
  onNavigate
}: BlockEditScreenProps): JSX.Element {
  const { session, status, actions } = useBlockEditSession({
    blockId,
    pageId,
    store,
    settings,
    scheduler,
    onExit,
    onNavigate
  });
  const { phase } = session;
  const editing = phase.kind === "editing";
  const dirty = isSessionDirty(session);
  const displayedType = session.pendingBlockType ?? session.blockType;

  function handleKeyAction(action: Exclude<EditorKeyAction, { type: "none" }>): void {
    switch (action.type) {
      case "save":
        actions.save();
        return;
      case "refresh":
        actions.refresh();
        return;
      case "exit":
        actions.requestExit();
        return;
      case "transform":
        actions.transform(action.blockType);
        return;
    }
  }

  if (phase.kind === "exited") {
    return (
      <section className="screen block-edit-screen">
        <p className="banner info">{phase.saved ? "Saved and closed." : "Closed without saving."}</p>
        <div className="block-edit-actions">
          <button type="button" onClick={() => actions.navigate("enter_edit")}>
            Edit again
          </button>
          <button type="button" onClick={() => actions.navigate("back")}>
            Back to blocks
          </button>
        </div>
      </section>
    );
  }

  return (
    <section className="screen block-edit-screen">
      <header className="block-edit-header">
        <h1>{blockTypeLabel(displayedType)}</h1>
        <label>
          Block type
          <select
            value={displayedType}
            disabled={!editing}
            onChange={(event) => {
              const next = EDITABLE_BLOCK_TYPES.find((type) => type === event.target.value);
              if (next && next !== displayedType) {
                actions.transform(next);
              }
            }}
          >
            {EDITABLE_BLOCK_TYPES.map((type) => (
              <option key={type} value={type}>
                {optionLabel(type)}
              </option>
            ))}
          </select>
        </label>
      </header>

      {phase.kind === "loading" && !session.loaded && <div className="banner info">Loading block...</div>}

      {(session.loaded || phase.kind !== "loading") && (
        <BlockEditor
          value={session.draft.text}
          blockType={displayedType}
          dirty={dirty}
          readOnly={!editing}
          onChange={actions.edit}
          onKeyAction={handleKeyAction}
        />
      )}

      <div className="block-edit-actions">
        <button type="button" className="primary" disabled={!editing} onClick={actions.save}>
          Save
        </button>
        <button
          type="button"
          disabled={phase.kind !== "editing" && phase.kind !== "showing_error"}
          onClick={actions.refresh}
        >
          Refresh
        </button>
        <button type="button" onClick={actions.requestExit}>
          Close
        </button>
      </div>

      {phase.kind === "showing_error" && (
        <SaveErrorPanel
          error={phase.error}
          origin={phase.origin}
          retryOffered={phase.retryOffered}
          onAcknowledge={actions.acknowledgeError}
        />
      )}

      {phase.kind === "confirming_exit" && (
        <UnsavedChangesDialog choices={CONFIRMATION_CHOICES} onRespond={actions.respond} />
      )}

      <SyncStatusBar status={status} lastEditedAt={session.lastEditedAt} />
    </section>
  );
}
