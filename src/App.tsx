import clsx from "clsx";
import { useState, type FormEvent } from "react";
import type { RemoteContentStore } from "./lib/blockStoreClient";
import type { EditorSettings } from "./lib/types";
import { BlockEditScreen } from "./screens/BlockEditScreen";
import type { ExitResult } from "./state/editSessionController";
import type { NavigationTarget } from "./state/editSessionState";

interface AppProps {
  store: RemoteContentStore;
  settings: EditorSettings;
  initialBlockId?: string;
}

interface OpenBlock {
  blockId: string;
  /** Bumped to remount the editor for a fresh session on the same block. */
  sessionKey: number;
}

export default function App({ store, settings, initialBlockId }: AppProps): JSX.Element {
  const [openBlock, setOpenBlock] = useState<OpenBlock | undefined>(
    initialBlockId ? { blockId: initialBlockId, sessionKey: 0 } : undefined
  );
  const [blockIdInput, setBlockIdInput] = useState(initialBlockId ?? "");
  const [lastExit, setLastExit] = useState<ExitResult>();

  function openEditor(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    const blockId = blockIdInput.trim();
    if (!blockId) {
      return;
    }
    setLastExit(undefined);
    setOpenBlock((current) => ({ blockId, sessionKey: (current?.sessionKey ?? 0) + 1 }));
  }

  function handleNavigate(target: NavigationTarget): void {
    if (target === "back") {
      setOpenBlock(undefined);
      return;
    }
    setLastExit(undefined);
    setOpenBlock((current) => current && { ...current, sessionKey: current.sessionKey + 1 });
  }

  return (
    <div className="app-shell">
      <header className="topbar">
        <span className="topbar-title">Block editor</span>
        <div className="topbar-spacer" />
        <span className={clsx("topbar-mode", settings.apiToken ? "remote" : "offline")}>
          {settings.apiToken ? "Connected workspace" : "Offline demo"}
        </span>
      </header>

      <main className="content-panel">
        {openBlock ? (
          <BlockEditScreen
            key={`${openBlock.blockId}:${openBlock.sessionKey}`}
            blockId={openBlock.blockId}
            store={store}
            settings={settings}
            onExit={setLastExit}
            onNavigate={handleNavigate}
          />
        ) : (
          <form className="block-picker" onSubmit={openEditor}>
            {lastExit && (
              <div className="banner info">{lastExit.saved ? "Block saved." : "No changes were saved."}</div>
            )}
            <label htmlFor="block-id">Block ID</label>
            <input
              id="block-id"
              value={blockIdInput}
              onChange={(event) => setBlockIdInput(event.target.value)}
              placeholder="Paste a block ID"
            />
            <button type="submit" className="primary" disabled={!blockIdInput.trim()}>
              Open
            </button>
          </form>
        )}
      </main>
    </div>
  );
}
