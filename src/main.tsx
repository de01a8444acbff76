import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import App from "./App";
import { resolveBlockStore } from "./lib/blockStoreClient";
import { rootLogger, setLogLevel } from "./lib/logger";
import { loadEditorSettings, redactSettings } from "./lib/settings";
import type { EditorSettings, RemoteBlock } from "./lib/types";

const DEMO_EDITED_AT = "2024-01-01T00:00:00.000Z";

export const DEMO_BLOCKS: RemoteBlock[] = [
  {
    type: "heading_1",
    id: "demo-welcome",
    lastEditedAt: DEMO_EDITED_AT,
    richText: [{ plainText: "Welcome to the block editor" }]
  },
  {
    type: "paragraph",
    id: "demo-notes",
    lastEditedAt: DEMO_EDITED_AT,
    richText: [{ plainText: "Edit this text, then press Ctrl+S to save it." }]
  },
  {
    type: "to_do",
    id: "demo-todo",
    lastEditedAt: DEMO_EDITED_AT,
    richText: [{ plainText: "Try converting a block with Ctrl+1" }],
    checked: false
  }
];

export interface MountOptions {
  env?: Record<string, string | undefined>;
  overrides?: Partial<EditorSettings>;
  initialBlockId?: string;
  fallbackSeed?: RemoteBlock[];
}

/** Renders the editor into `container`; returns a function that unmounts it. */
export function mountBlockEditor(container: Element, options: MountOptions = {}): () => void {
  const settings = loadEditorSettings(options.env, options.overrides);
  setLogLevel(settings.logLevel);
  rootLogger.info("Starting block editor", redactSettings(settings));

  const store = resolveBlockStore(settings, { fallbackSeed: options.fallbackSeed ?? DEMO_BLOCKS });
  const root = createRoot(container);
  root.render(
    <StrictMode>
      <App store={store} settings={settings} initialBlockId={options.initialBlockId} />
    </StrictMode>
  );
  return () => root.unmount();
}
