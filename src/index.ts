export { default as App } from "./App";
export { mountBlockEditor, DEMO_BLOCKS, type MountOptions } from "./main";
export { BlockEditScreen } from "./screens/BlockEditScreen";
export { BlockEditor } from "./components/editor/BlockEditor";
export { SaveErrorPanel } from "./components/editor/SaveErrorPanel";
export { SyncStatusBar } from "./components/editor/SyncStatusBar";
export { UnsavedChangesDialog } from "./components/editor/UnsavedChangesDialog";
export * from "./components/editor/keyboardContract";

export * from "./lib/types";
export * from "./lib/blockContent";
export * from "./lib/blockStoreClient";
export * from "./lib/draft";
export * from "./lib/logger";
export * from "./lib/retryPolicy";
export * from "./lib/settings";
export * from "./lib/syncErrors";

export * from "./state/editSessionState";
export * from "./state/editSessionController";
export * from "./state/sessionStatus";
export * from "./state/useBlockEditSession";
