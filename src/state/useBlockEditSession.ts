import { useEffect, useMemo, useRef, useState, useSyncExternalStore } from "react";
import type { RemoteContentStore } from "../lib/blockStoreClient";
import type { EditorLogger } from "../lib/logger";
import type { BlockType } from "../lib/types";
import {
  type ConfirmationPrompt,
  EditSessionController,
  type ExitResult,
  type SessionSettings,
  type TimerScheduler
} from "./editSessionController";
import type { ConfirmationChoice, EditSession, ErrorAction, NavigationTarget } from "./editSessionState";
import { describeSessionStatus, type SessionStatus } from "./sessionStatus";

export interface UseBlockEditSessionOptions {
  blockId: string;
  pageId?: string;
  store: RemoteContentStore;
  settings?: SessionSettings;
  scheduler?: TimerScheduler;
  logger?: EditorLogger;
  onExit?: (result: ExitResult) => void;
  onNavigate?: (target: NavigationTarget) => void;
  /** Read once when the controller is created. */
  prompt?: ConfirmationPrompt;
}

export interface BlockEditActions {
  edit: (text: string) => void;
  save: () => void;
  refresh: () => void;
  transform: (blockType: BlockType) => void;
  requestExit: () => void;
  respond: (choice: ConfirmationChoice) => void;
  acknowledgeError: (action: ErrorAction) => void;
  navigate: (target: NavigationTarget) => void;
}

export interface BlockEditSessionHandle {
  session: EditSession;
  status: SessionStatus;
  actions: BlockEditActions;
  controller: EditSessionController;
}

export function useBlockEditSession(options: UseBlockEditSessionOptions): BlockEditSessionHandle {
  const { blockId, pageId } = options;
  const latest = useRef(options);
  latest.current = options;

  const createController = (): EditSessionController => {
    const initial = latest.current;
    return new EditSessionController({
      store: initial.store,
      settings: initial.settings,
      scheduler: initial.scheduler,
      logger: initial.logger,
      prompt: initial.prompt,
      onExit: (result) => latest.current.onExit?.(result),
      onNavigate: (target) => latest.current.onNavigate?.(target)
    });
  };

  const [controller, setController] = useState(createController);

  useEffect(() => {
    // Strict mode runs effect cleanups once on mount; replace the disposed controller.
    if (controller.isDisposed) {
      setController(createController());
      return;
    }
    return () => controller.dispose();
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [controller]);

  const session = useSyncExternalStore(controller.subscribe, controller.getSnapshot);
  const phaseKind = session.phase.kind;
  const loadedBlock = phaseKind !== "idle" && session.blockId === blockId && session.pageId === pageId;

  useEffect(() => {
    // A save in flight refuses the load; it runs again once the phase moves on.
    if (loadedBlock || phaseKind === "saving") {
      return;
    }
    controller.load(blockId, pageId);
  }, [controller, blockId, pageId, loadedBlock, phaseKind]);

  const status = useMemo(() => describeSessionStatus(session), [session]);
  const actions = useMemo<BlockEditActions>(
    () => ({
      edit: (text) => controller.edit(text),
      save: () => controller.save(),
      refresh: () => controller.refresh(),
      transform: (blockType) => controller.transform(blockType),
      requestExit: () => controller.requestExit(),
      respond: (choice) => controller.respond(choice),
      acknowledgeError: (action) => controller.acknowledgeError(action),
      navigate: (target) => controller.navigate(target)
    }),
    [controller]
  );

  return { session, status, actions, controller };
}
