import { buildBlockUpdatePayload, editableBlockType, extractBlockText } from "../lib/blockContent";
import { createDraft, type Draft, isDraftDirty, markDraftClean, withDraftText } from "../lib/draft";
import { type BackoffPolicy, decideRetry, DEFAULT_BACKOFF } from "../lib/retryPolicy";
import type { BlockType, BlockUpdatePayload, ClassifiedFailure, RemoteBlock, SaveReceipt } from "../lib/types";

type LoadReason = "initial" | "refresh";
type SessionIndicator = "saved" | "refreshed";
type ErrorOrigin = "load" | "save";
type ConfirmationChoice = "save" | "discard" | "cancel";
type ErrorAction = "retry" | "dismiss";
type NavigationTarget = "back" | "enter_edit";

const CONFIRMATION_CHOICES: readonly ConfirmationChoice[] = ["save", "discard", "cancel"];

interface SavePayload {
  text: string;
  blockType: BlockType;
}

type EditPhase =
  | { kind: "idle" }
  | { kind: "loading"; reason: LoadReason }
  | { kind: "editing"; indicator?: SessionIndicator }
  | { kind: "saving"; payload: SavePayload }
  | { kind: "retry_waiting"; payload: SavePayload; delayMs: number; error: ClassifiedFailure }
  | { kind: "confirming_exit" }
  | { kind: "showing_error"; error: ClassifiedFailure; retryOffered: boolean; origin: ErrorOrigin; payload?: SavePayload }
  | { kind: "exited"; saved: boolean };

type EditPhaseKind = EditPhase["kind"];

interface EditSessionOptions {
  maxRetries: number;
  backoff: BackoffPolicy;
  indicatorMs: number;
}

interface EditSession {
  blockId: string;
  pageId?: string;
  blockType: BlockType;
  pendingBlockType?: BlockType;
  codeLanguage?: string;
  /** False until the first fetch for the current block succeeds. */
  loaded: boolean;
  draft: Draft;
  lastEditedAt?: string;
  retryAttempt: number;
  quitAfterSave: boolean;
  generation: number;
  indicatorSeq: number;
  options: EditSessionOptions;
  phase: EditPhase;
}

type FetchOutcome = { ok: true; block: RemoteBlock } | { ok: false; failure: ClassifiedFailure };
type SaveOutcome = { ok: true; receipt: SaveReceipt } | { ok: false; failure: ClassifiedFailure };

type EditSessionMessage =
  | { type: "load_block"; blockId: string; pageId?: string }
  | { type: "fetch_result"; generation: number; outcome: FetchOutcome }
  | { type: "user_edit"; text: string }
  | { type: "request_save" }
  | { type: "save_result"; generation: number; outcome: SaveOutcome }
  | { type: "retry_timer_fired"; generation: number }
  | { type: "request_refresh" }
  | { type: "request_transform"; blockType: BlockType }
  | { type: "request_exit" }
  | { type: "confirmation_response"; choice: ConfirmationChoice }
  | { type: "error_acknowledged"; action: ErrorAction }
  | { type: "navigate"; target: NavigationTarget }
  | { type: "indicator_expired"; seq: number };

type EditSessionCommand =
  | { type: "fetch_block"; blockId: string; generation: number }
  | { type: "save_block"; blockId: string; update: BlockUpdatePayload; generation: number }
  | { type: "schedule_retry"; delayMs: number; attempt: number; generation: number; error: ClassifiedFailure }
  | { type: "schedule_indicator_clear"; seq: number; delayMs: number }
  | { type: "present_confirmation"; choices: readonly ConfirmationChoice[] }
  | { type: "show_error"; error: ClassifiedFailure; retryOffered: boolean }
  | { type: "exit"; saved: boolean }
  | { type: "navigate"; target: NavigationTarget };

interface EditSessionTransition {
  session: EditSession;
  commands: EditSessionCommand[];
}

function initialEditSession(options: Partial<EditSessionOptions> = {}): EditSession {
  return {
    blockId: "",
    blockType: "paragraph",
    loaded: false,
    draft: createDraft(""),
    retryAttempt: 0,
    quitAfterSave: false,
    generation: 0,
    indicatorSeq: 0,
    options: {
      maxRetries: options.maxRetries ?? 3,
      backoff: options.backoff ?? DEFAULT_BACKOFF,
      indicatorMs: options.indicatorMs ?? 1500
    },
    phase: { kind: "idle" }
  };
}

function isSessionDirty(session: EditSession): boolean {
  return isDraftDirty(session.draft);
}

function unchanged(session: EditSession): EditSessionTransition {
  return { session, commands: [] };
}

function saveCommand(session: EditSession, payload: SavePayload): EditSessionCommand {
  return {
    type: "save_block",
    blockId: session.blockId,
    update: buildBlockUpdatePayload(payload.blockType, payload.text, session.codeLanguage),
    generation: session.generation
  };
}

function beginSave(session: EditSession, quitAfterSave: boolean, payload?: SavePayload): EditSessionTransition {
  const nextPayload = payload ?? {
    text: session.draft.text,
    blockType: session.pendingBlockType ?? session.blockType
  };
  const next: EditSession = {
    ...session,
    retryAttempt: 0,
    quitAfterSave,
    phase: { kind: "saving", payload: nextPayload }
  };
  return { session: next, commands: [saveCommand(next, nextPayload)] };
}

function beginLoad(session: EditSession, reason: LoadReason): EditSessionTransition {
  const next: EditSession = {
    ...session,
    pendingBlockType: undefined,
    retryAttempt: 0,
    quitAfterSave: false,
    generation: session.generation + 1,
    phase: { kind: "loading", reason }
  };
  return {
    session: next,
    commands: [{ type: "fetch_block", blockId: next.blockId, generation: next.generation }]
  };
}

function exitSession(session: EditSession, saved: boolean): EditSessionTransition {
  return {
    session: {
      ...session,
      pendingBlockType: undefined,
      quitAfterSave: false,
      phase: { kind: "exited", saved }
    },
    commands: [{ type: "exit", saved }]
  };
}

function withIndicator(session: EditSession, indicator: SessionIndicator): EditSessionTransition {
  const seq = session.indicatorSeq + 1;
  return {
    session: { ...session, indicatorSeq: seq, phase: { kind: "editing", indicator } },
    commands: [{ type: "schedule_indicator_clear", seq, delayMs: session.options.indicatorMs }]
  };
}

function showError(
  session: EditSession,
  error: ClassifiedFailure,
  origin: ErrorOrigin,
  payload?: SavePayload
): EditSessionTransition {
  const retryOffered = error.classification === "transient";
  return {
    session: { ...session, phase: { kind: "showing_error", error, retryOffered, origin, payload } },
    commands: [{ type: "show_error", error, retryOffered }]
  };
}

function applyFetchResult(session: EditSession, outcome: FetchOutcome, reason: LoadReason): EditSessionTransition {
  if (!outcome.ok) {
    return showError(session, outcome.failure, "load");
  }
  const { block } = outcome;
  const loaded: EditSession = {
    ...session,
    blockType: editableBlockType(block) ?? "paragraph",
    codeLanguage: block.type === "code" ? block.language : undefined,
    loaded: true,
    draft: createDraft(extractBlockText(block)),
    lastEditedAt: block.lastEditedAt
  };
  if (reason === "refresh") {
    return withIndicator(loaded, "refreshed");
  }
  return unchanged({ ...loaded, phase: { kind: "editing" } });
}

function applySaveResult(session: EditSession, payload: SavePayload, outcome: SaveOutcome): EditSessionTransition {
  if (outcome.ok) {
    const saved: EditSession = {
      ...session,
      draft: markDraftClean(session.draft, payload.text),
      blockType: payload.blockType,
      pendingBlockType: undefined,
      lastEditedAt: outcome.receipt.lastEditedAt,
      retryAttempt: 0
    };
    if (session.quitAfterSave) {
      return exitSession(saved, true);
    }
    return withIndicator(saved, "saved");
  }

  const { failure } = outcome;
  const decision = decideRetry(
    session.retryAttempt,
    session.options.maxRetries,
    failure.classification,
    session.options.backoff
  );
  if (!decision.shouldRetry) {
    return showError(session, failure, "save", payload);
  }
  const attempt = session.retryAttempt + 1;
  return {
    session: {
      ...session,
      retryAttempt: attempt,
      phase: { kind: "retry_waiting", payload, delayMs: decision.delayMs, error: failure }
    },
    commands: [
      { type: "schedule_retry", delayMs: decision.delayMs, attempt, generation: session.generation, error: failure }
    ]
  };
}

function reducer(session: EditSession, message: EditSessionMessage): EditSessionTransition {
  const { phase } = session;
  switch (message.type) {
    case "load_block": {
      if (phase.kind === "saving") {
        return unchanged(session);
      }
      const reset: EditSession = {
        ...session,
        blockId: message.blockId,
        pageId: message.pageId,
        blockType: "paragraph",
        codeLanguage: undefined,
        loaded: false,
        draft: createDraft(""),
        lastEditedAt: undefined
      };
      return beginLoad(reset, "initial");
    }
    case "fetch_result":
      if (phase.kind !== "loading" || message.generation !== session.generation) {
        return unchanged(session);
      }
      return applyFetchResult(session, message.outcome, phase.reason);
    case "user_edit": {
      if (phase.kind !== "editing") {
        return unchanged(session);
      }
      const draft = withDraftText(session.draft, message.text);
      if (draft === session.draft) {
        return unchanged(session);
      }
      return unchanged({ ...session, draft, phase: { kind: "editing" } });
    }
    case "request_save":
      if (phase.kind !== "editing") {
        return unchanged(session);
      }
      return beginSave(session, false);
    case "save_result":
      if (phase.kind !== "saving" || message.generation !== session.generation) {
        return unchanged(session);
      }
      return applySaveResult(session, phase.payload, message.outcome);
    case "retry_timer_fired": {
      if (phase.kind !== "retry_waiting" || message.generation !== session.generation) {
        return unchanged(session);
      }
      const next: EditSession = { ...session, phase: { kind: "saving", payload: phase.payload } };
      return { session: next, commands: [saveCommand(next, phase.payload)] };
    }
    case "request_refresh":
      if (phase.kind !== "editing" && phase.kind !== "showing_error") {
        return unchanged(session);
      }
      return beginLoad(session, "refresh");
    case "request_transform":
      if (phase.kind !== "editing") {
        return unchanged(session);
      }
      return beginSave({ ...session, pendingBlockType: message.blockType }, false);
    case "request_exit":
      if (phase.kind === "idle" || phase.kind === "loading") {
        return exitSession(session, false);
      }
      if (phase.kind !== "editing") {
        return unchanged(session);
      }
      if (!isSessionDirty(session)) {
        return exitSession(session, false);
      }
      return {
        session: { ...session, phase: { kind: "confirming_exit" } },
        commands: [{ type: "present_confirmation", choices: CONFIRMATION_CHOICES }]
      };
    case "confirmation_response":
      if (phase.kind !== "confirming_exit") {
        return unchanged(session);
      }
      if (message.choice === "save") {
        return beginSave(session, true);
      }
      if (message.choice === "discard") {
        return exitSession(session, false);
      }
      return unchanged({ ...session, phase: { kind: "editing" } });
    case "error_acknowledged":
      if (phase.kind !== "showing_error") {
        return unchanged(session);
      }
      if (message.action === "dismiss") {
        if (!session.loaded) {
          return exitSession(session, false);
        }
        return unchanged({ ...session, quitAfterSave: false, phase: { kind: "editing" } });
      }
      if (!phase.retryOffered) {
        return unchanged(session);
      }
      if (phase.origin === "load") {
        return beginLoad(session, session.loaded ? "refresh" : "initial");
      }
      return beginSave(session, session.quitAfterSave, phase.payload);
    case "navigate":
      return { session, commands: [{ type: "navigate", target: message.target }] };
    case "indicator_expired":
      if (phase.kind !== "editing" || !phase.indicator || message.seq !== session.indicatorSeq) {
        return unchanged(session);
      }
      return unchanged({ ...session, phase: { kind: "editing" } });
    default:
      return unchanged(session);
  }
}

export { CONFIRMATION_CHOICES, initialEditSession, isSessionDirty, reducer as editSessionReducer };
export type {
  ConfirmationChoice,
  EditPhase,
  EditPhaseKind,
  EditSession,
  EditSessionCommand,
  EditSessionMessage,
  EditSessionOptions,
  EditSessionTransition,
  ErrorAction,
  ErrorOrigin,
  FetchOutcome,
  LoadReason,
  NavigationTarget,
  SaveOutcome,
  SavePayload,
  SessionIndicator
};
