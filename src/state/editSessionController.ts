import type { RemoteContentStore } from "../lib/blockStoreClient";
import { type EditorLogger, rootLogger } from "../lib/logger";
import { defaultSettings } from "../lib/settings";
import { classifyFailure } from "../lib/syncErrors";
import type { BlockType, EditorSettings } from "../lib/types";
import {
  type ConfirmationChoice,
  editSessionReducer,
  type EditSession,
  type EditSessionCommand,
  type EditSessionMessage,
  type ErrorAction,
  initialEditSession,
  type NavigationTarget
} from "./editSessionState";

export type CancelTimer = () => void;

export interface TimerScheduler {
  schedule(callback: () => void, delayMs: number): CancelTimer;
}

export const systemTimers: TimerScheduler = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  }
};

export type ConfirmationPrompt = (choices: readonly ConfirmationChoice[]) => Promise<ConfirmationChoice>;

export interface ExitResult {
  saved: boolean;
}

export type SessionSettings = Pick<EditorSettings, "maxRetries" | "retryBaseDelayMs" | "retryMaxDelayMs" | "indicatorMs">;

export interface EditSessionControllerOptions {
  store: RemoteContentStore;
  settings?: SessionSettings;
  scheduler?: TimerScheduler;
  logger?: EditorLogger;
  onExit?: (result: ExitResult) => void;
  onNavigate?: (target: NavigationTarget) => void;
  /** Answers exit confirmations without rendering a dialog. */
  prompt?: ConfirmationPrompt;
}

/**
 * Owns one edit session. Messages go through the reducer; the commands it
 * returns are executed here and every asynchronous result is fed back as a
 * message tagged with the generation it was issued under.
 */
export class EditSessionController {
  private session: EditSession;
  private readonly store: RemoteContentStore;
  private readonly scheduler: TimerScheduler;
  private readonly logger: EditorLogger;
  private readonly options: EditSessionControllerOptions;
  private readonly listeners = new Set<() => void>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly timers = new Set<CancelTimer>();
  private disposed = false;

  constructor(options: EditSessionControllerOptions) {
    const settings = options.settings ?? defaultSettings;
    this.options = options;
    this.store = options.store;
    this.scheduler = options.scheduler ?? systemTimers;
    this.logger = options.logger ?? rootLogger.getSubLogger({ name: "edit-session" });
    this.session = initialEditSession({
      maxRetries: settings.maxRetries,
      backoff: { baseDelayMs: settings.retryBaseDelayMs, maxDelayMs: settings.retryMaxDelayMs },
      indicatorMs: settings.indicatorMs
    });
  }

  getSnapshot = (): EditSession => this.session;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  get isDisposed(): boolean {
    return this.disposed;
  }

  dispatch(message: EditSessionMessage): void {
    if (this.disposed) {
      this.logger.debug("Dropped message after dispose", message.type);
      return;
    }
    const previous = this.session;
    const { session, commands } = editSessionReducer(previous, message);
    if (session !== previous) {
      if (session.phase.kind !== previous.phase.kind) {
        this.logger.debug(`${previous.phase.kind} -> ${session.phase.kind}`, message.type);
      }
      this.session = session;
      this.emit();
    }
    for (const command of commands) {
      this.execute(command);
    }
  }

  load(blockId: string, pageId?: string): void {
    this.dispatch({ type: "load_block", blockId, pageId });
  }

  edit(text: string): void {
    this.dispatch({ type: "user_edit", text });
  }

  save(): void {
    this.dispatch({ type: "request_save" });
  }

  refresh(): void {
    this.dispatch({ type: "request_refresh" });
  }

  transform(blockType: BlockType): void {
    this.dispatch({ type: "request_transform", blockType });
  }

  requestExit(): void {
    this.dispatch({ type: "request_exit" });
  }

  respond(choice: ConfirmationChoice): void {
    this.dispatch({ type: "confirmation_response", choice });
  }

  acknowledgeError(action: ErrorAction): void {
    this.dispatch({ type: "error_acknowledged", action });
  }

  navigate(target: NavigationTarget): void {
    this.dispatch({ type: "navigate", target });
  }

  /** Resolves once no fetch, save or prompt is in flight. Pending timers are not awaited. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const cancel of this.timers) {
      cancel();
    }
    this.timers.clear();
    this.listeners.clear();
  }

  private emit(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  private execute(command: EditSessionCommand): void {
    switch (command.type) {
      case "fetch_block":
        this.logger.debug("Fetching block", command.blockId);
        this.track(
          this.store.fetchBlock(command.blockId).then(
            (block) => this.dispatch({ type: "fetch_result", generation: command.generation, outcome: { ok: true, block } }),
            (error: unknown) =>
              this.dispatch({
                type: "fetch_result",
                generation: command.generation,
                outcome: { ok: false, failure: classifyFailure(error) }
              })
          )
        );
        return;
      case "save_block":
        this.logger.debug("Saving block", command.blockId, command.update.type);
        this.track(
          this.store.saveBlock(command.blockId, command.update).then(
            (receipt) => this.dispatch({ type: "save_result", generation: command.generation, outcome: { ok: true, receipt } }),
            (error: unknown) =>
              this.dispatch({
                type: "save_result",
                generation: command.generation,
                outcome: { ok: false, failure: classifyFailure(error) }
              })
          )
        );
        return;
      case "schedule_retry":
        this.logger.warn(
          `Save failed (${command.error.kind}); retry ${command.attempt} in ${command.delayMs}ms`,
          command.error.message
        );
        this.startTimer(command.delayMs, () => this.dispatch({ type: "retry_timer_fired", generation: command.generation }));
        return;
      case "schedule_indicator_clear":
        this.startTimer(command.delayMs, () => this.dispatch({ type: "indicator_expired", seq: command.seq }));
        return;
      case "present_confirmation":
        this.askForConfirmation(command.choices);
        return;
      case "show_error":
        this.logger.error(`Sync failed (${command.error.kind})`, command.error.message);
        return;
      case "exit":
        this.options.onExit?.({ saved: command.saved });
        return;
      case "navigate":
        this.options.onNavigate?.(command.target);
        return;
    }
  }

  private askForConfirmation(choices: readonly ConfirmationChoice[]): void {
    const { prompt } = this.options;
    if (!prompt) {
      return;
    }
    this.track(
      prompt(choices).then(
        (choice) => this.respond(choice),
        (error: unknown) => {
          this.logger.warn("Confirmation prompt failed; staying in the editor", classifyFailure(error).message);
          this.respond("cancel");
        }
      )
    );
  }

  private startTimer(delayMs: number, fire: () => void): void {
    const cancel = this.scheduler.schedule(() => {
      this.timers.delete(cancel);
      fire();
    }, delayMs);
    this.timers.add(cancel);
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((error: unknown) => {
        this.logger.error("Unhandled failure in edit session", error);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
