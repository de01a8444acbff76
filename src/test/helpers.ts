import type { RemoteContentStore } from "../lib/blockStoreClient";
import type { BlockUpdatePayload, RemoteBlock, SaveReceipt } from "../lib/types";
import type { CancelTimer, TimerScheduler } from "../state/editSessionController";

interface ScheduledTimer {
  dueAt: number;
  delayMs: number;
  callback: () => void;
  cancelled: boolean;
}

/** Timer scheduler driven by the test instead of the clock. */
export class ManualScheduler implements TimerScheduler {
  private now = 0;
  private timers: ScheduledTimer[] = [];

  schedule(callback: () => void, delayMs: number): CancelTimer {
    const timer: ScheduledTimer = { dueAt: this.now + delayMs, delayMs, callback, cancelled: false };
    this.timers.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }

  /** Delays of the timers that have not fired or been cancelled, in scheduling order. */
  pendingDelays(): number[] {
    return this.active().map((timer) => timer.delayMs);
  }

  advance(ms: number): void {
    const target = this.now + ms;
    for (;;) {
      const next = this.active()
        .filter((timer) => timer.dueAt <= target)
        .sort((left, right) => left.dueAt - right.dueAt)[0];
      if (!next) {
        break;
      }
      this.now = next.dueAt;
      next.cancelled = true;
      next.callback();
    }
    this.now = target;
  }

  private active(): ScheduledTimer[] {
    this.timers = this.timers.filter((timer) => !timer.cancelled);
    return this.timers;
  }
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });
  return { promise, resolve, reject };
}

/** Store whose calls stay pending until the test settles them. */
export class DeferredBlockStore implements RemoteContentStore {
  readonly fetches: { blockId: string; result: Deferred<RemoteBlock> }[] = [];
  readonly saves: { blockId: string; update: BlockUpdatePayload; result: Deferred<SaveReceipt> }[] = [];

  fetchBlock(blockId: string): Promise<RemoteBlock> {
    const result = deferred<RemoteBlock>();
    this.fetches.push({ blockId, result });
    return result.promise;
  }

  saveBlock(blockId: string, update: BlockUpdatePayload): Promise<SaveReceipt> {
    const result = deferred<SaveReceipt>();
    this.saves.push({ blockId, update, result });
    return result.promise;
  }
}

export function paragraphBlock(id: string, text: string, lastEditedAt = "2024-05-01T10:00:00.000Z"): RemoteBlock {
  return { type: "paragraph", id, lastEditedAt, richText: [{ plainText: text }] };
}
