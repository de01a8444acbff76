import type { BlockType } from "../../lib/types";
import type { ConfirmationChoice, ErrorAction } from "../../state/editSessionState";

export interface KeyContext {
  key: string;
  metaKey: boolean;
  ctrlKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
}

export type EditorKeyAction =
  | { type: "none" }
  | { type: "save" }
  | { type: "refresh" }
  | { type: "exit" }
  | { type: "transform"; blockType: BlockType };

export type ConfirmationKeyAction = { type: "none" } | { type: "respond"; choice: ConfirmationChoice };

export type ErrorKeyAction = { type: "none" } | { type: "acknowledge"; action: ErrorAction };

const TRANSFORM_SHORTCUTS: Record<string, BlockType> = {
  "1": "heading_1",
  "2": "heading_2",
  "3": "heading_3",
  p: "paragraph",
  l: "bulleted_list_item",
  o: "numbered_list_item",
  q: "quote",
  k: "code"
};

const CONFIRMATION_KEYS: Record<string, ConfirmationChoice> = {
  s: "save",
  d: "discard",
  c: "cancel"
};

function isModifierPressed(ctx: KeyContext): boolean {
  return ctx.metaKey || ctx.ctrlKey;
}

function isPlainKey(ctx: KeyContext): boolean {
  return !isModifierPressed(ctx) && !ctx.altKey;
}

export function transformShortcuts(): ReadonlyArray<[string, BlockType]> {
  return Object.entries(TRANSFORM_SHORTCUTS);
}

export function resolveEditorKeyAction(ctx: KeyContext): EditorKeyAction {
  const modifier = isModifierPressed(ctx);
  const lowerKey = ctx.key.toLowerCase();

  if (ctx.key === "Escape") {
    return { type: "exit" };
  }

  if (!modifier || ctx.shiftKey || ctx.altKey) {
    return { type: "none" };
  }

  if (lowerKey === "s") {
    return { type: "save" };
  }

  if (lowerKey === "r") {
    return { type: "refresh" };
  }

  // block transforms are Ctrl-only
  const blockType = ctx.ctrlKey && !ctx.metaKey ? TRANSFORM_SHORTCUTS[lowerKey] : undefined;
  if (blockType) {
    return { type: "transform", blockType };
  }

  return { type: "none" };
}

export function resolveConfirmationKeyAction(ctx: KeyContext): ConfirmationKeyAction {
  if (ctx.key === "Escape") {
    return { type: "respond", choice: "cancel" };
  }
  const choice = isPlainKey(ctx) ? CONFIRMATION_KEYS[ctx.key.toLowerCase()] : undefined;
  return choice ? { type: "respond", choice } : { type: "none" };
}

export function resolveErrorKeyAction(ctx: KeyContext, retryOffered: boolean): ErrorKeyAction {
  if (ctx.key === "Escape") {
    return { type: "acknowledge", action: "dismiss" };
  }
  if (!isPlainKey(ctx)) {
    return { type: "none" };
  }
  const lowerKey = ctx.key.toLowerCase();
  if (lowerKey === "r" && retryOffered) {
    return { type: "acknowledge", action: "retry" };
  }
  if (lowerKey === "d") {
    return { type: "acknowledge", action: "dismiss" };
  }
  return { type: "none" };
}
