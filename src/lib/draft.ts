/** Local edit of a block's text against the last text known to match the remote store. */
export interface Draft {
  text: string;
  baselineText: string;
}

export function createDraft(text: string): Draft {
  return { text, baselineText: text };
}

export function withDraftText(draft: Draft, text: string): Draft {
  if (draft.text === text) {
    return draft;
  }
  return { ...draft, text };
}

export function isDraftDirty(draft: Draft): boolean {
  return draft.text !== draft.baselineText;
}

/** Adopts `savedText` (default: the current text) as the new baseline. */
export function markDraftClean(draft: Draft, savedText: string = draft.text): Draft {
  if (draft.baselineText === savedText && draft.text === savedText) {
    return draft;
  }
  return { text: draft.text, baselineText: savedText };
}
