import { describe, expect, it } from "vitest";
import { createDraft, isDraftDirty, markDraftClean, withDraftText } from "./draft";

describe("draft", () => {
  it("is dirty only while the text differs from the baseline", () => {
    const loaded = createDraft("Hello");
    expect(isDraftDirty(loaded)).toBe(false);

    const edited = withDraftText(loaded, "Hello World");
    expect(isDraftDirty(edited)).toBe(true);

    const reverted = withDraftText(edited, "Hello");
    expect(isDraftDirty(reverted)).toBe(false);
  });

  it("returns the same draft when the text is unchanged", () => {
    const draft = createDraft("same");
    expect(withDraftText(draft, "same")).toBe(draft);
  });

  it("adopts the current text as baseline when marked clean", () => {
    const edited = withDraftText(createDraft("Hello"), "Hello World");
    const clean = markDraftClean(edited);
    expect(isDraftDirty(clean)).toBe(false);
    expect(clean.baselineText).toBe("Hello World");
    expect(clean.text).toBe("Hello World");
  });

  it("is a no-op the second time it is marked clean", () => {
    const clean = markDraftClean(withDraftText(createDraft("a"), "b"));
    expect(markDraftClean(clean)).toBe(clean);
  });

  it("can adopt the text that was actually saved", () => {
    const draft = withDraftText(createDraft("v1"), "v3");
    const afterSave = markDraftClean(draft, "v2");
    expect(afterSave).toEqual({ text: "v3", baselineText: "v2" });
    expect(isDraftDirty(afterSave)).toBe(true);
  });
});
