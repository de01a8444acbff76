import { useLayoutEffect, useRef, type KeyboardEvent } from "react";
import clsx from "clsx";
import type { BlockType } from "../../lib/types";
import { type EditorKeyAction, resolveEditorKeyAction } from "./keyboardContract";

interface BlockEditorProps {
  value: string;
  blockType: BlockType;
  dirty: boolean;
  readOnly: boolean;
  placeholder?: string;
  onChange: (next: string) => void;
  onKeyAction: (action: Exclude<EditorKeyAction, { type: "none" }>) => void;
}

export function BlockEditor({
  value,
  blockType,
  dirty,
  readOnly,
  placeholder,
  onChange,
  onKeyAction
}: BlockEditorProps): JSX.Element {
  const editorRef = useRef<HTMLTextAreaElement | null>(null);

  const resizeToContent = (): void => {
    const editor = editorRef.current;
    if (!editor) {
      return;
    }
    // Reset first so shrinking works when lines are deleted.
    editor.style.height = "0px";
    editor.style.height = `${Math.max(editor.scrollHeight, 24)}px`;
  };

  useLayoutEffect(() => {
    resizeToContent();
  }, [value]);

  const handleKeyDown = (event: KeyboardEvent<HTMLTextAreaElement>): void => {
    const action = resolveEditorKeyAction({
      key: event.key,
      metaKey: event.metaKey,
      ctrlKey: event.ctrlKey,
      shiftKey: event.shiftKey,
      altKey: event.altKey
    });
    if (action.type === "none") {
      return;
    }
    event.preventDefault();
    onKeyAction(action);
  };

  return (
    <textarea
      ref={editorRef}
      className={clsx("block-editor", `block-editor--${blockType}`, dirty && "dirty")}
      aria-label="Block text"
      rows={3}
      wrap="soft"
      value={value}
      readOnly={readOnly}
      onChange={(event) => {
        resizeToContent();
        onChange(event.target.value);
      }}
      onKeyDown={handleKeyDown}
      placeholder={placeholder ?? "Type to edit this block"}
    />
  );
}
