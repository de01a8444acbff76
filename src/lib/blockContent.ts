import { EDITABLE_BLOCK_TYPES } from "./types";
import type { BlockType, BlockUpdatePayload, RemoteBlock, RichTextInput, RichTextSpan } from "./types";

export const DEFAULT_CODE_LANGUAGE = "plain text";

const BLOCK_TYPE_LABELS: Record<BlockType, string> = {
  paragraph: "Paragraph",
  heading_1: "Heading 1",
  heading_2: "Heading 2",
  heading_3: "Heading 3",
  bulleted_list_item: "Bulleted list item",
  numbered_list_item: "Numbered list item",
  to_do: "To-do",
  toggle: "Toggle",
  code: "Code",
  quote: "Quote",
  callout: "Callout"
};

export function isBlockType(value: string): value is BlockType {
  return EDITABLE_BLOCK_TYPES.some((type) => type === value);
}

export function blockTypeLabel(type: BlockType): string {
  return BLOCK_TYPE_LABELS[type];
}

export function richTextToPlainText(spans: RichTextSpan[]): string {
  return spans.map((span) => span.plainText).join("");
}

export function extractBlockText(block: RemoteBlock): string {
  switch (block.type) {
    case "unsupported":
      return "";
    default:
      return richTextToPlainText(block.richText);
  }
}

/** Structural type the editor should treat the block as, or undefined when it cannot be edited. */
export function editableBlockType(block: RemoteBlock): BlockType | undefined {
  return block.type === "unsupported" ? undefined : block.type;
}

function toRichTextInput(text: string): RichTextInput[] {
  return [{ type: "text", text: { content: text } }];
}

export function buildBlockUpdatePayload(
  type: BlockType,
  text: string,
  language: string = DEFAULT_CODE_LANGUAGE
): BlockUpdatePayload {
  const richText = toRichTextInput(text);
  if (type === "code") {
    return { type, richText, language };
  }
  return { type, richText };
}

/** Request body for a block update in the remote API's wire shape. */
export function toUpdateRequestBody(payload: BlockUpdatePayload): Record<string, unknown> {
  if (payload.type === "code") {
    return { code: { rich_text: payload.richText, language: payload.language } };
  }
  return { [payload.type]: { rich_text: payload.richText } };
}
