export const EDITABLE_BLOCK_TYPES = [
  "paragraph",
  "heading_1",
  "heading_2",
  "heading_3",
  "bulleted_list_item",
  "numbered_list_item",
  "to_do",
  "toggle",
  "code",
  "quote",
  "callout"
] as const;

export type BlockType = (typeof EDITABLE_BLOCK_TYPES)[number];

export interface RichTextSpan {
  plainText: string;
  href?: string;
}

interface RemoteBlockBase {
  id: string;
  lastEditedAt: string;
  richText: RichTextSpan[];
}

export interface TextRemoteBlock extends RemoteBlockBase {
  type: Exclude<BlockType, "to_do" | "code">;
}

export interface TodoRemoteBlock extends RemoteBlockBase {
  type: "to_do";
  checked: boolean;
}

export interface CodeRemoteBlock extends RemoteBlockBase {
  type: "code";
  language: string;
}

/** Any block type the editor cannot round-trip; its text extracts as empty. */
export interface UnsupportedRemoteBlock {
  type: "unsupported";
  id: string;
  lastEditedAt: string;
  remoteType: string;
}

export type RemoteBlock = TextRemoteBlock | TodoRemoteBlock | CodeRemoteBlock | UnsupportedRemoteBlock;

export interface RichTextInput {
  type: "text";
  text: { content: string };
}

export type BlockUpdatePayload =
  | { type: Exclude<BlockType, "code">; richText: RichTextInput[] }
  | { type: "code"; richText: RichTextInput[]; language: string };

export interface SaveReceipt {
  lastEditedAt: string;
}

export type ErrorClassification = "transient" | "permanent";

export type TransientErrorKind = "network_timeout" | "connection_failure" | "rate_limited" | "server_fault";
export type PermanentErrorKind = "unauthorized" | "not_found" | "validation_failure" | "unknown";
export type SyncErrorKind = TransientErrorKind | PermanentErrorKind;

export interface ClassifiedFailure {
  kind: SyncErrorKind;
  classification: ErrorClassification;
  message: string;
  status?: number;
}

export type LogLevelName = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface EditorSettings {
  apiBaseUrl: string;
  apiToken?: string;
  apiVersion: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  indicatorMs: number;
  logLevel: LogLevelName;
}
