import { z } from "zod";
import { DEFAULT_CODE_LANGUAGE, isBlockType, toUpdateRequestBody } from "./blockContent";
import { type EditorLogger, rootLogger } from "./logger";
import { redactSettings } from "./settings";
import { classifyFailure, kindFromStatus, SyncError } from "./syncErrors";
import type { BlockUpdatePayload, EditorSettings, RemoteBlock, RichTextSpan, SaveReceipt } from "./types";

export interface RemoteContentStore {
  fetchBlock(blockId: string): Promise<RemoteBlock>;
  saveBlock(blockId: string, update: BlockUpdatePayload): Promise<SaveReceipt>;
}

const richTextSchema = z.object({
  plain_text: z.string(),
  href: z.string().nullable().optional()
});

const blockEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  last_edited_time: z.string()
});

const blockContentSchema = z.object({
  rich_text: z.array(richTextSchema),
  checked: z.boolean().optional(),
  language: z.string().optional()
});

const apiErrorSchema = z.object({
  message: z.string()
});

const jsonRecordSchema = z.record(z.string(), z.unknown());

function malformed(detail: string, cause?: unknown): SyncError {
  return new SyncError("unknown", `Malformed block response: ${detail}`, { cause });
}

export function parseBlockResponse(json: unknown): RemoteBlock {
  const record = jsonRecordSchema.safeParse(json);
  if (!record.success) {
    throw malformed("expected an object", record.error);
  }
  const envelope = blockEnvelopeSchema.safeParse(record.data);
  if (!envelope.success) {
    throw malformed("missing id, type or last_edited_time", envelope.error);
  }
  const { id, type, last_edited_time: lastEditedAt } = envelope.data;
  if (!isBlockType(type)) {
    return { type: "unsupported", id, lastEditedAt, remoteType: type };
  }
  const content = blockContentSchema.safeParse(record.data[type]);
  if (!content.success) {
    throw malformed(`missing ${type}.rich_text`, content.error);
  }
  const richText: RichTextSpan[] = content.data.rich_text.map((span) =>
    span.href ? { plainText: span.plain_text, href: span.href } : { plainText: span.plain_text }
  );
  switch (type) {
    case "to_do":
      return { type, id, lastEditedAt, richText, checked: content.data.checked ?? false };
    case "code":
      return { type, id, lastEditedAt, richText, language: content.data.language ?? DEFAULT_CODE_LANGUAGE };
    default:
      return { type, id, lastEditedAt, richText };
  }
}

export interface HttpBlockStoreOptions {
  baseUrl: string;
  token: string;
  apiVersion: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  logger?: EditorLogger;
}

async function readErrorDetail(response: Response): Promise<string> {
  try {
    const parsed = apiErrorSchema.safeParse(await response.json());
    return parsed.success ? parsed.data.message : response.statusText;
  } catch {
    return response.statusText;
  }
}

/** Store backed by a Notion-compatible REST API. */
export function createHttpBlockStore(options: HttpBlockStoreOptions): RemoteContentStore {
  const fetchImpl = options.fetchImpl ?? fetch;
  const logger = options.logger ?? rootLogger.getSubLogger({ name: "block-store" });
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  async function request(method: "GET" | "PATCH", path: string, body?: unknown): Promise<unknown> {
    const label = `${method} ${path}`;
    logger.debug("request", label);
    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${options.token}`,
          "Notion-Version": options.apiVersion,
          "Content-Type": "application/json"
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(options.timeoutMs)
      });
    } catch (error) {
      const failure = classifyFailure(error);
      throw new SyncError(failure.kind, `${label}: ${failure.message}`, { cause: error });
    }
    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw new SyncError(kindFromStatus(response.status), `${label}: ${response.status} ${detail}`, {
        status: response.status
      });
    }
    return response.json();
  }

  return {
    async fetchBlock(blockId) {
      const json = await request("GET", `/v1/blocks/${encodeURIComponent(blockId)}`);
      return parseBlockResponse(json);
    },
    async saveBlock(blockId, update) {
      const json = await request("PATCH", `/v1/blocks/${encodeURIComponent(blockId)}`, toUpdateRequestBody(update));
      return { lastEditedAt: parseBlockResponse(json).lastEditedAt };
    }
  };
}

export type MockStoreOperation = "fetch" | "save";

export interface MockStoreCall {
  operation: MockStoreOperation;
  blockId: string;
  update?: BlockUpdatePayload;
}

export interface MockBlockStore extends RemoteContentStore {
  readonly calls: readonly MockStoreCall[];
  getBlock(blockId: string): RemoteBlock | undefined;
  putBlock(block: RemoteBlock): void;
  /** Rejects the next `times` calls of `operation` with `error`. */
  failNext(operation: MockStoreOperation, error: unknown, times?: number): void;
}

export interface MockBlockStoreOptions {
  now?: () => string;
}

function cloneBlock(block: RemoteBlock): RemoteBlock {
  return structuredClone(block);
}

function applyUpdate(previous: RemoteBlock, update: BlockUpdatePayload, lastEditedAt: string): RemoteBlock {
  const richText: RichTextSpan[] = update.richText.map((span) => ({ plainText: span.text.content }));
  const base = { id: previous.id, lastEditedAt, richText };
  switch (update.type) {
    case "code":
      return { ...base, type: "code", language: update.language };
    case "to_do":
      return { ...base, type: "to_do", checked: previous.type === "to_do" ? previous.checked : false };
    default:
      return { ...base, type: update.type };
  }
}

/** In-memory store used when no API token is configured, and by tests. */
export function createMockBlockStore(seed: RemoteBlock[] = [], options: MockBlockStoreOptions = {}): MockBlockStore {
  const now = options.now ?? (() => new Date().toISOString());
  const blocks = new Map(seed.map((block) => [block.id, cloneBlock(block)]));
  const calls: MockStoreCall[] = [];
  const failures: Record<MockStoreOperation, unknown[]> = { fetch: [], save: [] };

  function takeFailure(operation: MockStoreOperation): { error: unknown } | undefined {
    const queue = failures[operation];
    if (queue.length === 0) {
      return undefined;
    }
    return { error: queue.shift() };
  }

  function requireBlock(blockId: string): RemoteBlock {
    const block = blocks.get(blockId);
    if (!block) {
      throw new SyncError("not_found", `Block not found: ${blockId}`, { status: 404 });
    }
    return block;
  }

  return {
    calls,
    getBlock(blockId) {
      const block = blocks.get(blockId);
      return block ? cloneBlock(block) : undefined;
    },
    putBlock(block) {
      blocks.set(block.id, cloneBlock(block));
    },
    failNext(operation, error, times = 1) {
      for (let index = 0; index < times; index += 1) {
        failures[operation].push(error);
      }
    },
    async fetchBlock(blockId) {
      calls.push({ operation: "fetch", blockId });
      const failure = takeFailure("fetch");
      if (failure) {
        throw failure.error;
      }
      return cloneBlock(requireBlock(blockId));
    },
    async saveBlock(blockId, update) {
      calls.push({ operation: "save", blockId, update });
      const failure = takeFailure("save");
      if (failure) {
        throw failure.error;
      }
      const previous = requireBlock(blockId);
      if (previous.type === "unsupported") {
        throw new SyncError("validation_failure", `Block ${blockId} cannot be edited as text`, { status: 400 });
      }
      const next = applyUpdate(previous, update, now());
      blocks.set(blockId, next);
      return { lastEditedAt: next.lastEditedAt };
    }
  };
}

export interface ResolveBlockStoreOptions {
  fallbackSeed?: RemoteBlock[];
  fetchImpl?: typeof fetch;
  logger?: EditorLogger;
}

/** HTTP store when an API token is configured, otherwise the in-memory mock. */
export function resolveBlockStore(settings: EditorSettings, options: ResolveBlockStoreOptions = {}): RemoteContentStore {
  const logger = options.logger ?? rootLogger.getSubLogger({ name: "block-store" });
  if (!settings.apiToken) {
    logger.warn("No API token configured; using the in-memory block store");
    return createMockBlockStore(options.fallbackSeed);
  }
  logger.debug("Using HTTP block store", redactSettings(settings));
  return createHttpBlockStore({
    baseUrl: settings.apiBaseUrl,
    token: settings.apiToken,
    apiVersion: settings.apiVersion,
    timeoutMs: settings.requestTimeoutMs,
    fetchImpl: options.fetchImpl,
    logger
  });
}
