// @vitest-environment node
import { describe, expect, it, vi } from "vitest";
import {
  createHttpBlockStore,
  createMockBlockStore,
  parseBlockResponse,
  type RemoteContentStore,
  resolveBlockStore
} from "./blockStoreClient";
import { defaultSettings } from "./settings";
import { SyncError } from "./syncErrors";
import type { RemoteBlock } from "./types";

const EDITED_AT = "2024-05-01T10:00:00.000Z";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

function paragraphJson(id: string, text: string): Record<string, unknown> {
  return {
    object: "block",
    id,
    type: "paragraph",
    last_edited_time: EDITED_AT,
    paragraph: { rich_text: [{ plain_text: text, href: null }] }
  };
}

function httpStore(fetchImpl: typeof fetch): RemoteContentStore {
  return createHttpBlockStore({
    baseUrl: "https://api.example.test/",
    token: "test-secret",
    apiVersion: "2022-06-28",
    timeoutMs: 5000,
    fetchImpl
  });
}

async function rejectionOf(promise: Promise<unknown>): Promise<SyncError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SyncError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the promise to reject");
}

describe("parseBlockResponse", () => {
  it("maps rich text spans and keeps links", () => {
    const block = parseBlockResponse({
      id: "b1",
      type: "quote",
      last_edited_time: EDITED_AT,
      quote: {
        rich_text: [
          { plain_text: "Hello ", href: null },
          { plain_text: "World", href: "https://example.com" }
        ]
      }
    });
    expect(block).toEqual({
      type: "quote",
      id: "b1",
      lastEditedAt: EDITED_AT,
      richText: [{ plainText: "Hello " }, { plainText: "World", href: "https://example.com" }]
    });
  });

  it("fills in to_do and code details", () => {
    expect(
      parseBlockResponse({ id: "t", type: "to_do", last_edited_time: EDITED_AT, to_do: { rich_text: [] } })
    ).toEqual({ type: "to_do", id: "t", lastEditedAt: EDITED_AT, richText: [], checked: false });
    expect(
      parseBlockResponse({
        id: "c",
        type: "code",
        last_edited_time: EDITED_AT,
        code: { rich_text: [{ plain_text: "x = 1" }], language: "python" }
      })
    ).toEqual({ type: "code", id: "c", lastEditedAt: EDITED_AT, richText: [{ plainText: "x = 1" }], language: "python" });
  });

  it("marks block types without editable text as unsupported", () => {
    expect(parseBlockResponse({ id: "img", type: "image", last_edited_time: EDITED_AT, image: {} })).toEqual({
      type: "unsupported",
      id: "img",
      lastEditedAt: EDITED_AT,
      remoteType: "image"
    });
  });

  it("rejects a response without the type's rich text", () => {
    expect(() => parseBlockResponse({ id: "b", type: "paragraph", last_edited_time: EDITED_AT })).toThrow(
      "Malformed block response: missing paragraph.rich_text"
    );
    expect(() => parseBlockResponse("nope")).toThrow("Malformed block response: expected an object");
  });
});

describe("createHttpBlockStore", () => {
  it("fetches a block with auth and version headers", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse(paragraphJson("b1", "Hello")));
    const block = await httpStore(fetchMock).fetchBlock("b1");

    expect(block).toEqual({ type: "paragraph", id: "b1", lastEditedAt: EDITED_AT, richText: [{ plainText: "Hello" }] });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.example.test/v1/blocks/b1");
    expect(init?.method).toBe("GET");
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Notion-Version": "2022-06-28",
      "Content-Type": "application/json"
    });
  });

  it("patches the block with the type-keyed rich text body", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse(paragraphJson("b1", "Hi")));
    const receipt = await httpStore(fetchMock).saveBlock("b1", {
      type: "heading_2",
      richText: [{ type: "text", text: { content: "Hi" } }]
    });

    expect(receipt).toEqual({ lastEditedAt: EDITED_AT });
    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe("PATCH");
    expect(JSON.parse(String(init?.body))).toEqual({
      heading_2: { rich_text: [{ type: "text", text: { content: "Hi" } }] }
    });
  });

  it("turns HTTP failures into classified sync errors", async () => {
    const notFound = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => jsonResponse({ message: "Could not find block" }, 404));
    const missing = await rejectionOf(httpStore(notFound).fetchBlock("missing"));
    expect(missing.kind).toBe("not_found");
    expect(missing.status).toBe(404);
    expect(missing.message).toBe("GET /v1/blocks/missing: 404 Could not find block");

    const unavailable = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse({}, 503));
    const fault = await rejectionOf(httpStore(unavailable).fetchBlock("b1"));
    expect(fault.kind).toBe("server_fault");
    expect(fault.status).toBe(503);
  });

  it("classifies transport failures", async () => {
    const refused = vi
      .fn<typeof fetch>()
      .mockRejectedValue(Object.assign(new Error("connect failed"), { code: "ECONNREFUSED" }));
    const error = await rejectionOf(httpStore(refused).fetchBlock("b1"));
    expect(error.kind).toBe("connection_failure");
    expect(error.message).toBe("GET /v1/blocks/b1: connect failed");
  });
});

describe("createMockBlockStore", () => {
  const seed: RemoteBlock[] = [
    { type: "paragraph", id: "p1", lastEditedAt: EDITED_AT, richText: [{ plainText: "Hello" }] },
    { type: "to_do", id: "t1", lastEditedAt: EDITED_AT, richText: [{ plainText: "Ship it" }], checked: true },
    { type: "unsupported", id: "img", lastEditedAt: EDITED_AT, remoteType: "image" }
  ];

  it("saves text and records calls", async () => {
    const store = createMockBlockStore(seed, { now: () => "2024-05-02T00:00:00.000Z" });
    const receipt = await store.saveBlock("p1", {
      type: "heading_1",
      richText: [{ type: "text", text: { content: "Title" } }]
    });

    expect(receipt).toEqual({ lastEditedAt: "2024-05-02T00:00:00.000Z" });
    expect(await store.fetchBlock("p1")).toEqual({
      type: "heading_1",
      id: "p1",
      lastEditedAt: "2024-05-02T00:00:00.000Z",
      richText: [{ plainText: "Title" }]
    });
    expect(store.calls.map((call) => call.operation)).toEqual(["save", "fetch"]);
  });

  it("keeps the checked state of a to_do", async () => {
    const store = createMockBlockStore(seed);
    await store.saveBlock("t1", { type: "to_do", richText: [{ type: "text", text: { content: "Shipped" } }] });
    const block = store.getBlock("t1");
    expect(block?.type === "to_do" && block.checked).toBe(true);
  });

  it("fails queued calls before serving again", async () => {
    const store = createMockBlockStore(seed);
    store.failNext("fetch", new SyncError("server_fault", "boom", { status: 500 }), 2);

    expect((await rejectionOf(store.fetchBlock("p1"))).kind).toBe("server_fault");
    expect((await rejectionOf(store.fetchBlock("p1"))).kind).toBe("server_fault");
    expect((await store.fetchBlock("p1")).id).toBe("p1");
  });

  it("rejects missing and unsupported blocks", async () => {
    const store = createMockBlockStore(seed);
    expect((await rejectionOf(store.fetchBlock("nope"))).kind).toBe("not_found");
    expect((await rejectionOf(store.saveBlock("img", { type: "paragraph", richText: [] }))).kind).toBe(
      "validation_failure"
    );
  });

  it("hands out copies", async () => {
    const store = createMockBlockStore(seed);
    const fetched = await store.fetchBlock("p1");
    if (fetched.type === "paragraph") {
      fetched.richText.push({ plainText: "!" });
    }
    expect(store.getBlock("p1")).toEqual(seed[0]);
  });
});

describe("resolveBlockStore", () => {
  it("falls back to the in-memory store without a token", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    const store = resolveBlockStore(defaultSettings, {
      fetchImpl: fetchMock,
      fallbackSeed: [{ type: "paragraph", id: "demo", lastEditedAt: EDITED_AT, richText: [] }]
    });
    expect((await store.fetchBlock("demo")).id).toBe("demo");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("uses the HTTP store when a token is configured", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse(paragraphJson("b9", "Remote")));
    const store = resolveBlockStore({ ...defaultSettings, apiToken: "test-secret" }, { fetchImpl: fetchMock });
    await store.fetchBlock("b9");
    expect(fetchMock.mock.calls[0][0]).toBe("https://api.notion.com/v1/blocks/b9");
  });
});
