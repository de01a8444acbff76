import type { ClassifiedFailure, ErrorClassification, SyncErrorKind, TransientErrorKind } from "./types";

const TRANSIENT_KINDS: ReadonlySet<SyncErrorKind> = new Set<TransientErrorKind>([
  "network_timeout",
  "connection_failure",
  "rate_limited",
  "server_fault"
]);

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_HEADERS_TIMEOUT"]);
const CONNECTION_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "EHOSTUNREACH", "ENETUNREACH", "EPIPE"]);

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly status?: number;

  constructor(kind: SyncErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SyncError";
    this.kind = kind;
    this.status = options.status;
  }
}

export function classificationOf(kind: SyncErrorKind): ErrorClassification {
  return TRANSIENT_KINDS.has(kind) ? "transient" : "permanent";
}

export function kindFromStatus(status: number): SyncErrorKind {
  if (status === 401 || status === 403) return "unauthorized";
  if (status === 404) return "not_found";
  if (status === 400 || status === 409 || status === 422) return "validation_failure";
  if (status === 408) return "network_timeout";
  if (status === 429) return "rate_limited";
  if (status >= 500 && status <= 599) return "server_fault";
  return "unknown";
}

function errorCode(value: unknown): string | undefined {
  let current: unknown = value;
  // fetch wraps socket errors one or two levels deep in `cause`
  for (let depth = 0; depth < 3 && current && typeof current === "object"; depth += 1) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}

// "HTTP 502", "status: 500", "503 Service Unavailable"; a bare number is not a status
const SERVER_STATUS = /\b(?:http|status|code)\s*:?\s*5\d\d\b|\b5\d\d\s+(?:internal|bad gateway|service|gateway)/;

function kindFromMessage(message: string): SyncErrorKind {
  const text = message.toLowerCase();
  if (text.includes("timeout") || text.includes("timed out") || text.includes("deadline exceeded")) {
    return "network_timeout";
  }
  if (
    text.includes("connection refused") ||
    text.includes("no such host") ||
    text.includes("temporary failure") ||
    text.includes("name resolution")
  ) {
    return "connection_failure";
  }
  if (text.includes("429") || text.includes("rate limit") || text.includes("too many requests")) {
    return "rate_limited";
  }
  if (SERVER_STATUS.test(text) || text.includes("internal server error") || text.includes("service unavailable")) {
    return "server_fault";
  }
  if (/\b40[13]\b/.test(text) || text.includes("unauthorized") || text.includes("forbidden")) {
    return "unauthorized";
  }
  if (/\b404\b/.test(text) || text.includes("not found")) {
    return "not_found";
  }
  if (/\b4(00|09|22)\b/.test(text) || text.includes("bad request") || text.includes("validation")) {
    return "validation_failure";
  }
  return "unknown";
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
}

function resolveKind(error: unknown): SyncErrorKind {
  if (error instanceof SyncError) {
    return error.kind;
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return "network_timeout";
  }
  const code = errorCode(error);
  if (code && TIMEOUT_CODES.has(code)) {
    return "network_timeout";
  }
  if (code && CONNECTION_CODES.has(code)) {
    return "connection_failure";
  }
  return kindFromMessage(messageOf(error));
}

/**
 * Maps any rejected value into the sync taxonomy. Only recognized network,
 * rate-limit and server faults are transient; anything unrecognized is permanent.
 */
export function classifyFailure(error: unknown): ClassifiedFailure {
  const kind = resolveKind(error);
  return {
    kind,
    classification: classificationOf(kind),
    message: messageOf(error),
    status: error instanceof SyncError ? error.status : undefined
  };
}

export interface SyncErrorDescription {
  title: string;
  hint: string;
}

const DESCRIPTIONS: Record<SyncErrorKind, SyncErrorDescription> = {
  network_timeout: {
    title: "Request timed out",
    hint: "The request took too long. Check your connection and try again."
  },
  connection_failure: {
    title: "Can't reach the workspace",
    hint: "Check your internet connection and try again."
  },
  rate_limited: {
    title: "Rate limit exceeded",
    hint: "Too many requests were sent. Wait a moment before retrying."
  },
  server_fault: {
    title: "Server error",
    hint: "The workspace servers are having issues. Please try again."
  },
  unauthorized: {
    title: "Access denied",
    hint: "Check the API token in your settings and the block's sharing permissions."
  },
  not_found: {
    title: "Block not found",
    hint: "This block may have been deleted or you don't have access."
  },
  validation_failure: {
    title: "Invalid request",
    hint: "The block couldn't be updated with this content."
  },
  unknown: {
    title: "Something went wrong",
    hint: "An unexpected error occurred."
  }
};

export function describeSyncError(failure: Pick<ClassifiedFailure, "kind">): SyncErrorDescription {
  return DESCRIPTIONS[failure.kind];
}
