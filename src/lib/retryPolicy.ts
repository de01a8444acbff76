import type { ErrorClassification } from "./types";

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = Object.freeze({
  baseDelayMs: 1000,
  maxDelayMs: 10_000
});

/** Exponential delay for a zero-indexed retry attempt: base, 2x base, 4x base, ... capped. */
export function backoffDelay(attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const exponent = Math.max(0, attempt);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}

export function decideRetry(
  attempt: number,
  maxRetries: number,
  classification: ErrorClassification,
  policy: BackoffPolicy = DEFAULT_BACKOFF
): RetryDecision {
  return {
    shouldRetry: classification === "transient" && attempt < maxRetries,
    delayMs: backoffDelay(attempt, policy)
  };
}
