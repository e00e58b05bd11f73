import { Errors } from "@pinecone-database/pinecone";
import { log } from "../logger.js";

// ── Retry for Pinecone calls ─────────────────────────────

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** First backoff in ms, doubled on every retry (default: 500) */
  baseDelayMs?: number;
  /** Shown in logs, e.g. "pinecone query" */
  label?: string;
}

const DEFAULTS: Required<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 500,
  label: "pinecone call",
};

/** Pinecone failures that are worth another attempt: 5xx and dropped connections. */
const TRANSIENT_ERRORS = [
  Errors.PineconeUnavailableError,
  Errors.PineconeInternalServerError,
  Errors.PineconeConnectionError,
];

const TRANSIENT_MESSAGE = /\b429\b|too many requests|rate limit|ECONNRESET|ETIMEDOUT|socket hang up/i;

/**
 * Run a Pinecone call, backing off exponentially on transient failures.
 * Anything else (bad request, auth, not found) is rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, label } = { ...DEFAULTS, ...opts };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt >= maxRetries || !isRetryable(err)) throw err;

      const delayMs = baseDelayMs * 2 ** attempt;
      log.warn(
        { label, error: errorName(err), delayMs, attempt: attempt + 1, maxRetries },
        "⚠️ Retrying Pinecone call",
      );
      await sleep(delayMs);
    }
  }
}

export function isRetryable(err: unknown): boolean {
  if (TRANSIENT_ERRORS.some((cls) => err instanceof cls)) return true;
  // fetch() rejects with a TypeError when the network is unreachable
  if (err instanceof TypeError) return true;
  return err instanceof Error && TRANSIENT_MESSAGE.test(err.message);
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
