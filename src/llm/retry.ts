/**
 * Exponential backoff with jitter for retryable collaborator errors.
 */

import { CollaboratorError } from "../engine/errors.js";
import { ProviderError } from "./errors.js";

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
  onRetry?: (error: CollaboratorError, attempt: number, delayMs: number) => void;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2,
  jitter: true,
};

export function delayForAttempt(attempt: number, policy: RetryPolicy): number {
  let delay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt);
  delay = Math.min(delay, policy.maxDelayMs);
  if (policy.jitter) {
    delay = delay * (0.5 + Math.random());
  }
  return delay;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    function onAbort() {
      clearTimeout(timer);
      resolve();
    }
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Call `fn`, retrying collaborator errors marked retryable. Anything else,
 * an exhausted policy, or an aborted signal rethrows the last error.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  signal?: AbortSignal,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof CollaboratorError) || !err.retryable) throw err;
      if (attempt >= policy.maxRetries || signal?.aborted) throw err;

      let delay: number;
      if (err instanceof ProviderError && err.retryAfter != null) {
        const retryAfterMs = err.retryAfter * 1000;
        if (retryAfterMs > policy.maxDelayMs) throw err;
        delay = retryAfterMs;
      } else {
        delay = delayForAttempt(attempt, policy);
      }

      policy.onRetry?.(err, attempt, delay);
      await sleep(delay, signal);
      if (signal?.aborted) throw err;
    }
  }
}
