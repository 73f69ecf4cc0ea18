import { setTimeout as delay } from "node:timers/promises";
import { log } from "../core/logger.js";
import type { EnhancementResult } from "./types.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 8_000,
};

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

/** Delay before retry number `attempt` (1-based): base, 2·base, 4·base… capped. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Run `attempt` until it produces a non-retryable result or the policy runs
 * out. Only failures flagged `retryable` are retried.
 */
export async function withRetry(
  attempt: () => Promise<EnhancementResult>,
  policy: RetryPolicy,
  options: { sleep?: SleepFn | undefined; signal?: AbortSignal | undefined } = {},
): Promise<EnhancementResult> {
  const sleep = options.sleep ?? defaultSleep;
  let n = 1;

  for (;;) {
    const result = await attempt();
    if (result.status !== "failed" || !result.retryable || n >= policy.maxAttempts) {
      return result;
    }
    if (options.signal?.aborted) {
      return { status: "failed", failure: "cancelled", message: "shutdown in progress", retryable: false };
    }

    const wait = backoffDelay(n, policy);
    log.warn("retry", `attempt ${n}/${policy.maxAttempts} failed (${result.message}), retrying in ${wait}ms`);
    try {
      await sleep(wait, options.signal);
    } catch (err) {
      if (options.signal?.aborted) {
        return { status: "failed", failure: "cancelled", message: "shutdown in progress", retryable: false };
      }
      throw err;
    }
    n++;
  }
}
