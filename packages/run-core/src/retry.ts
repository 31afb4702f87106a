// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/retry`
 * Purpose: Bounded exponential backoff around an Outcome-returning call.
 * Scope: Retries transient outcomes only. Does not classify errors.
 * Invariants:
 * - At most `attempts` calls; delay before call n (n ≥ 2) is min(baseDelayMs · 2^(n-2), maxDelayMs).
 * - A thrown error is converted to a transient outcome so callers never see exceptions.
 * Side-effects: sleeps via injected function
 * @public
 */

import { fail, type Outcome } from "./outcome";

export interface RetryPolicy {
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 2), policy.maxDelayMs);
}

/** One call, with a thrown error read as a transient outcome. */
export async function settle<T>(
  call: () => Promise<Outcome<T>>
): Promise<Outcome<T>> {
  try {
    return await call();
  } catch (error) {
    return fail(
      "transient",
      error instanceof Error ? error.message : String(error)
    );
  }
}

export async function withRetry<T>(
  call: () => Promise<Outcome<T>>,
  policy: RetryPolicy,
  sleep: Sleep,
  onRetry?: (attempt: number, message: string) => void
): Promise<Outcome<T>> {
  const attempts = Math.max(1, policy.attempts);
  let last: Outcome<T> = fail("transient", "not attempted");

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (attempt > 1) {
      await sleep(backoffDelay(policy, attempt));
    }
    last = await settle(call);
    if (last.ok || last.error.kind !== "transient") return last;
    if (attempt < attempts) onRetry?.(attempt, last.error.message);
  }
  return last;
}
