/**
 * One-retry policy for completion calls as a two-state machine.
 *
 *   first_attempt --rate_limited--> (wait rateLimitMs) --> retrying
 *   first_attempt --timeout-------> (wait timeoutMs)   --> retrying
 *   first_attempt --fatal---------> fail
 *   retrying      --any failure---> fail
 */

export type RetryState = "first_attempt" | "retrying";

export type FailureClass = "rate_limited" | "timeout" | "fatal";

export type RetryDecision =
  | { action: "retry"; delayMs: number; next: RetryState }
  | { action: "fail" };

export interface RetryDelays {
  rateLimitMs: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_DELAYS: RetryDelays = {
  rateLimitMs: 2_000,
  timeoutMs: 1_000,
};

export function nextRetryStep(
  state: RetryState,
  failure: FailureClass,
  delays: RetryDelays = DEFAULT_RETRY_DELAYS
): RetryDecision {
  if (state === "retrying") return { action: "fail" };

  switch (failure) {
    case "rate_limited":
      return { action: "retry", delayMs: delays.rateLimitMs, next: "retrying" };
    case "timeout":
      return { action: "retry", delayMs: delays.timeoutMs, next: "retrying" };
    case "fatal":
      return { action: "fail" };
  }
}
