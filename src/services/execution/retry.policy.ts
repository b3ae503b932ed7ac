import type { AppConfig } from "../../config";
import { classifyFault, type ToolFault } from "../tools/tool.fault";

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts is maxRetries + 1. */
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 60000,
};

export function retryPolicyFromConfig(
  config: Pick<AppConfig, "toolMaxRetries" | "toolBackoffInitialMs" | "toolBackoffMaxMs">,
): RetryPolicy {
  return {
    maxRetries: config.toolMaxRetries,
    initialDelayMs: config.toolBackoffInitialMs,
    backoffFactor: DEFAULT_RETRY_POLICY.backoffFactor,
    maxDelayMs: config.toolBackoffMaxMs,
  };
}

export type ExhaustedReason = "permanent" | "attempts" | "cancelled";

export type RetryState =
  | { kind: "attempting"; attempt: number; delayMs: number }
  | { kind: "backingOff"; attempt: number; delayMs: number; fault: ToolFault }
  | { kind: "succeeded"; attempt: number }
  | { kind: "exhausted"; attempt: number; reason: ExhaustedReason; fault: ToolFault | null };

export type RetryEvent =
  | { type: "succeeded" }
  | { type: "failed"; fault: ToolFault }
  | { type: "backoffElapsed" }
  | { type: "cancelled" };

export function initialRetryState(): RetryState {
  return { kind: "attempting", attempt: 1, delayMs: 0 };
}

export function isTerminal(state: RetryState): boolean {
  return state.kind === "succeeded" || state.kind === "exhausted";
}

/**
 * Delay before retry number `retryNumber` (1-based): initial * factor^(n-1),
 * raised to a server-provided Retry-After and capped at maxDelayMs.
 */
export function computeBackoffDelayMs(
  policy: RetryPolicy,
  retryNumber: number,
  retryAfterMs?: number,
): number {
  const exponent = Math.max(0, retryNumber - 1);
  const base = policy.initialDelayMs * policy.backoffFactor ** exponent;
  const wanted = retryAfterMs !== undefined && retryAfterMs > base ? retryAfterMs : base;
  return Math.min(wanted, policy.maxDelayMs);
}

export function nextRetryState(
  state: RetryState,
  event: RetryEvent,
  policy: RetryPolicy,
): RetryState {
  if (isTerminal(state)) {
    return state;
  }

  if (event.type === "cancelled") {
    return {
      kind: "exhausted",
      attempt: state.attempt,
      reason: "cancelled",
      fault: state.kind === "backingOff" ? state.fault : null,
    };
  }

  if (state.kind === "backingOff") {
    if (event.type !== "backoffElapsed") {
      throw new Error(`Unexpected retry event while backing off: ${event.type}`);
    }
    return { kind: "attempting", attempt: state.attempt + 1, delayMs: state.delayMs };
  }

  switch (event.type) {
    case "succeeded":
      return { kind: "succeeded", attempt: state.attempt };
    case "failed": {
      if (classifyFault(event.fault.code) === "permanent") {
        return { kind: "exhausted", attempt: state.attempt, reason: "permanent", fault: event.fault };
      }

      if (state.attempt > policy.maxRetries) {
        return { kind: "exhausted", attempt: state.attempt, reason: "attempts", fault: event.fault };
      }

      return {
        kind: "backingOff",
        attempt: state.attempt,
        delayMs: computeBackoffDelayMs(policy, state.attempt, event.fault.retryAfterMs),
        fault: event.fault,
      };
    }
    case "backoffElapsed":
      throw new Error("Unexpected retry event while attempting: backoffElapsed");
  }
}
