import assert from "node:assert/strict";
import test from "node:test";
import {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelayMs,
  initialRetryState,
  nextRetryState,
  type RetryPolicy,
} from "../../src/services/execution/retry.policy";
import { ToolFault } from "../../src/services/tools/tool.fault";

const transient = new ToolFault("TRANSIENT_NETWORK", "HTTP 503: unavailable");
const permanent = new ToolFault("UNAUTHORIZED", "HTTP 401: invalid key");

test("backoff doubles from the initial delay", () => {
  assert.deepEqual(
    [1, 2, 3].map((retry) => computeBackoffDelayMs(DEFAULT_RETRY_POLICY, retry)),
    [1000, 2000, 4000],
  );
});

test("backoff honours a longer Retry-After and the cap", () => {
  assert.equal(computeBackoffDelayMs(DEFAULT_RETRY_POLICY, 1, 5000), 5000);
  assert.equal(computeBackoffDelayMs(DEFAULT_RETRY_POLICY, 2, 500), 2000);

  const capped: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxDelayMs: 3000 };
  assert.equal(computeBackoffDelayMs(capped, 3), 3000);
  assert.equal(computeBackoffDelayMs(capped, 1, 90000), 3000);
});

test("transient failures back off until retries run out", () => {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxRetries: 2 };
  let state = initialRetryState();
  const kinds: string[] = [state.kind];

  for (let round = 0; round < 3; round += 1) {
    state = nextRetryState(state, { type: "failed", fault: transient }, policy);
    kinds.push(state.kind);
    if (state.kind === "backingOff") {
      state = nextRetryState(state, { type: "backoffElapsed" }, policy);
      kinds.push(state.kind);
    }
  }

  assert.deepEqual(kinds, [
    "attempting",
    "backingOff",
    "attempting",
    "backingOff",
    "attempting",
    "exhausted",
  ]);
  assert.deepEqual(state, { kind: "exhausted", attempt: 3, reason: "attempts", fault: transient });
});

test("the first success ends the sequence", () => {
  let state = initialRetryState();
  state = nextRetryState(state, { type: "failed", fault: transient }, DEFAULT_RETRY_POLICY);
  assert.deepEqual(state, { kind: "backingOff", attempt: 1, delayMs: 1000, fault: transient });

  state = nextRetryState(state, { type: "backoffElapsed" }, DEFAULT_RETRY_POLICY);
  assert.deepEqual(state, { kind: "attempting", attempt: 2, delayMs: 1000 });

  state = nextRetryState(state, { type: "succeeded" }, DEFAULT_RETRY_POLICY);
  assert.deepEqual(state, { kind: "succeeded", attempt: 2 });

  assert.equal(nextRetryState(state, { type: "failed", fault: transient }, DEFAULT_RETRY_POLICY), state);
});

test("permanent faults are not retried", () => {
  const state = nextRetryState(initialRetryState(), { type: "failed", fault: permanent }, DEFAULT_RETRY_POLICY);
  assert.deepEqual(state, { kind: "exhausted", attempt: 1, reason: "permanent", fault: permanent });
});

test("cancellation while backing off keeps the last fault", () => {
  const backingOff = nextRetryState(
    initialRetryState(),
    { type: "failed", fault: transient },
    DEFAULT_RETRY_POLICY,
  );
  const state = nextRetryState(backingOff, { type: "cancelled" }, DEFAULT_RETRY_POLICY);
  assert.deepEqual(state, { kind: "exhausted", attempt: 1, reason: "cancelled", fault: transient });
});
