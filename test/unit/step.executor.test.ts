import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_RETRY_POLICY } from "../../src/services/execution/retry.policy";
import { StepExecutor } from "../../src/services/execution/step.executor";
import { ToolFault, partialResult } from "../../src/services/tools/tool.fault";
import type { ToolInvoker } from "../../src/types/tool";
import { silentLogger, weatherReport, weatherStep } from "../support/fakes";
import { createRecordingLogger } from "../support/recording-logger";

type Outcome = { ok: unknown } | { fault: ToolFault };

function scriptedTool(outcomes: Outcome[]): ToolInvoker & { calls: Record<string, unknown>[] } {
  const calls: Record<string, unknown>[] = [];
  return {
    calls,
    async invoke(parameters) {
      calls.push(parameters);
      const outcome = outcomes[Math.min(calls.length, outcomes.length) - 1];
      if ("fault" in outcome) {
        throw outcome.fault;
      }
      return outcome.ok;
    },
  };
}

function fakeClock() {
  let now = 0;
  const delays: number[] = [];
  return {
    delays,
    now: () => now,
    sleep: async (ms: number) => {
      delays.push(ms);
      now += ms;
    },
  };
}

const unavailable = new ToolFault("TRANSIENT_NETWORK", "HTTP 503: unavailable");

test("a step that fails transiently K times then succeeds reports success", async () => {
  const clock = fakeClock();
  const tool = scriptedTool([
    { fault: unavailable },
    { fault: new ToolFault("RATE_LIMITED", "HTTP 429: slow down") },
    { ok: weatherReport("London", 11) },
  ]);
  const executor = new StepExecutor({
    tools: { weather: tool },
    policy: DEFAULT_RETRY_POLICY,
    logger: silentLogger(),
    sleep: clock.sleep,
    now: clock.now,
  });

  const result = await executor.executeStep(weatherStep(1, "London"));

  assert.equal(result.status, "success");
  assert.equal(result.error, null);
  assert.deepEqual(result.data, weatherReport("London", 11));
  assert.equal(result.attempts, 3);
  assert.equal(tool.calls.length, 3);
  assert.deepEqual(clock.delays, [1000, 2000]);
  assert.equal(result.executionTimeMs, 3000);
});

test("a step failing transiently on every attempt makes exactly maxRetries + 1 calls", async () => {
  const clock = fakeClock();
  const tool = scriptedTool([{ fault: unavailable }]);
  const executor = new StepExecutor({
    tools: { weather: tool },
    policy: DEFAULT_RETRY_POLICY,
    logger: silentLogger(),
    sleep: clock.sleep,
    now: clock.now,
  });

  const result = await executor.executeStep(weatherStep(1, "London"));

  assert.equal(result.status, "failed");
  assert.equal(result.data, null);
  assert.equal(result.error, "TRANSIENT_NETWORK: HTTP 503: unavailable");
  assert.equal(tool.calls.length, DEFAULT_RETRY_POLICY.maxRetries + 1);
  assert.equal(result.attempts, 4);
  assert.deepEqual(clock.delays, [1000, 2000, 4000]);
  assert.equal(result.executionTimeMs, 7000);
});

test("permanent faults fail immediately with the fault code", async () => {
  const clock = fakeClock();
  const tool = scriptedTool([{ fault: new ToolFault("UNAUTHORIZED", "HTTP 401: invalid key") }]);
  const executor = new StepExecutor({
    tools: { weather: tool },
    policy: DEFAULT_RETRY_POLICY,
    logger: silentLogger(),
    sleep: clock.sleep,
    now: clock.now,
  });

  const result = await executor.executeStep(weatherStep(2, "Paris"));

  assert.deepEqual(result, {
    stepNumber: 2,
    status: "failed",
    data: null,
    error: "UNAUTHORIZED: HTTP 401: invalid key",
    executionTimeMs: 0,
    attempts: 1,
  });
  assert.deepEqual(clock.delays, []);
});

test("partial tool results become partial steps", async () => {
  const tool = scriptedTool([{ ok: partialResult([{ name: "repo" }], "GitHub reported incomplete search results") }]);
  const executor = new StepExecutor({
    tools: { github: tool },
    policy: DEFAULT_RETRY_POLICY,
    logger: silentLogger(),
  });

  const result = await executor.executeStep({
    stepNumber: 1,
    action: "Search repositories",
    tool: "github",
    parameters: { query: "graph database" },
    expectedOutput: "Repositories",
    critical: true,
  });

  assert.equal(result.status, "partial");
  assert.deepEqual(result.data, [{ name: "repo" }]);
  assert.equal(result.error, "GitHub reported incomplete search results");
});

test("resolved parameters are passed to the tool instead of the planned ones", async () => {
  const tool = scriptedTool([{ ok: weatherReport("Rome", 20) }]);
  const executor = new StepExecutor({
    tools: { weather: tool },
    policy: DEFAULT_RETRY_POLICY,
    logger: silentLogger(),
  });

  await executor.executeStep(
    weatherStep(2, "{{step:1.city}}"),
    { parameters: { city: "Rome", units: "metric" } },
  );
  assert.deepEqual(tool.calls, [{ city: "Rome", units: "metric" }]);
});

test("each attempt logs its retry number and delay", async () => {
  const clock = fakeClock();
  const logger = createRecordingLogger();
  const executor = new StepExecutor({
    tools: { weather: scriptedTool([{ fault: unavailable }, { ok: weatherReport("Oslo", 2) }]) },
    policy: DEFAULT_RETRY_POLICY,
    logger,
    sleep: clock.sleep,
    now: clock.now,
  });

  await executor.executeStep(weatherStep(1, "Oslo"));

  const attempts = logger.entries
    .filter((entry) => entry.message === "step attempt")
    .map((entry) => entry.payload);
  assert.deepEqual(attempts, [
    { step_number: 1, tool: "weather", attempt: 1, retry: 0, delay_ms: 0 },
    { step_number: 1, tool: "weather", attempt: 2, retry: 1, delay_ms: 1000 },
  ]);
});

test("cancellation abandons an in-flight call", async () => {
  const controller = new AbortController();
  let calls = 0;
  const hangingTool: ToolInvoker = {
    invoke: () => {
      calls += 1;
      return new Promise(() => undefined);
    },
  };
  const executor = new StepExecutor({
    tools: { weather: hangingTool },
    policy: DEFAULT_RETRY_POLICY,
    logger: silentLogger(),
  });

  const pending = executor.executeStep(weatherStep(1, "London"), { signal: controller.signal });
  controller.abort();
  const result = await pending;

  assert.equal(calls, 1);
  assert.equal(result.status, "failed");
  assert.equal(result.error, "STEP_CANCELLED: step 1 was cancelled");
});

test("cancellation during backoff stops further attempts", async () => {
  const controller = new AbortController();
  const tool = scriptedTool([{ fault: unavailable }, { ok: weatherReport("London", 9) }]);
  const executor = new StepExecutor({
    tools: { weather: tool },
    policy: DEFAULT_RETRY_POLICY,
    logger: silentLogger(),
    sleep: async () => {
      controller.abort();
    },
  });

  const result = await executor.executeStep(weatherStep(1, "London"), { signal: controller.signal });

  assert.equal(tool.calls.length, 1);
  assert.equal(result.error, "STEP_CANCELLED: step 1 was cancelled");
  assert.equal(result.attempts, 1);
});

test("a step naming a tool with no implementation fails without throwing", async () => {
  const executor = new StepExecutor({ tools: {}, policy: DEFAULT_RETRY_POLICY, logger: silentLogger() });

  const result = await executor.executeStep(weatherStep(1, "London"));
  assert.equal(result.status, "failed");
  assert.equal(result.error, "STEP_UNEXPECTED_ERROR: no tool is registered for weather");
});
