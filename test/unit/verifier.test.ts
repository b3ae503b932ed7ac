import assert from "node:assert/strict";
import test from "node:test";
import { LlmError } from "../../src/services/llm/ai-gateway.client";
import { detectAnomalies } from "../../src/services/verification/anomaly";
import { formatFallbackReport } from "../../src/services/verification/result.format";
import { Verifier, checkCompleteness } from "../../src/services/verification/verifier";
import type { ExecutionResult, Plan, StepResult } from "../../src/types/plan";
import { ScriptedLlmClient, silentLogger, weatherComparisonPlan, weatherReport, weatherStep } from "../support/fakes";

const RULE = "=".repeat(60);

function success(stepNumber: number, data: unknown): StepResult {
  return { stepNumber, status: "success", data, error: null, executionTimeMs: 5, attempts: 1 };
}

function failure(stepNumber: number, error: string): StepResult {
  return { stepNumber, status: "failed", data: null, error, executionTimeMs: 5, attempts: 1 };
}

function executionOf(results: StepResult[]): ExecutionResult {
  const stepsFailed = results.filter((result) => result.status === "failed").length;
  return {
    success: stepsFailed === 0,
    stepsCompleted: results.length - stepsFailed,
    stepsFailed,
    results,
    executionLog: [],
  };
}

function verifier(llmClient: ScriptedLlmClient | null): Verifier {
  return new Verifier({ llmClient, model: "verifier-model", maxTokens: 500, logger: silentLogger() });
}

const threeCities = weatherComparisonPlan(["London", "Paris", "Berlin"]);
const parisUnauthorized = executionOf([
  success(1, weatherReport("London", 11)),
  failure(2, "UNAUTHORIZED: HTTP 401: invalid key"),
  success(3, weatherReport("Berlin", 9)),
]);

test("a failed critical step makes the result incomplete with exactly one issue", async () => {
  const result = await verifier(null).verify(threeCities, parisUnauthorized);

  assert.equal(result.isComplete, false);
  assert.equal(result.isCorrect, false);
  assert.deepEqual(result.issues, ["Step 2 (weather) failed: UNAUTHORIZED: HTTP 401: invalid key"]);
});

test("without a model client the verifier degrades to the deterministic report", async () => {
  const result = await verifier(null).verify(threeCities, parisUnauthorized);

  assert.equal(result.confidenceScore, 0.5);
  assert.equal(result.summary, "Completed 2 of 3 steps; quality assessment skipped");
  assert.deepEqual(result.recommendations, [
    "Quality assessment was skipped (no model client configured); review the results manually.",
  ]);
  assert.equal(result.formattedOutput, [
    RULE,
    "EXECUTION RESULTS",
    RULE,
    "Task: Compare current weather in London, Paris, Berlin",
    "Overall Status: FAILED",
    "Steps Completed: 2",
    "Steps Failed: 1",
    "",
    "Step 1 (weather): SUCCESS",
    "  Data: London (11°C, Clear sky)",
    "",
    "Step 2 (weather): FAILED",
    "  Error: UNAUTHORIZED: HTTP 401: invalid key",
    "",
    "Step 3 (weather): SUCCESS",
    "  Data: Berlin (9°C, Clear sky)",
    "",
    RULE,
  ].join("\n"));
});

test("a failing model call degrades with the failure as the reason", async () => {
  const client = new ScriptedLlmClient([new LlmError("LLM_TIMEOUT", "model timed out")]);
  const plan = weatherComparisonPlan(["Oslo", "Bergen"]);
  const execution = executionOf([success(1, weatherReport("Oslo", 3)), success(2, weatherReport("Bergen", 6))]);

  const result = await verifier(client).verify(plan, execution);

  assert.equal(client.requests.length, 1);
  assert.equal(result.isComplete, true);
  assert.equal(result.isCorrect, true);
  assert.equal(result.confidenceScore, 0.5);
  assert.deepEqual(result.issues, []);
  assert.deepEqual(result.recommendations, [
    "Quality assessment was skipped (LLM_TIMEOUT: model timed out); review the results manually.",
  ]);
});

test("an unparseable assessment also degrades", async () => {
  const client = new ScriptedLlmClient(["The results look fine to me."]);
  const plan = weatherComparisonPlan(["Oslo", "Bergen"]);
  const execution = executionOf([success(1, weatherReport("Oslo", 3)), success(2, weatherReport("Bergen", 6))]);

  const result = await verifier(client).verify(plan, execution);

  assert.equal(result.confidenceScore, 0.5);
  assert.equal(result.summary, "Completed 2 of 2 steps; quality assessment skipped");
  assert.equal(result.recommendations.length, 1);
  assert.match(result.recommendations[0], /^Quality assessment was skipped \(LLM_MALFORMED_OUTPUT: /);
});

test("a cancelled invocation skips the model call", async () => {
  const client = new ScriptedLlmClient([{ is_correct: true }]);
  const controller = new AbortController();
  controller.abort();

  const result = await verifier(client).verify(threeCities, parisUnauthorized, { signal: controller.signal });

  assert.equal(client.requests.length, 0);
  assert.deepEqual(result.recommendations, [
    "Quality assessment was skipped (invocation was cancelled); review the results manually.",
  ]);
});

test("uses the model assessment and clamps its confidence", async () => {
  const client = new ScriptedLlmClient([{
    formatted_output: "London 11°C, Paris 14°C",
    summary: "Compared two cities",
    issues: ["Paris reading is an hour old"],
    recommendations: ["Refresh the Paris reading"],
    confidence_score: 1.7,
    is_correct: true,
  }]);
  const plan = weatherComparisonPlan(["London", "Paris"]);
  const execution = executionOf([success(1, weatherReport("London", 11)), success(2, weatherReport("Paris", 14))]);

  const result = await verifier(client).verify(plan, execution);

  assert.equal(client.requests[0].model, "verifier-model");
  assert.deepEqual(result, {
    isComplete: true,
    isCorrect: true,
    confidenceScore: 1,
    issues: ["Paris reading is an hour old"],
    formattedOutput: "London 11°C, Paris 14°C",
    summary: "Compared two cities",
    recommendations: ["Refresh the Paris reading"],
  });
});

test("the model cannot mark an incomplete result as correct", async () => {
  const client = new ScriptedLlmClient([{ confidence_score: "high", is_correct: true }]);

  const result = await verifier(client).verify(threeCities, parisUnauthorized);

  assert.equal(result.isComplete, false);
  assert.equal(result.isCorrect, false);
  assert.equal(result.confidenceScore, 0.5);
  assert.deepEqual(result.issues, ["Step 2 (weather) failed: UNAUTHORIZED: HTTP 401: invalid key"]);
  assert.equal(result.summary, "Completed 2 of 3 steps");
  assert.equal(result.formattedOutput, formatFallbackReport(threeCities, parisUnauthorized));
});

test("anomalies make a complete result incorrect", async () => {
  const client = new ScriptedLlmClient([{ is_correct: true, confidence_score: 0.9 }]);
  const plan = weatherComparisonPlan(["Kuwait City", "Doha"]);
  const execution = executionOf([
    success(1, weatherReport("Kuwait City", 75)),
    success(2, weatherReport("Doha", 41)),
  ]);

  const result = await verifier(client).verify(plan, execution);

  assert.equal(result.isComplete, true);
  assert.equal(result.isCorrect, false);
  assert.deepEqual(result.issues, ["Step 1: unusual temperature value 75°C"]);
});

test("failed non-critical steps are reported without making the result incomplete", () => {
  const plan: Plan = {
    ...weatherComparisonPlan(["Lisbon", "Porto"]),
    steps: [weatherStep(1, "Lisbon"), weatherStep(2, "Porto", { critical: false })],
  };
  const execution = executionOf([
    success(1, weatherReport("Lisbon", 18)),
    failure(2, "NOT_FOUND: city not found"),
  ]);

  assert.deepEqual(checkCompleteness(plan, execution), {
    isComplete: true,
    issues: ["Step 2 (weather) failed (non-critical): NOT_FOUND: city not found"],
  });
});

test("partial and missing results are reported", () => {
  const plan = weatherComparisonPlan(["Lisbon", "Porto"]);
  const execution = executionOf([
    { ...success(1, weatherReport("Lisbon", 18)), status: "partial", error: "wind data missing" },
  ]);

  assert.deepEqual(checkCompleteness(plan, execution), {
    isComplete: false,
    issues: [
      "Expected 2 step results but got 1",
      "Step 1 (weather) returned partial data: wind data missing",
      "Step 2 (weather) produced no result",
    ],
  });
});

test("anomaly detection converts units and skips failed steps", () => {
  const imperial = { ...weatherReport("Phoenix", 100), units: "imperial", temperature_unit: "°F" };
  const frozen = { ...weatherReport("Vostok", 150), units: "standard", temperature_unit: "K" };

  assert.deepEqual(
    detectAnomalies(executionOf([
      success(1, imperial),
      success(2, frozen),
      success(3, []),
      success(4, [{ full_name: "octo/cat", stars: -3 }]),
      failure(5, "NOT_FOUND: missing"),
    ])),
    [
      "Step 2: unusual temperature value 150K",
      "Step 3: empty result set returned",
      "Step 4: negative stars value -3",
    ],
  );
});

test("the fallback report shows at most three items of a list", () => {
  const plan: Plan = {
    taskDescription: "Find popular graph databases",
    intent: "search",
    steps: [{
      stepNumber: 1,
      action: "Search repositories",
      tool: "github",
      parameters: { query: "graph database" },
      expectedOutput: "Repository list",
      critical: true,
    }],
    comparisonMode: false,
    entities: [],
  };
  const repos = [
    { full_name: "acme/one", stars: 10 },
    { full_name: "acme/two", stars: 5 },
    { full_name: "acme/three" },
    { full_name: "acme/four", stars: 1 },
  ];

  assert.equal(formatFallbackReport(plan, executionOf([success(1, repos)])), [
    RULE,
    "EXECUTION RESULTS",
    RULE,
    "Task: Find popular graph databases",
    "Overall Status: SUCCESS",
    "Steps Completed: 1",
    "Steps Failed: 0",
    "",
    "Step 1 (github): SUCCESS",
    "  Data: 4 items (showing first 3): acme/one (10 stars); acme/two (5 stars); acme/three",
    "",
    RULE,
  ].join("\n"));
});
