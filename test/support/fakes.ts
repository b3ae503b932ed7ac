import {
  LlmError,
  completeJsonWith,
  type ChatCompletionRequest,
  type ChatCompletionResult,
  type JsonCompletionResult,
  type LlmClient,
} from "../../src/services/llm/ai-gateway.client";
import { getConfig, type AppConfig } from "../../src/config";
import type { FetchLike } from "../../src/services/tools/tool.http";
import type { Plan, PlanStep } from "../../src/types/plan";
import { createSilentLogger, type LoggerLike } from "../../src/utils/logger";

export type ScriptEntry = string | Record<string, unknown> | Error;

/** Replays canned model replies in order; records every request. */
export class ScriptedLlmClient implements LlmClient {
  readonly requests: ChatCompletionRequest[] = [];

  constructor(private readonly script: ScriptEntry[]) {}

  async completeText(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    this.requests.push(request);
    const next = this.script.shift();
    if (next === undefined) {
      throw new LlmError("LLM_UNAVAILABLE", "script exhausted");
    }
    if (next instanceof Error) {
      throw next;
    }

    return {
      content: typeof next === "string" ? next : JSON.stringify(next),
      model: request.model,
      usageTokens: 42,
    };
  }

  completeJson(request: ChatCompletionRequest): Promise<JsonCompletionResult> {
    return completeJsonWith((next) => this.completeText(next), request);
  }
}

export interface RecordedRequest {
  url: URL;
  headers: Headers;
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json",
      ...headers,
    },
  });
}

export function stubFetch(
  handler: (url: URL) => Response | Promise<Response>,
): { fetchImpl: FetchLike; calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(input);
    calls.push({ url, headers: new Headers(init?.headers) });
    return handler(url);
  };

  return { fetchImpl, calls };
}

export function silentLogger(): LoggerLike {
  return createSilentLogger();
}

export function instantSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

export function weatherStep(stepNumber: number, city: string, overrides: Partial<PlanStep> = {}): PlanStep {
  return {
    stepNumber,
    action: `Fetch current weather for ${city}`,
    tool: "weather",
    parameters: { city, units: "metric" },
    expectedOutput: `Weather data for ${city}`,
    critical: true,
    ...overrides,
  };
}

export function weatherComparisonPlan(cities: string[]): Plan {
  return {
    taskDescription: `Compare current weather in ${cities.join(", ")}`,
    intent: "compare",
    steps: cities.map((city, index) => weatherStep(index + 1, city)),
    comparisonMode: true,
    entities: cities,
  };
}

export function weatherReport(city: string, temperature: number): Record<string, unknown> {
  return {
    city,
    country: "GB",
    temperature,
    temperature_unit: "°C",
    feels_like: temperature,
    conditions: "Clear sky",
    humidity: 50,
    wind_speed: 3,
    wind_speed_unit: "m/s",
    pressure: 1012,
    cloudiness: 0,
    timestamp: 1700000000,
    units: "metric",
  };
}

/** Model reply for a valid weather comparison plan over the given cities. */
export function comparisonPlanReply(cities: string[]): Record<string, unknown> {
  return {
    task_description: `Compare current weather in ${cities.join(", ")}`,
    intent: "compare",
    steps: cities.map((city, index) => ({
      step_number: index + 1,
      action: `Fetch current weather for ${city}`,
      tool: "weather",
      parameters: { city, units: "metric" },
      expected_output: `Weather data for ${city}`,
    })),
    comparison_mode: true,
    entities: cities,
  };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...getConfig(),
    aiGatewayApiKey: "test-secret",
    openweatherApiKey: "test-secret",
    plannerModel: "planner-model",
    verifierModel: "verifier-model",
    planRepairAttempts: 1,
    toolMaxRetries: 3,
    toolBackoffInitialMs: 1000,
    toolBackoffMaxMs: 60000,
    executorMaxConcurrency: 4,
    queryMaxChars: 1000,
    pipelineTimeoutMs: 120000,
    ...overrides,
  };
}
