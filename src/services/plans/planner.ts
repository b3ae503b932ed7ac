import { randomUUID } from "node:crypto";
import type { Plan, ToolName } from "../../types/plan";
import type { ToolDefinition } from "../../types/tool";
import type { LoggerLike } from "../../utils/logger";
import {
  LlmError,
  toLlmError,
  type ChatCompletionMessage,
  type LlmClient,
} from "../llm/ai-gateway.client";
import { detectComparison } from "./comparison.detect";
import { buildPlannerMessages, buildRepairMessages } from "./planner.prompt";
import { getToolRegistry } from "./tool.registry";
import { formatIssues, validatePlan, type PlanValidationIssue } from "./plan.validate";

export type PlanningErrorCode =
  | "PLAN_QUERY_INVALID"
  | "PLAN_LLM_FAILED"
  | "PLAN_LLM_TIMEOUT"
  | "PLAN_LLM_AUTH"
  | "PLAN_VALIDATION_FAILED"
  | "PLAN_CANCELLED";

export class PlanningError extends Error {
  constructor(
    public readonly code: PlanningErrorCode,
    message: string,
    public readonly issues: readonly PlanValidationIssue[] = [],
    public readonly attempts = 0,
  ) {
    super(message);
    this.name = "PlanningError";
  }
}

export interface PlannerOptions {
  llmClient: LlmClient;
  model: string;
  maxTokens: number;
  /** Re-prompts allowed after the first rejected plan. */
  repairAttempts: number;
  toolRegistry?: Partial<Record<ToolName, ToolDefinition>>;
  logger: LoggerLike;
}

function planningErrorFromLlm(error: LlmError, attempts: number): PlanningError {
  switch (error.code) {
    case "LLM_TIMEOUT":
      return new PlanningError("PLAN_LLM_TIMEOUT", error.message, [], attempts);
    case "LLM_AUTH":
      return new PlanningError("PLAN_LLM_AUTH", error.message, [], attempts);
    default:
      return new PlanningError("PLAN_LLM_FAILED", error.message, [], attempts);
  }
}

export class Planner {
  private readonly toolRegistry: Partial<Record<ToolName, ToolDefinition>>;

  constructor(private readonly options: PlannerOptions) {
    this.toolRegistry = options.toolRegistry ?? getToolRegistry();
  }

  async createPlan(query: string, options: { signal?: AbortSignal } = {}): Promise<Plan> {
    const text = String(query ?? "").trim();
    if (!text) {
      throw new PlanningError("PLAN_QUERY_INVALID", "Query must not be empty");
    }

    const hint = detectComparison(text);
    this.options.logger.debug(
      {
        is_comparison: hint.isComparison,
        cues: hint.cues,
        entities: hint.entities,
      },
      "planner.comparison_hint",
    );

    let messages: ChatCompletionMessage[] = buildPlannerMessages({
      query: text,
      hint,
      toolRegistry: this.toolRegistry,
    });
    let issues: PlanValidationIssue[] = [];
    const maxAttempts = Math.max(0, this.options.repairAttempts) + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (options.signal?.aborted) {
        throw new PlanningError("PLAN_CANCELLED", "Planning was cancelled", issues, attempt - 1);
      }

      let rawOutput: string;
      let candidate: unknown;
      try {
        const completion = await this.options.llmClient.completeJson({
          requestId: randomUUID(),
          model: this.options.model,
          messages,
          maxTokens: this.options.maxTokens,
        });
        rawOutput = completion.content;
        candidate = completion.value;
        this.options.logger.info(
          {
            attempt,
            model: completion.model,
            usage_tokens: completion.usageTokens,
            provider_request_id: completion.providerRequestId,
          },
          "planner.completion",
        );
      } catch (error) {
        const llmError = toLlmError(error);
        if (llmError.code !== "LLM_MALFORMED_OUTPUT") {
          this.options.logger.warn({ attempt, code: llmError.code, error: llmError.message }, "planner.llm_failed");
          throw planningErrorFromLlm(llmError, attempt);
        }

        rawOutput = llmError.rawOutput ?? "";
        candidate = undefined;
        issues = [
          {
            code: "PLAN_SCHEMA_INVALID",
            rule: "fields",
            message: `output must be a single JSON object (${llmError.message})`,
          },
        ];
      }

      if (candidate !== undefined) {
        const validation = validatePlan(candidate, {
          toolRegistry: this.toolRegistry,
          mode: "all",
        });

        if (validation.plan) {
          this.options.logger.info(
            {
              attempt,
              intent: validation.plan.intent,
              steps: validation.plan.steps.length,
              comparison_mode: validation.plan.comparisonMode,
            },
            "planner.plan_accepted",
          );
          return validation.plan;
        }

        issues = validation.issues;
      }

      this.options.logger.warn(
        { attempt, issues: formatIssues(issues) },
        "planner.plan_rejected",
      );

      if (attempt < maxAttempts) {
        messages = buildRepairMessages({
          previous: messages,
          rejectedOutput: rawOutput,
          issues,
        });
      }
    }

    throw new PlanningError(
      "PLAN_VALIDATION_FAILED",
      `Planner output failed validation after ${maxAttempts} attempt(s): ${formatIssues(issues).join("; ")}`,
      issues,
      maxAttempts,
    );
  }
}
