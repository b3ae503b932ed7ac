import { randomUUID } from "node:crypto";
import type { ExecutionResult, Plan, VerificationResult } from "../../types/plan";
import type { LoggerLike } from "../../utils/logger";
import { asNumber, asString, asStringArray } from "../../utils/values";
import { toLlmError, type ChatCompletionMessage, type LlmClient } from "../llm/ai-gateway.client";
import { detectAnomalies } from "./anomaly";
import { formatFallbackReport } from "./result.format";

const MAX_RESULTS_PROMPT_CHARS = 12000;
const DEGRADED_CONFIDENCE = 0.5;

export interface VerifierOptions {
  /** Null skips the quality assessment and always degrades. */
  llmClient: LlmClient | null;
  model: string;
  maxTokens: number;
  logger: LoggerLike;
}

interface CompletenessReport {
  isComplete: boolean;
  issues: string[];
}

export function checkCompleteness(plan: Plan, execution: ExecutionResult): CompletenessReport {
  const issues: string[] = [];
  let isComplete = execution.results.length === plan.steps.length;
  if (!isComplete) {
    issues.push(`Expected ${plan.steps.length} step results but got ${execution.results.length}`);
  }

  for (const step of plan.steps) {
    const result = execution.results.find((candidate) => candidate.stepNumber === step.stepNumber);
    const label = `Step ${step.stepNumber} (${step.tool})`;

    if (!result) {
      issues.push(`${label} produced no result`);
      isComplete = isComplete && !step.critical;
      continue;
    }

    if (result.status === "failed") {
      const error = result.error ?? "unknown error";
      if (step.critical) {
        isComplete = false;
        issues.push(`${label} failed: ${error}`);
      } else {
        issues.push(`${label} failed (non-critical): ${error}`);
      }
    } else if (result.status === "partial") {
      issues.push(`${label} returned partial data: ${result.error ?? "incomplete"}`);
    }
  }

  return { isComplete, issues };
}

function buildVerificationMessages(plan: Plan, execution: ExecutionResult): ChatCompletionMessage[] {
  const system = [
    "You are the verification stage of an operations assistant.",
    "Check that the execution results answer the planned task, flag anomalies",
    "(physically implausible values, contradictory fields, missing data) and",
    "present the results clearly for the user.",
    "Respond with one JSON object and nothing else:",
    JSON.stringify({
      formatted_output: "Readable presentation of the results",
      summary: "One or two sentences on what was accomplished",
      issues: ["Anomalies or problems found"],
      recommendations: ["Suggested follow-up actions"],
      confidence_score: 0.9,
      is_correct: true,
    }),
  ].join("\n");

  const planSummary = {
    task: plan.taskDescription,
    intent: plan.intent,
    comparison_mode: plan.comparisonMode,
    entities: plan.entities,
    steps: plan.steps.map((step) => ({
      step_number: step.stepNumber,
      action: step.action,
      tool: step.tool,
      expected_output: step.expectedOutput,
      critical: step.critical,
    })),
  };

  let results = JSON.stringify(
    {
      success: execution.success,
      steps_completed: execution.stepsCompleted,
      steps_failed: execution.stepsFailed,
      results: execution.results.map((result) => ({
        step_number: result.stepNumber,
        status: result.status,
        data: result.data,
        error: result.error,
      })),
    },
    null,
    2,
  );
  if (results.length > MAX_RESULTS_PROMPT_CHARS) {
    results = `${results.slice(0, MAX_RESULTS_PROMPT_CHARS)}\n... (truncated)`;
  }

  const user = [
    "PLAN:",
    JSON.stringify(planSummary, null, 2),
    "",
    "EXECUTION RESULTS:",
    results,
    "",
    "Verify these results.",
  ].join("\n");

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

function clampConfidence(value: unknown): number {
  const parsed = asNumber(value);
  if (parsed === null) {
    return DEGRADED_CONFIDENCE;
  }
  return Math.min(1, Math.max(0, parsed));
}

function mergeIssues(...groups: string[][]): string[] {
  return [...new Set(groups.flat())];
}

export class Verifier {
  constructor(private readonly options: VerifierOptions) {}

  async verify(
    plan: Plan,
    execution: ExecutionResult,
    options: { signal?: AbortSignal } = {},
  ): Promise<VerificationResult> {
    const completeness = checkCompleteness(plan, execution);
    const anomalies = detectAnomalies(execution);
    const deterministicIssues = mergeIssues(completeness.issues, anomalies);
    const log = this.options.logger;

    if (!this.options.llmClient) {
      return this.degraded(plan, execution, completeness, deterministicIssues, "no model client configured");
    }
    if (options.signal?.aborted) {
      return this.degraded(plan, execution, completeness, deterministicIssues, "invocation was cancelled");
    }

    try {
      const completion = await this.options.llmClient.completeJson({
        requestId: randomUUID(),
        model: this.options.model,
        messages: buildVerificationMessages(plan, execution),
        maxTokens: this.options.maxTokens,
      });
      const assessment = completion.value;
      const modelCorrect = typeof assessment.is_correct === "boolean" ? assessment.is_correct : true;

      const verification: VerificationResult = {
        isComplete: completeness.isComplete,
        isCorrect: completeness.isComplete && anomalies.length === 0 && modelCorrect,
        confidenceScore: clampConfidence(assessment.confidence_score),
        issues: mergeIssues(deterministicIssues, asStringArray(assessment.issues)),
        formattedOutput: asString(assessment.formatted_output) || formatFallbackReport(plan, execution),
        summary: asString(assessment.summary)
          || `Completed ${execution.stepsCompleted} of ${plan.steps.length} steps`,
        recommendations: asStringArray(assessment.recommendations),
      };

      log.info(
        {
          is_complete: verification.isComplete,
          is_correct: verification.isCorrect,
          confidence_score: verification.confidenceScore,
          issues: verification.issues.length,
          usage_tokens: completion.usageTokens,
        },
        "verification finished",
      );
      return verification;
    } catch (error) {
      const llmError = toLlmError(error);
      return this.degraded(
        plan,
        execution,
        completeness,
        deterministicIssues,
        `${llmError.code}: ${llmError.message}`,
      );
    }
  }

  private degraded(
    plan: Plan,
    execution: ExecutionResult,
    completeness: CompletenessReport,
    issues: string[],
    reason: string,
  ): VerificationResult {
    this.options.logger.warn(
      { reason, is_complete: completeness.isComplete, issues: issues.length },
      "verification degraded",
    );

    return {
      isComplete: completeness.isComplete,
      isCorrect: completeness.isComplete,
      confidenceScore: DEGRADED_CONFIDENCE,
      issues,
      formattedOutput: formatFallbackReport(plan, execution),
      summary: `Completed ${execution.stepsCompleted} of ${plan.steps.length} steps; quality assessment skipped`,
      recommendations: [
        `Quality assessment was skipped (${reason}); review the results manually.`,
      ],
    };
  }
}
