import type {
  ExecutionResult,
  PipelineResult,
  Plan,
  VerificationResult,
} from "../../types/plan";

export function toApiPlan(plan: Plan): Record<string, unknown> {
  return {
    task_description: plan.taskDescription,
    intent: plan.intent,
    comparison_mode: plan.comparisonMode,
    entities: plan.entities,
    steps: plan.steps.map((step) => ({
      step_number: step.stepNumber,
      action: step.action,
      tool: step.tool,
      parameters: step.parameters,
      expected_output: step.expectedOutput,
      critical: step.critical,
    })),
  };
}

export function toApiExecution(execution: ExecutionResult): Record<string, unknown> {
  return {
    success: execution.success,
    steps_completed: execution.stepsCompleted,
    steps_failed: execution.stepsFailed,
    results: execution.results.map((result) => ({
      step_number: result.stepNumber,
      status: result.status,
      data: result.data,
      error: result.error,
      execution_time_ms: result.executionTimeMs,
      attempts: result.attempts,
    })),
    execution_log: execution.executionLog,
  };
}

export function toApiVerification(verification: VerificationResult): Record<string, unknown> {
  return {
    is_complete: verification.isComplete,
    is_correct: verification.isCorrect,
    confidence_score: verification.confidenceScore,
    issues: verification.issues,
    formatted_output: verification.formattedOutput,
    summary: verification.summary,
    recommendations: verification.recommendations,
  };
}

export function toApiResult(result: PipelineResult): Record<string, unknown> {
  return {
    query: result.query,
    plan: toApiPlan(result.plan),
    execution: toApiExecution(result.execution),
    verification: toApiVerification(result.verification),
    timings: {
      planning_ms: result.timings.planningMs,
      execution_ms: result.timings.executionMs,
      verification_ms: result.timings.verificationMs,
      total_ms: result.timings.totalMs,
    },
  };
}
