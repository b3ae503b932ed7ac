export const TOOL_NAMES = ["github", "weather", "wikipedia"] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export const PLAN_INTENTS = ["search", "compare", "summarize", "mixed"] as const;
export type PlanIntent = (typeof PLAN_INTENTS)[number];

export interface PlanStep {
  readonly stepNumber: number;
  readonly action: string;
  readonly tool: ToolName;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly expectedOutput: string;
  /** Failed critical steps make a result incomplete. Defaults to true. */
  readonly critical: boolean;
}

export interface Plan {
  readonly taskDescription: string;
  readonly intent: PlanIntent;
  readonly steps: readonly PlanStep[];
  readonly comparisonMode: boolean;
  readonly entities: readonly string[];
}

export type StepStatus = "success" | "failed" | "partial";

export interface StepResult {
  readonly stepNumber: number;
  readonly status: StepStatus;
  readonly data: unknown;
  readonly error: string | null;
  readonly executionTimeMs: number;
  readonly attempts: number;
}

export interface ExecutionResult {
  readonly success: boolean;
  readonly stepsCompleted: number;
  readonly stepsFailed: number;
  readonly results: readonly StepResult[];
  readonly executionLog: readonly string[];
}

export interface VerificationResult {
  readonly isComplete: boolean;
  readonly isCorrect: boolean;
  readonly confidenceScore: number;
  readonly issues: readonly string[];
  readonly formattedOutput: string;
  readonly summary: string;
  readonly recommendations: readonly string[];
}

export interface PipelineTimings {
  planningMs: number;
  executionMs: number;
  verificationMs: number;
  totalMs: number;
}

export interface PipelineResult {
  query: string;
  plan: Plan;
  execution: ExecutionResult;
  verification: VerificationResult;
  timings: PipelineTimings;
}
