import type { PlanStep, StepResult } from "../../types/plan";
import type { ToolInvoker, ToolSet } from "../../types/tool";
import { abortable, sleep as defaultSleep } from "../../utils/abort";
import type { LoggerLike } from "../../utils/logger";
import { PartialResult, toToolFault } from "../tools/tool.fault";
import {
  initialRetryState,
  isTerminal,
  nextRetryState,
  type RetryPolicy,
  type RetryState,
} from "./retry.policy";

export interface StepExecutorOptions {
  tools: Partial<ToolSet>;
  policy: RetryPolicy;
  logger: LoggerLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export interface ExecuteStepOptions {
  signal?: AbortSignal;
  /** Parameters with step references already resolved; defaults to step.parameters. */
  parameters?: Readonly<Record<string, unknown>>;
}

export interface StepRunner {
  executeStep(step: PlanStep, options?: ExecuteStepOptions): Promise<StepResult>;
}

export function failedStepResult(
  stepNumber: number,
  error: string,
  executionTimeMs = 0,
  attempts = 0,
): StepResult {
  return {
    stepNumber,
    status: "failed",
    data: null,
    error,
    executionTimeMs,
    attempts,
  };
}

/**
 * Runs one plan step against its tool, driving the retry state machine.
 * Tool faults never escape: every outcome becomes a StepResult.
 */
export class StepExecutor implements StepRunner {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: StepExecutorOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async executeStep(step: PlanStep, options: ExecuteStepOptions = {}): Promise<StepResult> {
    const startedAt = this.now();
    const elapsed = () => Math.max(0, this.now() - startedAt);
    const tool = this.options.tools[step.tool];
    if (!tool) {
      return failedStepResult(
        step.stepNumber,
        `STEP_UNEXPECTED_ERROR: no tool is registered for ${step.tool}`,
        elapsed(),
      );
    }

    try {
      return await this.runAttempts(step, tool, options, elapsed);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.options.logger.error({ step_number: step.stepNumber, tool: step.tool, error: message }, "step crashed");
      return failedStepResult(step.stepNumber, `STEP_UNEXPECTED_ERROR: ${message}`, elapsed());
    }
  }

  private async runAttempts(
    step: PlanStep,
    tool: ToolInvoker,
    options: ExecuteStepOptions,
    elapsed: () => number,
  ): Promise<StepResult> {
    const { signal } = options;
    const parameters = options.parameters ?? step.parameters;
    const log = this.options.logger;
    let state: RetryState = initialRetryState();
    let output: unknown = null;
    let attempts = 0;

    while (!isTerminal(state)) {
      if (signal?.aborted) {
        state = nextRetryState(state, { type: "cancelled" }, this.options.policy);
        continue;
      }

      if (state.kind === "attempting") {
        attempts += 1;
        log.info(
          {
            step_number: step.stepNumber,
            tool: step.tool,
            attempt: state.attempt,
            retry: state.attempt - 1,
            delay_ms: state.delayMs,
          },
          "step attempt",
        );

        try {
          output = await abortable(tool.invoke({ ...parameters }, { signal }), signal);
          state = nextRetryState(state, { type: "succeeded" }, this.options.policy);
        } catch (error) {
          if (signal?.aborted) {
            state = nextRetryState(state, { type: "cancelled" }, this.options.policy);
            continue;
          }

          const fault = toToolFault(error);
          log.warn(
            {
              step_number: step.stepNumber,
              tool: step.tool,
              attempt: state.attempt,
              code: fault.code,
              error: fault.message,
            },
            "step attempt failed",
          );
          state = nextRetryState(state, { type: "failed", fault }, this.options.policy);
        }
        continue;
      }

      if (state.kind === "backingOff") {
        try {
          await this.sleep(state.delayMs, signal);
        } catch (error) {
          if (!signal?.aborted) {
            throw error;
          }
        }
        state = nextRetryState(
          state,
          signal?.aborted ? { type: "cancelled" } : { type: "backoffElapsed" },
          this.options.policy,
        );
      }
    }

    return this.toStepResult(step, state, output, attempts, elapsed());
  }

  private toStepResult(
    step: PlanStep,
    state: RetryState,
    output: unknown,
    attempts: number,
    executionTimeMs: number,
  ): StepResult {
    const base = { stepNumber: step.stepNumber, executionTimeMs, attempts };

    if (state.kind === "succeeded") {
      if (output instanceof PartialResult) {
        this.options.logger.info(
          { step_number: step.stepNumber, tool: step.tool, attempts, reason: output.reason },
          "step completed partially",
        );
        return { ...base, status: "partial", data: output.data, error: output.reason };
      }

      this.options.logger.info(
        { step_number: step.stepNumber, tool: step.tool, attempts, execution_time_ms: executionTimeMs },
        "step completed",
      );
      return { ...base, status: "success", data: output, error: null };
    }

    const error = state.kind === "exhausted" && state.reason !== "cancelled" && state.fault
      ? `${state.fault.code}: ${state.fault.message}`
      : `STEP_CANCELLED: step ${step.stepNumber} was cancelled`;

    this.options.logger.warn(
      {
        step_number: step.stepNumber,
        tool: step.tool,
        attempts,
        reason: state.kind === "exhausted" ? state.reason : state.kind,
        error,
      },
      "step failed",
    );
    return { ...base, status: "failed", data: null, error };
  }
}
