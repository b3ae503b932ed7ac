import type { ExecutionResult, Plan, PlanStep, StepResult, ToolName } from "../../types/plan";
import type { ToolDefinition } from "../../types/tool";
import type { LoggerLike } from "../../utils/logger";
import { isRecord } from "../../utils/values";
import { validatePlan, type PlanValidationIssue } from "../plans/plan.validate";
import {
  StepReferenceError,
  findStepDependencies,
  resolveStepParameters,
} from "../plans/step.references";
import { getToolRegistry } from "../plans/tool.registry";
import { failedStepResult, type StepRunner } from "./step.executor";

export class PlanPreconditionError extends Error {
  readonly code: PlanValidationIssue["code"];

  constructor(public readonly issue: PlanValidationIssue) {
    super(`Plan failed precondition check: ${issue.message}`);
    this.name = "PlanPreconditionError";
    this.code = issue.code;
  }
}

export interface PlanExecutorOptions {
  stepExecutor: StepRunner;
  maxConcurrency: number;
  logger: LoggerLike;
  toolRegistry?: Partial<Record<ToolName, ToolDefinition>>;
  now?: () => Date;
}

export function summarizeStepData(data: unknown): string {
  if (data === null || data === undefined) {
    return "No data";
  }

  if (Array.isArray(data)) {
    return `Retrieved ${data.length} items`;
  }

  if (isRecord(data)) {
    if (typeof data.city === "string") {
      return `Weather data for ${data.city}`;
    }
    if (typeof data.full_name === "string" || typeof data.name === "string") {
      return `Data for ${String(data.full_name ?? data.name)}`;
    }
    if (typeof data.title === "string") {
      return `Article: ${data.title}`;
    }
    return `Object with ${Object.keys(data).length} fields`;
  }

  return `Data: ${String(data).slice(0, 50)}`;
}

export function formatLogLine(timestamp: Date, result: StepResult): string {
  const prefix = `[${timestamp.toISOString()}] Step ${result.stepNumber}:`;
  switch (result.status) {
    case "success":
      return `${prefix} SUCCESS - ${summarizeStepData(result.data)}`;
    case "partial":
      return `${prefix} PARTIAL - ${summarizeStepData(result.data)} (${result.error ?? "incomplete"})`;
    case "failed":
      return `${prefix} FAILED - ${result.error ?? "unknown error"}`;
  }
}

/**
 * Schedules plan steps on a bounded pool. A step starts once every step it
 * depends on has a result; independent steps run concurrently. Results land
 * in a slot per step number and are read back in planned order.
 */
export class PlanExecutor {
  private readonly toolRegistry: Partial<Record<ToolName, ToolDefinition>>;
  private readonly now: () => Date;

  constructor(private readonly options: PlanExecutorOptions) {
    this.toolRegistry = options.toolRegistry ?? getToolRegistry();
    this.now = options.now ?? (() => new Date());
  }

  async execute(candidate: Plan, options: { signal?: AbortSignal } = {}): Promise<ExecutionResult> {
    // Runs the validator's frozen copy so tools never share values with the caller's plan.
    const { plan, issues } = validatePlan(candidate, { toolRegistry: this.toolRegistry, mode: "first" });
    if (!plan) {
      throw new PlanPreconditionError(issues[0]);
    }

    const { signal } = options;
    const log = this.options.logger;
    const maxConcurrency = Math.max(1, this.options.maxConcurrency);
    const slots: Array<StepResult | undefined> = plan.steps.map(() => undefined);
    const outputs = new Map<number, unknown>();
    const executionLog: string[] = [];
    const dependencies = new Map<number, number[]>(
      plan.steps.map((step) => [step.stepNumber, findStepDependencies(step, plan.steps)]),
    );
    const pending = new Set<number>(plan.steps.map((step) => step.stepNumber));
    const running = new Map<number, Promise<void>>();

    log.info(
      {
        steps: plan.steps.length,
        max_concurrency: maxConcurrency,
        dependencies: Object.fromEntries(dependencies),
      },
      "plan execution started",
    );

    const record = (result: StepResult) => {
      slots[result.stepNumber - 1] = result;
      if (result.status !== "failed") {
        outputs.set(result.stepNumber, result.data);
      }
      executionLog.push(formatLogLine(this.now(), result));
    };

    const run = async (step: PlanStep): Promise<void> => {
      let parameters: Record<string, unknown>;
      try {
        parameters = resolveStepParameters(step.parameters, outputs);
      } catch (error) {
        if (!(error instanceof StepReferenceError)) {
          throw error;
        }
        record(failedStepResult(step.stepNumber, `STEP_DEPENDENCY_FAILED: ${error.message}`));
        return;
      }

      try {
        record(await this.options.stepExecutor.executeStep(step, { signal, parameters }));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        record(failedStepResult(step.stepNumber, `STEP_UNEXPECTED_ERROR: ${message}`));
      }
    };

    for (;;) {
      if (signal?.aborted) {
        for (const stepNumber of pending) {
          record(failedStepResult(stepNumber, `STEP_CANCELLED: step ${stepNumber} was not started`));
        }
        pending.clear();
      }

      for (const step of plan.steps) {
        if (!pending.has(step.stepNumber)) {
          continue;
        }

        const upstream = (dependencies.get(step.stepNumber) ?? []).map((ref) => slots[ref - 1]);
        if (upstream.some((result) => result === undefined)) {
          continue;
        }

        const failed = upstream.find((result) => result?.status === "failed");
        if (failed) {
          pending.delete(step.stepNumber);
          record(failedStepResult(
            step.stepNumber,
            `STEP_DEPENDENCY_FAILED: step ${failed.stepNumber} failed`,
          ));
          continue;
        }

        if (running.size >= maxConcurrency) {
          continue;
        }

        pending.delete(step.stepNumber);
        running.set(
          step.stepNumber,
          run(step).finally(() => {
            running.delete(step.stepNumber);
          }),
        );
      }

      if (running.size === 0) {
        break;
      }
      await Promise.race(running.values());
    }

    const results = plan.steps.map((step, index) => slots[index]
      ?? failedStepResult(step.stepNumber, `STEP_UNEXPECTED_ERROR: step ${step.stepNumber} was never scheduled`));
    const stepsFailed = results.filter((result) => result.status === "failed").length;
    const execution: ExecutionResult = {
      success: stepsFailed === 0,
      stepsCompleted: results.length - stepsFailed,
      stepsFailed,
      results,
      executionLog,
    };

    log.info(
      {
        success: execution.success,
        steps_completed: execution.stepsCompleted,
        steps_failed: execution.stepsFailed,
        cancelled: signal?.aborted === true,
      },
      "plan execution finished",
    );

    return execution;
  }
}
