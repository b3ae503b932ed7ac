import { randomUUID } from "node:crypto";
import type { AppConfig } from "../../config";
import type { PipelineResult } from "../../types/plan";
import type { ToolSet } from "../../types/tool";
import { CancelledError, abortable, clampTimerDelay } from "../../utils/abort";
import type { LoggerLike } from "../../utils/logger";
import { PlanExecutor, PlanPreconditionError } from "../execution/plan.executor";
import { retryPolicyFromConfig } from "../execution/retry.policy";
import { StepExecutor } from "../execution/step.executor";
import { AiGatewayClient, type LlmClient } from "../llm/ai-gateway.client";
import { PlanningError, Planner } from "../plans/planner";
import { getToolRegistry } from "../plans/tool.registry";
import { buildToolSet } from "../tools/toolset";
import type { FetchLike } from "../tools/tool.http";
import { Verifier } from "../verification/verifier";

export interface ProcessQueryOptions {
  signal?: AbortSignal;
  /** Overrides config.pipelineTimeoutMs for this invocation. */
  timeoutMs?: number;
}

export interface Pipeline {
  processQuery(query: string, options?: ProcessQueryOptions): Promise<PipelineResult>;
}

export interface PipelineOptions {
  config: AppConfig;
  llmClient: LlmClient;
  tools: Partial<ToolSet>;
  logger: LoggerLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export function checkQuery(query: unknown, maxChars: number): string {
  const text = typeof query === "string" ? query.trim() : "";
  if (!text) {
    throw new PlanningError("PLAN_QUERY_INVALID", "Query must not be empty");
  }

  if (text.length > maxChars) {
    throw new PlanningError(
      "PLAN_QUERY_INVALID",
      `Query is too long; keep it under ${maxChars} characters`,
    );
  }

  if (!/\p{L}/u.test(text)) {
    throw new PlanningError("PLAN_QUERY_INVALID", "Query must contain at least one letter");
  }

  return text;
}

/**
 * Wires planner, executors and verifier. Components are built per
 * invocation around a child logger bound to its invocation id.
 */
export function createPipeline(options: PipelineOptions): Pipeline {
  const { config } = options;
  const now = options.now ?? Date.now;
  const toolRegistry = getToolRegistry();

  return {
    async processQuery(query, callOptions = {}) {
      const text = checkQuery(query, config.queryMaxChars);
      const invocationId = randomUUID();
      const logger = options.logger.child({ invocationId });
      const startedAt = now();

      const controller = new AbortController();
      const timeoutMs = callOptions.timeoutMs ?? config.pipelineTimeoutMs;
      const timer = setTimeout(() => controller.abort(), clampTimerDelay(timeoutMs));
      const onExternalAbort = () => controller.abort();
      if (callOptions.signal?.aborted) {
        controller.abort();
      } else {
        callOptions.signal?.addEventListener("abort", onExternalAbort, { once: true });
      }
      const { signal } = controller;

      const planner = new Planner({
        llmClient: options.llmClient,
        model: config.plannerModel,
        maxTokens: config.plannerMaxTokens,
        repairAttempts: config.planRepairAttempts,
        toolRegistry,
        logger,
      });
      const stepExecutor = new StepExecutor({
        tools: options.tools,
        policy: retryPolicyFromConfig(config),
        logger,
        sleep: options.sleep,
        now,
      });
      const planExecutor = new PlanExecutor({
        stepExecutor,
        maxConcurrency: config.executorMaxConcurrency,
        toolRegistry,
        logger,
      });
      const verifier = new Verifier({
        llmClient: options.llmClient,
        model: config.verifierModel,
        maxTokens: config.verifierMaxTokens,
        logger,
      });

      logger.info({ query_chars: text.length, timeout_ms: timeoutMs }, "query received");

      try {
        const plan = await abortable(planner.createPlan(text, { signal }), signal).catch((error: unknown) => {
          if (error instanceof CancelledError) {
            throw new PlanningError("PLAN_CANCELLED", "Planning was cancelled before a plan was produced");
          }
          throw error;
        });
        const plannedAt = now();

        const execution = await planExecutor.execute(plan, { signal }).catch((error: unknown) => {
          if (error instanceof PlanPreconditionError) {
            throw new PlanningError("PLAN_VALIDATION_FAILED", error.message, [error.issue]);
          }
          throw error;
        });
        const executedAt = now();

        const verification = await verifier.verify(plan, execution, { signal });
        const finishedAt = now();

        const result: PipelineResult = {
          query: text,
          plan,
          execution,
          verification,
          timings: {
            planningMs: plannedAt - startedAt,
            executionMs: executedAt - plannedAt,
            verificationMs: finishedAt - executedAt,
            totalMs: finishedAt - startedAt,
          },
        };

        logger.info(
          {
            success: execution.success,
            is_complete: verification.isComplete,
            total_ms: result.timings.totalMs,
          },
          "query processed",
        );
        return result;
      } catch (error) {
        if (error instanceof PlanningError) {
          logger.warn({ code: error.code, attempts: error.attempts, error: error.message }, "query failed");
        }
        throw error;
      } finally {
        clearTimeout(timer);
        callOptions.signal?.removeEventListener("abort", onExternalAbort);
      }
    },
  };
}

export function createPipelineFromConfig(
  config: AppConfig,
  logger: LoggerLike,
  fetchImpl?: FetchLike,
): Pipeline {
  return createPipeline({
    config,
    logger,
    llmClient: new AiGatewayClient({
      apiKey: config.aiGatewayApiKey,
      baseUrl: config.aiGatewayBaseUrl,
      timeoutMs: config.llmTimeoutMs,
      maxRetries: config.llmMaxRetries,
    }),
    tools: buildToolSet(config, fetchImpl),
  });
}
