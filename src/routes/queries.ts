import type { FastifyInstance } from "fastify";
import { getConfig, type AppConfig } from "../config";
import { createPipelineFromConfig, type Pipeline } from "../services/pipeline/pipeline";
import { toApiResult } from "../services/pipeline/result.api";
import { PlanningError, type PlanningErrorCode } from "../services/plans/planner";
import { formatIssues } from "../services/plans/plan.validate";
import { errorResponse, okResponse } from "../utils/http-envelope";
import { isRecord, toPositiveInt } from "../utils/values";

export interface QueriesRouteOptions {
  config?: AppConfig;
  pipeline?: Pipeline;
}

interface QueryPayload {
  query: string;
  timeoutMs?: number;
}

function parseQueryPayload(body: unknown): { value: QueryPayload | null; error?: string } {
  if (!isRecord(body)) {
    return { value: null, error: "Request body must be a JSON object" };
  }

  if (typeof body.query !== "string") {
    return { value: null, error: "query must be a string" };
  }

  if (body.timeout_ms !== undefined && toPositiveInt(body.timeout_ms, 0) === 0) {
    return { value: null, error: "timeout_ms must be a positive integer" };
  }

  return {
    value: {
      query: body.query,
      timeoutMs: body.timeout_ms === undefined ? undefined : toPositiveInt(body.timeout_ms, 0),
    },
  };
}

export function statusForPlanningError(code: PlanningErrorCode): number {
  switch (code) {
    case "PLAN_QUERY_INVALID":
    case "PLAN_VALIDATION_FAILED":
      return 422;
    case "PLAN_LLM_TIMEOUT":
      return 504;
    default:
      return 502;
  }
}

export async function queriesRoutes(app: FastifyInstance, options: QueriesRouteOptions) {
  const config = options.config ?? getConfig();
  const pipeline = options.pipeline ?? createPipelineFromConfig(config, app.log);

  app.post("/queries", async (request, reply) => {
    const validated = parseQueryPayload(request.body);
    if (!validated.value) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", validated.error ?? "Invalid payload"));
    }

    try {
      const result = await pipeline.processQuery(validated.value.query, {
        timeoutMs: validated.value.timeoutMs,
      });
      return reply.code(200).send(okResponse(toApiResult(result)));
    } catch (error) {
      if (error instanceof PlanningError) {
        request.log.warn({ code: error.code, attempts: error.attempts }, "query planning failed");
        return reply.code(statusForPlanningError(error.code)).send(
          errorResponse(error.code, error.message, {
            attempts: error.attempts,
            issues: formatIssues(error.issues),
          }),
        );
      }

      request.log.error({ error }, "query processing failed");
      return reply
        .code(500)
        .send(errorResponse("INTERNAL_ERROR", "Query processing failed"));
    }
  });
}
