import {
  PLAN_INTENTS,
  type Plan,
  type PlanIntent,
  type PlanStep,
  type ToolName,
} from "../../types/plan";
import type { ToolDefinition } from "../../types/tool";
import { asString, isRecord } from "../../utils/values";
import { findPlaceholderReferences } from "./step.references";

export type PlanRule =
  | "fields"
  | "steps_non_empty"
  | "step_sequence"
  | "registered_tools"
  | "tool_parameters"
  | "comparison_entities";

export interface PlanValidationIssue {
  code:
    | "PLAN_SCHEMA_INVALID"
    | "PLAN_STEPS_EMPTY"
    | "PLAN_STEP_SEQUENCE_INVALID"
    | "PLAN_INVALID_TOOL"
    | "PLAN_MISSING_PARAMETER"
    | "PLAN_INVALID_REFERENCE"
    | "PLAN_ENTITIES_INSUFFICIENT";
  rule: PlanRule;
  message: string;
  stepNumber?: number;
}

/**
 * `all` reports every violated rule (used to feed errors back to the model);
 * `first` stops at the first violation (a cheap precondition check).
 */
export type PlanValidationMode = "all" | "first";

export interface ValidatePlanOptions {
  toolRegistry: Partial<Record<ToolName, ToolDefinition>>;
  mode?: PlanValidationMode;
}

export interface ValidatePlanResult {
  plan: Plan | null;
  issues: PlanValidationIssue[];
}

class FirstIssueReached extends Error {}

/**
 * What could be read from one step. Steps with missing fields still carry
 * their tool and parameters so later rules can check them.
 */
interface StepDraft {
  stepNumber: number;
  action: string;
  tool: string;
  parameters: Record<string, unknown> | null;
  expectedOutput: string;
  critical: boolean;
  complete: boolean;
}

function readField(record: Record<string, unknown>, snake: string, camel: string): unknown {
  return record[snake] !== undefined ? record[snake] : record[camel];
}

function isPlanIntent(value: unknown): value is PlanIntent {
  return typeof value === "string"
    && (PLAN_INTENTS as readonly string[]).includes(value);
}

function distinctEntities(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const seen = new Set<string>();
  const entities: string[] = [];
  for (const item of value) {
    const entity = asString(item);
    const key = entity.toLowerCase();
    if (entity && !seen.has(key)) {
      seen.add(key);
      entities.push(entity);
    }
  }

  return entities;
}

function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(frozenCopy));
  }

  if (isRecord(value)) {
    return frozenParameters(value);
  }

  return value;
}

function frozenParameters(parameters: Record<string, unknown>): Readonly<Record<string, unknown>> {
  return Object.freeze(Object.fromEntries(
    Object.entries(parameters).map(([key, value]) => [key, frozenCopy(value)]),
  ));
}

function freezePlan(plan: Plan): Plan {
  for (const step of plan.steps) {
    Object.freeze(step);
  }
  Object.freeze(plan.steps);
  Object.freeze(plan.entities);
  return Object.freeze(plan);
}

/**
 * Checks a candidate plan in rule order: fields, non-empty steps, contiguous
 * numbering, registered tools, tool parameters (and step references), then
 * comparison entities. Accepts snake_case model output and camelCase plans.
 */
export function validatePlan(candidate: unknown, options: ValidatePlanOptions): ValidatePlanResult {
  const mode = options.mode ?? "all";
  const issues: PlanValidationIssue[] = [];
  const report = (issue: PlanValidationIssue) => {
    issues.push(issue);
    if (mode === "first") {
      throw new FirstIssueReached();
    }
  };

  try {
    return checkPlan(candidate, options.toolRegistry, issues, report);
  } catch (error) {
    if (error instanceof FirstIssueReached) {
      return { plan: null, issues };
    }
    throw error;
  }
}

function checkPlan(
  candidate: unknown,
  toolRegistry: Partial<Record<ToolName, ToolDefinition>>,
  issues: PlanValidationIssue[],
  report: (issue: PlanValidationIssue) => void,
): ValidatePlanResult {
  if (!isRecord(candidate)) {
    report({ code: "PLAN_SCHEMA_INVALID", rule: "fields", message: "plan must be an object" });
    return { plan: null, issues };
  }

  // (a) top-level and per-step fields
  const taskDescription = asString(readField(candidate, "task_description", "taskDescription"));
  if (!taskDescription) {
    report({ code: "PLAN_SCHEMA_INVALID", rule: "fields", message: "task_description is required" });
  }

  const intent = candidate.intent;
  if (!isPlanIntent(intent)) {
    report({
      code: "PLAN_SCHEMA_INVALID",
      rule: "fields",
      message: `intent must be one of ${PLAN_INTENTS.join(", ")}`,
    });
  }

  const rawComparison = readField(candidate, "comparison_mode", "comparisonMode");
  if (rawComparison !== undefined && typeof rawComparison !== "boolean") {
    report({ code: "PLAN_SCHEMA_INVALID", rule: "fields", message: "comparison_mode must be a boolean" });
  }
  const comparisonMode = rawComparison === true;

  const rawEntities = candidate.entities;
  if (rawEntities !== undefined && rawEntities !== null && !Array.isArray(rawEntities)) {
    report({ code: "PLAN_SCHEMA_INVALID", rule: "fields", message: "entities must be an array" });
  }
  const entities = distinctEntities(rawEntities);

  if (!Array.isArray(candidate.steps)) {
    report({ code: "PLAN_SCHEMA_INVALID", rule: "fields", message: "steps must be an array" });
  }
  const rawSteps: unknown[] = Array.isArray(candidate.steps) ? candidate.steps : [];

  const drafts: StepDraft[] = [];
  rawSteps.forEach((rawStep, index) => {
    const position = index + 1;
    if (!isRecord(rawStep)) {
      report({
        code: "PLAN_SCHEMA_INVALID",
        rule: "fields",
        message: `step at position ${position} must be an object`,
      });
      return;
    }

    const stepNumber = readField(rawStep, "step_number", "stepNumber");
    const action = asString(rawStep.action);
    const tool = asString(rawStep.tool);
    const expectedOutput = asString(readField(rawStep, "expected_output", "expectedOutput"));
    const parameters = rawStep.parameters;
    const critical = rawStep.critical;

    const missing: string[] = [];
    const numbered = typeof stepNumber === "number" && Number.isInteger(stepNumber);
    if (!numbered) {
      missing.push("step_number (integer)");
    }
    if (!action) {
      missing.push("action");
    }
    if (!tool) {
      missing.push("tool");
    }
    if (!isRecord(parameters)) {
      missing.push("parameters (object)");
    }
    if (!expectedOutput) {
      missing.push("expected_output");
    }
    if (critical !== undefined && typeof critical !== "boolean") {
      missing.push("critical (boolean)");
    }

    if (missing.length > 0) {
      report({
        code: "PLAN_SCHEMA_INVALID",
        rule: "fields",
        message: `step at position ${position} is missing or mistyped: ${missing.join(", ")}`,
      });
    }

    drafts.push({
      stepNumber: typeof stepNumber === "number" && numbered ? stepNumber : position,
      action,
      tool,
      parameters: isRecord(parameters) ? parameters : null,
      expectedOutput,
      critical: critical !== false,
      complete: missing.length === 0,
    });
  });

  // (b) non-empty
  if (rawSteps.length === 0 && Array.isArray(candidate.steps)) {
    report({ code: "PLAN_STEPS_EMPTY", rule: "steps_non_empty", message: "steps must be a non-empty array" });
  }

  // (c) contiguous numbering from 1, judged on the steps that parsed
  rawSteps.forEach((rawStep, index) => {
    if (!isRecord(rawStep)) {
      return;
    }
    const stepNumber = readField(rawStep, "step_number", "stepNumber");
    if (typeof stepNumber === "number" && Number.isInteger(stepNumber) && stepNumber !== index + 1) {
      report({
        code: "PLAN_STEP_SEQUENCE_INVALID",
        rule: "step_sequence",
        message: `step at position ${index + 1} has step_number ${stepNumber}; expected ${index + 1}`,
        stepNumber,
      });
    }
  });

  // (d) registered tools; a step with no tool was already reported under (a)
  const known: Array<{ draft: StepDraft; definition: ToolDefinition }> = [];
  for (const draft of drafts) {
    if (!draft.tool) {
      continue;
    }

    const definition = isRegisteredTool(draft.tool, toolRegistry) ? toolRegistry[draft.tool] : undefined;
    if (!definition) {
      report({
        code: "PLAN_INVALID_TOOL",
        rule: "registered_tools",
        message: `step ${draft.stepNumber} uses unknown tool: ${draft.tool}`,
        stepNumber: draft.stepNumber,
      });
      continue;
    }

    known.push({ draft, definition });
  }

  // (e) required parameters per tool, and references to earlier steps only
  for (const { draft, definition } of known) {
    if (!draft.parameters) {
      continue;
    }

    for (const key of missingRequiredParameters(definition, draft.parameters)) {
      report({
        code: "PLAN_MISSING_PARAMETER",
        rule: "tool_parameters",
        message: `step ${draft.stepNumber} (${definition.name}) is missing required parameter: ${key}${describeAlternatives(definition)}`,
        stepNumber: draft.stepNumber,
      });
    }

    for (const ref of findPlaceholderReferences(draft.parameters)) {
      if (ref < 1 || ref >= draft.stepNumber) {
        report({
          code: "PLAN_INVALID_REFERENCE",
          rule: "tool_parameters",
          message: `step ${draft.stepNumber} references step ${ref}; only earlier steps can be referenced`,
          stepNumber: draft.stepNumber,
        });
      }
    }
  }

  // (f) comparisons need at least two distinct entities
  if ((intent === "compare" || comparisonMode) && entities.length < 2) {
    report({
      code: "PLAN_ENTITIES_INSUFFICIENT",
      rule: "comparison_entities",
      message: `comparison plans need at least 2 distinct entities; got ${entities.length}`,
    });
  }

  if (issues.length > 0 || !isPlanIntent(intent)) {
    return { plan: null, issues };
  }

  const steps: PlanStep[] = [];
  for (const { draft, definition } of known) {
    if (draft.complete && draft.parameters) {
      steps.push({
        stepNumber: draft.stepNumber,
        action: draft.action,
        tool: definition.name,
        parameters: frozenParameters(draft.parameters),
        expectedOutput: draft.expectedOutput,
        critical: draft.critical,
      });
    }
  }

  return {
    plan: freezePlan({
      taskDescription,
      intent,
      steps,
      comparisonMode,
      entities,
    }),
    issues,
  };
}

function isRegisteredTool(
  tool: string,
  toolRegistry: Partial<Record<ToolName, ToolDefinition>>,
): tool is ToolName {
  return Object.prototype.hasOwnProperty.call(toolRegistry, tool);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && !(typeof value === "string" && !value.trim());
}

/**
 * Required keys absent from the parameters. Empty when the required set, or
 * any one of the tool's alternative sets, is fully present.
 */
function missingRequiredParameters(
  definition: ToolDefinition,
  parameters: Record<string, unknown>,
): string[] {
  const missing = Object.keys(definition.requiredParameters).filter((key) => !isPresent(parameters[key]));
  if (missing.length === 0) {
    return [];
  }

  const alternatives = definition.alternativeParameters ?? [];
  return alternatives.some((keys) => keys.every((key) => isPresent(parameters[key]))) ? [] : missing;
}

function describeAlternatives(definition: ToolDefinition): string {
  const alternatives = definition.alternativeParameters ?? [];
  if (alternatives.length === 0) {
    return "";
  }

  return ` (or ${alternatives.map((keys) => keys.join(" + ")).join(", or ")})`;
}

export function formatIssues(issues: readonly PlanValidationIssue[]): string[] {
  return issues.map((issue) => `[${issue.rule}] ${issue.message}`);
}
