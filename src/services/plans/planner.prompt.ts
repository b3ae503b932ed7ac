import type { ChatCompletionMessage } from "../llm/ai-gateway.client";
import type { ToolName } from "../../types/plan";
import type { ToolDefinition } from "../../types/tool";
import type { ComparisonHint } from "./comparison.detect";
import { formatIssues, type PlanValidationIssue } from "./plan.validate";

function describeTool(tool: ToolDefinition, index: number): string {
  const required = Object.entries(tool.requiredParameters)
    .map(([name, description]) => `    * ${name} (required): ${description}`);
  const optional = Object.entries(tool.optionalParameters)
    .map(([name, description]) => `    * ${name} (optional): ${description}`);

  const alternatives = (tool.alternativeParameters ?? [])
    .map((keys) => `    * Instead of the required parameters: ${keys.join(" + ")}`);

  return [
    `${index + 1}. tool "${tool.name}": ${tool.description}`,
    ...tool.capabilities.map((capability) => `  - ${capability}`),
    "  - Parameters:",
    ...required,
    ...optional,
    ...alternatives,
    `  - Example parameters: ${JSON.stringify(tool.example)}`,
  ].join("\n");
}

const EXAMPLE_COMPARISON_PLAN = {
  task_description: "Compare current weather between London and Tokyo",
  intent: "compare",
  steps: [
    {
      step_number: 1,
      action: "Fetch current weather for London",
      tool: "weather",
      parameters: { city: "London", units: "metric" },
      expected_output: "Weather data for London",
    },
    {
      step_number: 2,
      action: "Fetch current weather for Tokyo",
      tool: "weather",
      parameters: { city: "Tokyo", units: "metric" },
      expected_output: "Weather data for Tokyo",
    },
  ],
  comparison_mode: true,
  entities: ["London", "Tokyo"],
};

export function buildPlannerMessages(options: {
  query: string;
  hint: ComparisonHint;
  toolRegistry: Partial<Record<ToolName, ToolDefinition>>;
}): ChatCompletionMessage[] {
  const tools = Object.values(options.toolRegistry)
    .filter((tool): tool is ToolDefinition => tool !== undefined);

  const system = [
    "You are the task planner of an operations assistant.",
    "Turn the user query into one JSON object describing a step-by-step tool plan.",
    "Return only the JSON object. Do not include prose before or after it.",
    "",
    "Available tools:",
    ...tools.map((tool, index) => describeTool(tool, index)),
    "",
    "The JSON must include: task_description, intent, steps, comparison_mode, entities.",
    "intent is one of: search, compare, summarize, mixed.",
    "Each step must include: step_number, action, tool, parameters, expected_output.",
    "step_number starts at 1 and increases by 1 with no gaps.",
    "Only use the tools listed above and always pass their required parameters.",
    "A step may set \"critical\": false when the answer is still useful without it.",
    "When comparing entities (cities, repositories, topics) set comparison_mode to true,",
    "list every entity in entities and use one independent step per entity.",
    "To use the output of an earlier step N in a parameter write {{step:N}} or {{step:N.field}}.",
    "",
    "Example for \"Compare weather in London and Tokyo\":",
    JSON.stringify(EXAMPLE_COMPARISON_PLAN),
  ].join("\n");

  const hintLine = options.hint.isComparison
    ? `Comparison cues detected (${options.hint.cues.join(", ")})`
      + (options.hint.entities.length > 0
        ? `; possible entities: ${options.hint.entities.join(", ")}.`
        : ".")
    : "No comparison cues detected.";

  const user = [
    `Query: ${options.query}`,
    `Hint: ${hintLine} Decide from the query itself; the hint may be wrong.`,
    "Create the execution plan.",
  ].join("\n");

  return [
    {
      role: "system",
      content: system,
    },
    {
      role: "user",
      content: user,
    },
  ];
}

export function buildRepairMessages(options: {
  previous: ChatCompletionMessage[];
  rejectedOutput: string;
  issues: readonly PlanValidationIssue[];
}): ChatCompletionMessage[] {
  const feedback = [
    "That plan was rejected. Fix every problem below and return the corrected JSON object only.",
    ...formatIssues(options.issues).map((line) => `- ${line}`),
  ].join("\n");

  return [
    ...options.previous,
    {
      role: "assistant",
      content: options.rejectedOutput,
    },
    {
      role: "user",
      content: feedback,
    },
  ];
}
