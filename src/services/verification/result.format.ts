import type { ExecutionResult, Plan } from "../../types/plan";
import { isRecord } from "../../utils/values";

const RULE = "=".repeat(60);

function formatItem(item: unknown): string {
  if (!isRecord(item)) {
    return String(item);
  }

  if (typeof item.city === "string") {
    const unit = typeof item.temperature_unit === "string" ? item.temperature_unit : "°C";
    const temperature = item.temperature ?? "N/A";
    const conditions = typeof item.conditions === "string" && item.conditions
      ? `, ${item.conditions}`
      : "";
    return `${item.city} (${String(temperature)}${unit}${conditions})`;
  }

  if (typeof item.full_name === "string" || typeof item.name === "string") {
    const name = String(item.full_name ?? item.name);
    return typeof item.stars === "number" ? `${name} (${item.stars} stars)` : name;
  }

  if (typeof item.title === "string") {
    return typeof item.extract === "string" && item.extract
      ? `${item.title}: ${item.extract}`
      : item.title;
  }

  return `Object with ${Object.keys(item).length} fields`;
}

function formatData(data: unknown): string {
  if (Array.isArray(data)) {
    if (data.length === 0) {
      return "Empty list";
    }
    const shown = data.slice(0, 3).map(formatItem).join("; ");
    return data.length > 3
      ? `${data.length} items (showing first 3): ${shown}`
      : `${data.length} items: ${shown}`;
  }

  return formatItem(data);
}

/** Plain-text report used when the model cannot format the results. */
export function formatFallbackReport(plan: Plan, execution: ExecutionResult): string {
  const lines = [
    RULE,
    "EXECUTION RESULTS",
    RULE,
    `Task: ${plan.taskDescription}`,
    `Overall Status: ${execution.success ? "SUCCESS" : "FAILED"}`,
    `Steps Completed: ${execution.stepsCompleted}`,
    `Steps Failed: ${execution.stepsFailed}`,
    "",
  ];

  for (const result of execution.results) {
    const step = plan.steps.find((candidate) => candidate.stepNumber === result.stepNumber);
    lines.push(`Step ${result.stepNumber}${step ? ` (${step.tool})` : ""}: ${result.status.toUpperCase()}`);
    if (result.status === "failed") {
      lines.push(`  Error: ${result.error ?? "Unknown error"}`);
    } else {
      if (result.data !== null && result.data !== undefined) {
        lines.push(`  Data: ${formatData(result.data)}`);
      }
      if (result.status === "partial" && result.error) {
        lines.push(`  Note: ${result.error}`);
      }
    }
    lines.push("");
  }

  lines.push(RULE);
  return lines.join("\n");
}
