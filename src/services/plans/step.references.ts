import type { PlanStep } from "../../types/plan";
import { isRecord } from "../../utils/values";

const PLACEHOLDER_PATTERN = /\{\{\s*step:(\d+)((?:\.[A-Za-z0-9_-]+)*)\s*\}\}/g;
const WHOLE_PLACEHOLDER_PATTERN = /^\{\{\s*step:(\d+)((?:\.[A-Za-z0-9_-]+)*)\s*\}\}$/;

export class StepReferenceError extends Error {
  constructor(
    public readonly stepNumber: number,
    message: string,
  ) {
    super(message);
    this.name = "StepReferenceError";
  }
}

function normalizeText(value: string): string {
  return value.trim().replace(/\s+/g, " ").toLowerCase();
}

function collectStrings(value: unknown, into: string[]): string[] {
  if (typeof value === "string") {
    into.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) {
      collectStrings(item, into);
    }
  } else if (isRecord(value)) {
    for (const item of Object.values(value)) {
      collectStrings(item, into);
    }
  }

  return into;
}

/** Step numbers named through `{{step:N}}` placeholders, in order of appearance. */
export function findPlaceholderReferences(parameters: Readonly<Record<string, unknown>>): number[] {
  const found: number[] = [];
  for (const text of collectStrings(parameters, [])) {
    for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
      found.push(Number.parseInt(match[1], 10));
    }
  }

  return found;
}

/**
 * A step depends on an earlier step when a parameter carries a placeholder
 * for it or repeats its expected output verbatim.
 */
export function findStepDependencies(
  step: Pick<PlanStep, "stepNumber" | "parameters">,
  steps: readonly Pick<PlanStep, "stepNumber" | "expectedOutput">[],
): number[] {
  const dependencies = new Set<number>(
    findPlaceholderReferences(step.parameters).filter((ref) => ref < step.stepNumber),
  );

  const texts = collectStrings(step.parameters, []).map(normalizeText);
  for (const other of steps) {
    if (other.stepNumber >= step.stepNumber) {
      continue;
    }

    const expected = normalizeText(other.expectedOutput);
    if (expected && texts.includes(expected)) {
      dependencies.add(other.stepNumber);
    }
  }

  return [...dependencies].sort((a, b) => a - b);
}

function readPath(value: unknown, path: string[], stepNumber: number): unknown {
  let current = value;
  for (const segment of path) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number.parseInt(segment, 10)];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      current = undefined;
    }

    if (current === undefined) {
      throw new StepReferenceError(
        stepNumber,
        `Step ${stepNumber} output has no value at ${path.join(".")}`,
      );
    }
  }

  return current;
}

function lookup(
  outputs: ReadonlyMap<number, unknown>,
  stepNumber: number,
  rawPath: string,
): unknown {
  if (!outputs.has(stepNumber)) {
    throw new StepReferenceError(stepNumber, `Step ${stepNumber} produced no data`);
  }

  const path = rawPath.split(".").filter((segment) => segment.length > 0);
  return readPath(outputs.get(stepNumber), path, stepNumber);
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function resolveValue(value: unknown, outputs: ReadonlyMap<number, unknown>): unknown {
  if (typeof value === "string") {
    const whole = WHOLE_PLACEHOLDER_PATTERN.exec(value.trim());
    if (whole) {
      return lookup(outputs, Number.parseInt(whole[1], 10), whole[2]);
    }

    return value.replace(PLACEHOLDER_PATTERN, (_match, ref: string, path: string) =>
      asText(lookup(outputs, Number.parseInt(ref, 10), path)));
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveValue(item, outputs));
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveValue(item, outputs)]),
    );
  }

  return value;
}

/** Returns a new parameter map with every placeholder replaced by upstream data. */
export function resolveStepParameters(
  parameters: Readonly<Record<string, unknown>>,
  outputs: ReadonlyMap<number, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(parameters).map(([key, value]) => [key, resolveValue(value, outputs)]),
  );
}
