import type { ExecutionResult, StepResult } from "../../types/plan";
import { asNumber, isRecord } from "../../utils/values";

const MIN_PLAUSIBLE_CELSIUS = -100;
const MAX_PLAUSIBLE_CELSIUS = 60;
const COUNT_FIELDS = ["stars", "forks", "humidity", "cloudiness"] as const;

function toCelsius(value: number, units: unknown): number {
  if (units === "imperial") {
    return ((value - 32) * 5) / 9;
  }
  if (units === "standard") {
    return value - 273.15;
  }
  return value;
}

function temperatureAnomaly(result: StepResult, data: Record<string, unknown>): string | null {
  const temperature = asNumber(data.temperature);
  if (temperature === null) {
    return null;
  }

  const celsius = toCelsius(temperature, data.units);
  if (celsius >= MIN_PLAUSIBLE_CELSIUS && celsius <= MAX_PLAUSIBLE_CELSIUS) {
    return null;
  }

  const unit = typeof data.temperature_unit === "string" ? data.temperature_unit : "°C";
  return `Step ${result.stepNumber}: unusual temperature value ${temperature}${unit}`;
}

function negativeCounts(result: StepResult, records: Record<string, unknown>[]): string[] {
  const found: string[] = [];
  for (const field of COUNT_FIELDS) {
    const negative = records
      .map((record) => asNumber(record[field]))
      .find((value) => value !== null && value < 0);
    if (negative !== undefined && negative !== null) {
      found.push(`Step ${result.stepNumber}: negative ${field} value ${negative}`);
    }
  }
  return found;
}

/** Physically implausible or empty data among steps that returned data. */
export function detectAnomalies(execution: ExecutionResult): string[] {
  const anomalies: string[] = [];

  for (const result of execution.results) {
    if (result.status === "failed") {
      continue;
    }

    const { data } = result;
    if (Array.isArray(data)) {
      if (data.length === 0) {
        anomalies.push(`Step ${result.stepNumber}: empty result set returned`);
      }
      anomalies.push(...negativeCounts(result, data.filter(isRecord)));
      continue;
    }

    if (isRecord(data)) {
      const temperature = temperatureAnomaly(result, data);
      if (temperature) {
        anomalies.push(temperature);
      }
      anomalies.push(...negativeCounts(result, [data]));
    }
  }

  return anomalies;
}
