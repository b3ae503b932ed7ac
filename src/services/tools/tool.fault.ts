export const TOOL_FAULT_CODES = [
  "NOT_FOUND",
  "RATE_LIMITED",
  "UNAUTHORIZED",
  "TRANSIENT_NETWORK",
  "INVALID_PARAMETERS",
] as const;

export type ToolFaultCode = (typeof TOOL_FAULT_CODES)[number];

export type FaultClass = "transient" | "permanent";

export class ToolFault extends Error {
  constructor(
    public readonly code: ToolFaultCode,
    message: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = "ToolFault";
  }
}

export function classifyFault(code: ToolFaultCode): FaultClass {
  switch (code) {
    case "RATE_LIMITED":
    case "TRANSIENT_NETWORK":
      return "transient";
    case "NOT_FOUND":
    case "UNAUTHORIZED":
    case "INVALID_PARAMETERS":
      return "permanent";
  }
}

/**
 * Timeouts become transient. Anything else that is not a ToolFault (a bug,
 * a library error) is a permanent INVALID_PARAMETERS fault.
 */
export function toToolFault(error: unknown): ToolFault {
  if (error instanceof ToolFault) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return new ToolFault("TRANSIENT_NETWORK", "Tool request timed out");
    }

    return new ToolFault("INVALID_PARAMETERS", error.message || "Tool call failed");
  }

  return new ToolFault("INVALID_PARAMETERS", String(error ?? "Tool call failed"));
}

export class PartialResult {
  constructor(
    public readonly data: unknown,
    public readonly reason: string,
  ) {}
}

export function partialResult(data: unknown, reason: string): PartialResult {
  return new PartialResult(data, reason);
}
