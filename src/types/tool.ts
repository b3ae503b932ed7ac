import type { ToolName } from "./plan";

export interface ToolInvokeContext {
  signal?: AbortSignal;
}

/**
 * Uniform tool contract. Implementations reject with a ToolFault and may
 * resolve with a PartialResult when the data is usable but incomplete.
 */
export interface ToolInvoker {
  invoke(parameters: Record<string, unknown>, context?: ToolInvokeContext): Promise<unknown>;
}

export type ToolSet = Record<ToolName, ToolInvoker>;

export interface ToolDefinition {
  name: ToolName;
  description: string;
  capabilities: string[];
  requiredParameters: Record<string, string>;
  optionalParameters: Record<string, string>;
  /** Sets of optional parameters that may stand in for the required ones. */
  alternativeParameters?: string[][];
  example: Record<string, unknown>;
}
