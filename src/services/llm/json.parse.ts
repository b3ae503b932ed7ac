import { isRecord } from "../../utils/values";

export class JsonBlockParseError extends Error {
  constructor(
    public readonly code:
      | "LLM_OUTPUT_NONJSON"
      | "LLM_OUTPUT_MULTIBLOCK"
      | "LLM_OUTPUT_NOT_OBJECT",
    message: string,
  ) {
    super(message);
    this.name = "JsonBlockParseError";
  }
}

function parseJsonObject(value: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new JsonBlockParseError("LLM_OUTPUT_NONJSON", "Model output is not valid JSON");
  }

  if (!isRecord(parsed)) {
    throw new JsonBlockParseError("LLM_OUTPUT_NOT_OBJECT", "Model output must be a JSON object");
  }

  return parsed;
}

/**
 * Accepts either a bare JSON object or exactly one fenced block tagged
 * `json` (or untagged) with nothing around it.
 */
export function parseSingleJsonBlock(rawOutput: string): Record<string, unknown> {
  const raw = String(rawOutput ?? "").trim();
  if (!raw) {
    throw new JsonBlockParseError("LLM_OUTPUT_NONJSON", "Model output is empty");
  }

  if (raw.startsWith("{") && raw.endsWith("}")) {
    return parseJsonObject(raw);
  }

  const fences = [...raw.matchAll(/```([a-zA-Z0-9_-]*)\s*([\s\S]*?)```/g)];
  if (fences.length === 0) {
    throw new JsonBlockParseError(
      "LLM_OUTPUT_NONJSON",
      "Model output must be either raw JSON or a single fenced json block",
    );
  }

  if (fences.length > 1) {
    throw new JsonBlockParseError("LLM_OUTPUT_MULTIBLOCK", "Model output contains multiple fenced blocks");
  }

  const [single] = fences;
  const language = String(single[1] ?? "").trim().toLowerCase();
  if (language !== "json" && language !== "") {
    throw new JsonBlockParseError(
      "LLM_OUTPUT_NONJSON",
      `Fenced model output must be tagged json, got ${language}`,
    );
  }

  const remainder = raw.replace(single[0], "").trim();
  if (remainder.length > 0) {
    throw new JsonBlockParseError(
      "LLM_OUTPUT_NONJSON",
      "Model output must not include prose outside the JSON block",
    );
  }

  return parseJsonObject(String(single[2] ?? "").trim());
}
