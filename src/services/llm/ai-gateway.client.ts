import { APICallError, RetryError, generateText } from "ai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { getConfig } from "../../config";
import { clampTimerDelay } from "../../utils/abort";
import { isRecord } from "../../utils/values";
import { JsonBlockParseError, parseSingleJsonBlock } from "./json.parse";

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequest {
  requestId?: string;
  model: string;
  messages: ChatCompletionMessage[];
  maxTokens: number;
}

export interface ChatCompletionResult {
  content: string;
  model: string;
  usageTokens: number;
  requestId?: string;
  providerRequestId?: string;
}

export interface JsonCompletionResult extends ChatCompletionResult {
  value: Record<string, unknown>;
}

export interface LlmClient {
  completeText(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
  completeJson(request: ChatCompletionRequest): Promise<JsonCompletionResult>;
}

export type LlmErrorCode =
  | "LLM_TIMEOUT"
  | "LLM_AUTH"
  | "LLM_MALFORMED_OUTPUT"
  | "LLM_UNAVAILABLE";

export class LlmError extends Error {
  constructor(
    public readonly code: LlmErrorCode,
    message: string,
    public readonly rawOutput?: string,
  ) {
    super(message);
    this.name = "LlmError";
  }
}

function normalizeProviderError(error: unknown): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }

  if (
    error
    && typeof error === "object"
    && "cause" in error
    && error.cause instanceof Error
    && error.cause.message.trim()
  ) {
    return error.cause.message;
  }

  return "LLM request failed";
}

function isAbortLike(error: unknown): boolean {
  return error instanceof Error
    && (error.name === "AbortError" || error.name === "TimeoutError");
}

export function toLlmError(error: unknown): LlmError {
  if (error instanceof LlmError) {
    return error;
  }

  const root = RetryError.isInstance(error) ? error.lastError : error;

  if (isAbortLike(root)) {
    return new LlmError("LLM_TIMEOUT", "LLM request timed out");
  }

  if (APICallError.isInstance(root) && (root.statusCode === 401 || root.statusCode === 403)) {
    return new LlmError("LLM_AUTH", normalizeProviderError(root));
  }

  return new LlmError("LLM_UNAVAILABLE", normalizeProviderError(root));
}

function headerValue(headers: Headers, key: string): string | undefined {
  const value = headers.get(key);
  return value ? value : undefined;
}

export function extractProviderRequestId(response: unknown): string | undefined {
  if (!response || typeof response !== "object") {
    return undefined;
  }

  const candidate = response as {
    id?: unknown;
    requestId?: unknown;
    request_id?: unknown;
    headers?: unknown;
    response?: { headers?: unknown };
    providerMetadata?: Record<string, unknown>;
  };

  const direct = [candidate.requestId, candidate.request_id, candidate.id]
    .map((value) => String(value ?? "").trim())
    .find((value) => value.length > 0);

  if (direct) {
    return direct;
  }

  const possibleHeaders = [candidate.headers, candidate.response?.headers];
  for (const possible of possibleHeaders) {
    if (possible instanceof Headers) {
      return (
        headerValue(possible, "x-request-id")
        ?? headerValue(possible, "request-id")
        ?? headerValue(possible, "openai-request-id")
      );
    }
  }

  if (candidate.providerMetadata && typeof candidate.providerMetadata === "object") {
    for (const raw of Object.values(candidate.providerMetadata)) {
      if (!isRecord(raw)) {
        continue;
      }

      const providerId = [raw.requestId, raw.request_id, raw.id]
        .map((item) => String(item ?? "").trim())
        .find((item) => item.length > 0);

      if (providerId) {
        return providerId;
      }
    }
  }

  return undefined;
}

/**
 * Runs a text completion and parses the single JSON object it must contain.
 */
export async function completeJsonWith(
  completeText: (request: ChatCompletionRequest) => Promise<ChatCompletionResult>,
  request: ChatCompletionRequest,
): Promise<JsonCompletionResult> {
  const completion = await completeText(request);
  try {
    return {
      ...completion,
      value: parseSingleJsonBlock(completion.content),
    };
  } catch (error) {
    if (error instanceof JsonBlockParseError) {
      throw new LlmError(
        "LLM_MALFORMED_OUTPUT",
        `${error.code}: ${error.message}`,
        completion.content,
      );
    }
    throw error;
  }
}

export interface AiGatewayClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export class AiGatewayClient implements LlmClient {
  private readonly provider;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(options: AiGatewayClientOptions = {}) {
    const config = getConfig();
    this.apiKey = options.apiKey ?? config.aiGatewayApiKey;
    this.timeoutMs = options.timeoutMs ?? config.llmTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.llmMaxRetries;
    this.provider = createOpenAICompatible({
      name: "vercel-ai-gateway",
      apiKey: this.apiKey,
      baseURL: options.baseUrl ?? config.aiGatewayBaseUrl,
    });
  }

  async completeText(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    if (!this.apiKey) {
      throw new LlmError("LLM_AUTH", "AI_GATEWAY_API_KEY is required for model calls");
    }

    try {
      const result = await generateText({
        model: this.provider(request.model),
        messages: request.messages,
        maxOutputTokens: request.maxTokens,
        maxRetries: this.maxRetries,
        abortSignal: AbortSignal.timeout(clampTimerDelay(this.timeoutMs)),
      });

      const content = result.text.trim();
      if (!content) {
        throw new LlmError("LLM_UNAVAILABLE", "LLM returned an empty response");
      }

      const usageTokens = (
        result.usage.totalTokens
        ?? ((result.usage.inputTokens ?? 0) + (result.usage.outputTokens ?? 0))
      ) || Math.max(1, Math.ceil(content.length / 4));

      return {
        content,
        model: result.response.modelId ?? request.model,
        usageTokens,
        requestId: request.requestId,
        providerRequestId: extractProviderRequestId(result.response),
      };
    } catch (error) {
      throw toLlmError(error);
    }
  }

  completeJson(request: ChatCompletionRequest): Promise<JsonCompletionResult> {
    return completeJsonWith((next) => this.completeText(next), request);
  }
}
