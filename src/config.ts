export interface AppConfig {
  port: number;
  logLevel: string;
  aiGatewayApiKey: string;
  aiGatewayBaseUrl: string;
  plannerModel: string;
  verifierModel: string;
  llmTimeoutMs: number;
  llmMaxRetries: number;
  plannerMaxTokens: number;
  verifierMaxTokens: number;
  planRepairAttempts: number;
  githubToken: string;
  githubApiBase: string;
  openweatherApiKey: string;
  openweatherApiBase: string;
  wikipediaApiBase: string;
  wikipediaSearchUrl: string;
  toolRequestTimeoutMs: number;
  toolMaxRetries: number;
  toolBackoffInitialMs: number;
  toolBackoffMaxMs: number;
  executorMaxConcurrency: number;
  queryMaxChars: number;
  pipelineTimeoutMs: number;
}

function intFromEnv(name: string, fallback: number, options: { allowZero?: boolean } = {}): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  const floor = options.allowZero ? 0 : 1;
  return parsed >= floor ? parsed : fallback;
}

export function getConfig(): AppConfig {
  return {
    port: intFromEnv("PORT", 3001),
    logLevel: process.env.LOG_LEVEL ?? "info",
    aiGatewayApiKey: process.env.AI_GATEWAY_API_KEY ?? "",
    aiGatewayBaseUrl:
      process.env.AI_GATEWAY_BASE_URL ?? "https://ai-gateway.vercel.sh/v1",
    plannerModel: process.env.PLANNER_MODEL ?? "openai/gpt-4.1",
    verifierModel: process.env.VERIFIER_MODEL ?? "openai/gpt-4.1-mini",
    llmTimeoutMs: intFromEnv("LLM_TIMEOUT_MS", 30000),
    llmMaxRetries: intFromEnv("LLM_MAX_RETRIES", 2, { allowZero: true }),
    plannerMaxTokens: intFromEnv("PLANNER_MAX_TOKENS", 2000),
    verifierMaxTokens: intFromEnv("VERIFIER_MAX_TOKENS", 1500),
    planRepairAttempts: intFromEnv("PLAN_REPAIR_ATTEMPTS", 1, { allowZero: true }),
    githubToken: process.env.GITHUB_TOKEN ?? "",
    githubApiBase: process.env.GITHUB_API_BASE ?? "https://api.github.com",
    openweatherApiKey: process.env.OPENWEATHER_API_KEY ?? "",
    openweatherApiBase:
      process.env.OPENWEATHER_API_BASE ?? "https://api.openweathermap.org/data/2.5",
    wikipediaApiBase:
      process.env.WIKIPEDIA_API_BASE ?? "https://en.wikipedia.org/api/rest_v1",
    wikipediaSearchUrl:
      process.env.WIKIPEDIA_SEARCH_URL ?? "https://en.wikipedia.org/w/api.php",
    toolRequestTimeoutMs: intFromEnv("TOOL_REQUEST_TIMEOUT_MS", 30000),
    toolMaxRetries: intFromEnv("TOOL_MAX_RETRIES", 3, { allowZero: true }),
    toolBackoffInitialMs: intFromEnv("TOOL_BACKOFF_INITIAL_MS", 1000),
    toolBackoffMaxMs: intFromEnv("TOOL_BACKOFF_MAX_MS", 60000),
    executorMaxConcurrency: intFromEnv("EXECUTOR_MAX_CONCURRENCY", 4),
    queryMaxChars: intFromEnv("QUERY_MAX_CHARS", 1000),
    pipelineTimeoutMs: intFromEnv("PIPELINE_TIMEOUT_MS", 120000),
  };
}

export function validateProductionBootConfig(config: AppConfig): void {
  if (process.env.NODE_ENV !== "production") {
    return;
  }

  const missing: string[] = [];
  if (!config.aiGatewayApiKey) {
    missing.push("AI_GATEWAY_API_KEY");
  }

  if (!config.openweatherApiKey) {
    missing.push("OPENWEATHER_API_KEY");
  }

  if (missing.length > 0) {
    throw new Error(`Missing required production config: ${missing.join(", ")}`);
  }
}
