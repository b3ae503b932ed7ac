import type { AppConfig } from "../../config";
import type { ToolSet } from "../../types/tool";
import { GithubSearchTool } from "./github.tool";
import type { FetchLike } from "./tool.http";
import { OpenWeatherTool } from "./weather.tool";
import { WikipediaSummaryTool } from "./wikipedia.tool";

export function buildToolSet(config: AppConfig, fetchImpl?: FetchLike): ToolSet {
  return {
    github: new GithubSearchTool({
      apiBase: config.githubApiBase,
      token: config.githubToken || undefined,
      timeoutMs: config.toolRequestTimeoutMs,
      fetchImpl,
    }),
    weather: new OpenWeatherTool({
      apiBase: config.openweatherApiBase,
      apiKey: config.openweatherApiKey,
      timeoutMs: config.toolRequestTimeoutMs,
      fetchImpl,
    }),
    wikipedia: new WikipediaSummaryTool({
      apiBase: config.wikipediaApiBase,
      searchUrl: config.wikipediaSearchUrl,
      timeoutMs: config.toolRequestTimeoutMs,
      fetchImpl,
    }),
  };
}
