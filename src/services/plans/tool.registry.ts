import type { ToolName } from "../../types/plan";
import type { ToolDefinition } from "../../types/tool";

const TOOL_REGISTRY: Record<ToolName, ToolDefinition> = {
  github: {
    name: "github",
    description: "Search GitHub repositories or fetch one repository's details",
    capabilities: [
      "Search repositories by query with sorting options",
      "Fetch details of one repository (open issues, topics, license, homepage)",
      "Compare repositories by running one lookup per repository",
    ],
    requiredParameters: {
      query: "Search query string, e.g. \"machine learning\" or \"language:rust stars:>1000\"",
    },
    optionalParameters: {
      sort: "\"stars\", \"forks\" or \"updated\" (default \"stars\")",
      limit: "Number of results (default 5)",
      owner: "Repository owner; with repo, fetches that repository's details",
      repo: "Repository name; used together with owner",
    },
    alternativeParameters: [["owner", "repo"]],
    example: { query: "rust web frameworks", sort: "stars", limit: 5 },
  },
  weather: {
    name: "weather",
    description: "Fetch current weather for a city",
    capabilities: [
      "Get current weather for one city",
      "Compare cities by running one lookup per city",
    ],
    requiredParameters: {
      city: "City name, optionally with a country code, e.g. \"London,GB\"",
    },
    optionalParameters: {
      units: "\"metric\", \"imperial\" or \"standard\" (default \"metric\")",
    },
    example: { city: "London", units: "metric" },
  },
  wikipedia: {
    name: "wikipedia",
    description: "Fetch a Wikipedia article summary or search article titles",
    capabilities: [
      "Get an article summary for a topic",
      "Search article titles matching a query",
      "Compare topics by running one lookup per topic",
    ],
    requiredParameters: {
      topic: "Article title, e.g. \"Rust (programming language)\"",
    },
    optionalParameters: {
      sentences: "Number of sentences in the extract (default 3)",
      query: "Search text; without a topic, lists matching article titles",
      limit: "Number of titles for a query search (default 5, at most 10)",
    },
    alternativeParameters: [["query"]],
    example: { topic: "Artificial intelligence", sentences: 3 },
  },
};

export function getToolRegistry(): Record<ToolName, ToolDefinition> {
  return { ...TOOL_REGISTRY };
}
