import type { ToolInvokeContext, ToolInvoker } from "../../types/tool";
import { asNumber, asObject, asString, asStringArray, toPositiveInt } from "../../utils/values";
import { partialResult, ToolFault } from "./tool.fault";
import { fetchToolJson, type FetchLike } from "./tool.http";

const VALID_SORTS = ["stars", "forks", "updated"] as const;
type RepositorySort = (typeof VALID_SORTS)[number];

export interface RepositorySummary {
  name: string;
  full_name: string;
  description: string;
  stars: number;
  forks: number;
  language: string;
  url: string;
  created_at: string;
  updated_at: string;
}

export interface RepositoryDetails extends RepositorySummary {
  open_issues: number;
  watchers: number;
  default_branch: string;
  topics: string[];
  license: string | null;
  homepage: string;
  size: number;
  has_issues: boolean;
  has_wiki: boolean;
  archived: boolean;
}

export interface GithubSearchToolOptions {
  apiBase: string;
  token?: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

function parseSort(value: unknown): RepositorySort {
  const sort = asString(value).toLowerCase();
  return VALID_SORTS.find((candidate) => candidate === sort) ?? "stars";
}

export function toRepositorySummary(raw: Record<string, unknown>): RepositorySummary {
  return {
    name: asString(raw.name),
    full_name: asString(raw.full_name),
    description: asString(raw.description),
    stars: asNumber(raw.stargazers_count) ?? 0,
    forks: asNumber(raw.forks_count) ?? 0,
    language: asString(raw.language),
    url: asString(raw.html_url),
    created_at: asString(raw.created_at),
    updated_at: asString(raw.updated_at),
  };
}

export function toRepositoryDetails(raw: Record<string, unknown>): RepositoryDetails {
  return {
    ...toRepositorySummary(raw),
    open_issues: asNumber(raw.open_issues_count) ?? 0,
    watchers: asNumber(raw.watchers_count) ?? 0,
    default_branch: asString(raw.default_branch) || "main",
    topics: asStringArray(raw.topics),
    license: asString(asObject(raw.license)?.name) || null,
    homepage: asString(raw.homepage),
    size: asNumber(raw.size) ?? 0,
    has_issues: raw.has_issues === true,
    has_wiki: raw.has_wiki === true,
    archived: raw.archived === true,
  };
}

const REPOSITORY_NAME = /^([\w.-]+)\/([\w.-]+)$/;

/**
 * Searches repositories by `query`, or fetches one repository's details by
 * `owner` and `repo`. A query shaped like "owner/repo" is looked up directly
 * first and searched for when that repository does not exist.
 */
export class GithubSearchTool implements ToolInvoker {
  constructor(private readonly options: GithubSearchToolOptions) {}

  async invoke(parameters: Record<string, unknown>, context: ToolInvokeContext = {}): Promise<unknown> {
    const owner = asString(parameters.owner);
    const repo = asString(parameters.repo);
    if (owner && repo) {
      return this.repositoryDetails(owner, repo, context);
    }

    const query = asString(parameters.query);
    if (!query) {
      throw new ToolFault("INVALID_PARAMETERS", "github requires a non-empty query, or both owner and repo");
    }

    const named = REPOSITORY_NAME.exec(query);
    if (named) {
      try {
        return [await this.repositoryDetails(named[1], named[2], context)];
      } catch (error) {
        if (!(error instanceof ToolFault) || error.code !== "NOT_FOUND") {
          throw error;
        }
      }
    }

    return this.search(query, parameters, context);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  private get apiBase(): string {
    return this.options.apiBase.replace(/\/$/, "");
  }

  private async repositoryDetails(
    owner: string,
    repo: string,
    context: ToolInvokeContext,
  ): Promise<RepositoryDetails> {
    const body = asObject(await fetchToolJson({
      url: `${this.apiBase}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`,
      headers: this.headers(),
      timeoutMs: this.options.timeoutMs,
      signal: context.signal,
      fetchImpl: this.options.fetchImpl,
    }));
    if (!body) {
      throw new ToolFault("TRANSIENT_NETWORK", "GitHub repository lookup returned an unexpected body");
    }

    return toRepositoryDetails(body);
  }

  private async search(
    query: string,
    parameters: Record<string, unknown>,
    context: ToolInvokeContext,
  ): Promise<unknown> {
    const limit = Math.min(toPositiveInt(parameters.limit, 5), 100);
    const body = asObject(await fetchToolJson({
      url: `${this.apiBase}/search/repositories`,
      query: {
        q: query,
        sort: parseSort(parameters.sort),
        order: "desc",
        per_page: limit,
      },
      headers: this.headers(),
      timeoutMs: this.options.timeoutMs,
      signal: context.signal,
      fetchImpl: this.options.fetchImpl,
    }));
    if (!body) {
      throw new ToolFault("TRANSIENT_NETWORK", "GitHub search returned an unexpected body");
    }

    const items = Array.isArray(body.items) ? body.items : [];
    const repositories = items
      .slice(0, limit)
      .map((item) => asObject(item))
      .filter((item): item is Record<string, unknown> => item !== null)
      .map((item) => toRepositorySummary(item));

    if (body.incomplete_results === true) {
      return partialResult(repositories, "GitHub reported incomplete search results");
    }

    return repositories;
  }
}
