import type { ToolInvokeContext, ToolInvoker } from "../../types/tool";
import { asObject, asString, asStringArray, toPositiveInt } from "../../utils/values";
import { partialResult, ToolFault } from "./tool.fault";
import { fetchToolJson, type FetchLike } from "./tool.http";

export interface ArticleSummary {
  title: string;
  summary: string;
  extract: string;
  url: string;
  description: string;
  type: string;
}

export interface WikipediaSummaryToolOptions {
  apiBase: string;
  /** OpenSearch endpoint used for article search and suggestions. */
  searchUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export function encodeTitle(topic: string): string {
  return encodeURIComponent(topic.trim().replace(/\s+/g, "_"));
}

/**
 * A sentence ends at a period followed by the end of text, or by a space
 * and an uppercase letter. Truncated extracts end with "...".
 */
export function extractSentences(text: string, count: number): string {
  if (!text) {
    return "";
  }

  const sentences: string[] = [];
  let current = "";
  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    current += char;

    const atEnd = index + 1 >= text.length;
    const nextStartsSentence = text[index + 1] === " "
      && index + 2 < text.length
      && /[A-Z]/.test(text[index + 2]);

    if (char === "." && (atEnd || nextStartsSentence)) {
      sentences.push(current.trim());
      current = "";
      if (sentences.length >= count) {
        break;
      }
    }
  }

  if (current.trim() && sentences.length < count) {
    sentences.push(current.trim());
  }

  const result = sentences.slice(0, count).join(" ");
  return result.length < text.length ? `${result}...` : result;
}

export interface ArticleSearchResult {
  query: string;
  titles: string[];
}

/**
 * Fetches an article summary by `topic`, or lists matching article titles
 * for a `query`. A disambiguation page is retried once with the first search
 * hit that is not itself a disambiguation page.
 */
export class WikipediaSummaryTool implements ToolInvoker {
  constructor(private readonly options: WikipediaSummaryToolOptions) {}

  async invoke(parameters: Record<string, unknown>, context: ToolInvokeContext = {}): Promise<unknown> {
    const topic = asString(parameters.topic);
    if (!topic) {
      const query = asString(parameters.query);
      if (!query) {
        throw new ToolFault("INVALID_PARAMETERS", "wikipedia requires a non-empty topic or query");
      }

      const limit = Math.min(toPositiveInt(parameters.limit, 5), 10);
      const result: ArticleSearchResult = { query, titles: await this.searchArticles(query, limit, context) };
      return result;
    }

    const sentences = toPositiveInt(parameters.sentences, 3);
    const article = await this.articleOrSuggestion(topic, sentences, context);
    if (article.type !== "disambiguation") {
      return article;
    }

    const alternative = (await this.searchQuietly(topic, 3, context))
      .find((title) => !title.endsWith("(disambiguation)") && title !== topic);
    if (alternative) {
      const retried = await this.summary(alternative, sentences, context);
      if (retried.type !== "disambiguation") {
        return retried;
      }
    }

    return partialResult(article, `"${topic}" is a disambiguation page; a more specific topic is needed`);
  }

  async searchArticles(query: string, limit: number, context: ToolInvokeContext = {}): Promise<string[]> {
    const body = await fetchToolJson({
      url: this.options.searchUrl,
      query: {
        action: "opensearch",
        search: query,
        limit,
        namespace: 0,
        format: "json",
      },
      timeoutMs: this.options.timeoutMs,
      signal: context.signal,
      fetchImpl: this.options.fetchImpl,
    });

    // opensearch answers [query, titles, descriptions, urls]
    return Array.isArray(body) ? asStringArray(body[1]).slice(0, limit) : [];
  }

  /** A failed search leaves the caller without alternatives; cancellation still propagates. */
  private async searchQuietly(query: string, limit: number, context: ToolInvokeContext): Promise<string[]> {
    try {
      return await this.searchArticles(query, limit, context);
    } catch (error) {
      if (context.signal?.aborted || !(error instanceof ToolFault)) {
        throw error;
      }
      return [];
    }
  }

  private async articleOrSuggestion(
    topic: string,
    sentences: number,
    context: ToolInvokeContext,
  ): Promise<ArticleSummary> {
    try {
      return await this.summary(topic, sentences, context);
    } catch (error) {
      if (!(error instanceof ToolFault) || error.code !== "NOT_FOUND") {
        throw error;
      }

      const [suggestion] = await this.searchQuietly(topic, 1, context);
      throw new ToolFault(
        "NOT_FOUND",
        suggestion
          ? `Article "${topic}" not found. Did you mean "${suggestion}"?`
          : `Article "${topic}" not found. Check the spelling or try a different search term.`,
      );
    }
  }

  private async summary(topic: string, sentences: number, context: ToolInvokeContext): Promise<ArticleSummary> {
    const body = asObject(await fetchToolJson({
      url: `${this.options.apiBase.replace(/\/$/, "")}/page/summary/${encodeTitle(topic)}`,
      timeoutMs: this.options.timeoutMs,
      signal: context.signal,
      fetchImpl: this.options.fetchImpl,
    }));
    if (!body) {
      throw new ToolFault("TRANSIENT_NETWORK", "Wikipedia returned an unexpected body");
    }

    const desktop = asObject(asObject(body.content_urls)?.desktop) ?? {};
    const summaryText = asString(body.extract);
    return {
      title: asString(body.title) || topic,
      summary: summaryText,
      extract: extractSentences(summaryText, sentences),
      url: asString(desktop.page),
      description: asString(body.description),
      type: asString(body.type) || "standard",
    };
  }
}
