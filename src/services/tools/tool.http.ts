import { clampTimerDelay } from "../../utils/abort";
import { ToolFault } from "./tool.fault";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | null | undefined;

export interface ToolJsonRequestOptions {
  url: string;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

export function buildUrlWithQuery(
  baseUrl: string,
  query?: Record<string, QueryValue>,
): string {
  if (!query) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    if (value === null || value === undefined) {
      continue;
    }

    url.searchParams.set(key, String(value));
  }

  return url.toString();
}

function parseRetryAfterMs(headers: Headers): number | undefined {
  const raw = headers.get("retry-after");
  if (!raw) {
    return undefined;
  }

  const seconds = Number.parseInt(raw, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function describeBody(parsed: unknown): string {
  if (parsed && typeof parsed === "object" && "message" in parsed) {
    return String(parsed.message);
  }

  return typeof parsed === "string" ? parsed.slice(0, 200) : JSON.stringify(parsed);
}

export function faultFromResponse(response: Response, parsed: unknown): ToolFault {
  const status = response.status;
  const detail = `HTTP ${status}: ${describeBody(parsed)}`;

  if (status === 404) {
    return new ToolFault("NOT_FOUND", detail);
  }

  if (status === 429) {
    return new ToolFault("RATE_LIMITED", detail, parseRetryAfterMs(response.headers));
  }

  if (status === 403 && response.headers.get("x-ratelimit-remaining") === "0") {
    return new ToolFault("RATE_LIMITED", detail, parseRetryAfterMs(response.headers));
  }

  if (status === 401 || status === 403) {
    return new ToolFault("UNAUTHORIZED", detail);
  }

  if (status === 408 || status >= 500) {
    return new ToolFault("TRANSIENT_NETWORK", detail);
  }

  return new ToolFault("INVALID_PARAMETERS", detail);
}

function linkSignals(timeoutMs: number, external?: AbortSignal): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    const reason = new Error("Tool request timed out");
    reason.name = "TimeoutError";
    controller.abort(reason);
  }, clampTimerDelay(timeoutMs));

  const onAbort = () => controller.abort(external?.reason);
  if (external?.aborted) {
    onAbort();
  } else {
    external?.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    },
  };
}

export async function fetchToolJson(options: ToolJsonRequestOptions): Promise<unknown> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = buildUrlWithQuery(options.url, options.query);
  const linked = linkSignals(options.timeoutMs, options.signal);

  let response: Response;
  let text: string;
  try {
    response = await fetchImpl(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        ...(options.headers ?? {}),
      },
      signal: linked.signal,
    });
    text = await response.text();
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }

    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolFault("TRANSIENT_NETWORK", `Request to ${new URL(url).host} failed: ${reason}`);
  } finally {
    linked.dispose();
  }

  let parsed: unknown = null;
  if (text) {
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = text;
    }
  }

  if (!response.ok) {
    throw faultFromResponse(response, parsed);
  }

  return parsed;
}
