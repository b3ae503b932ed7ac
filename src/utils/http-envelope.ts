import { isRecord } from "./values";

export interface ApiErrorShape {
  code: string;
  message: string;
  [key: string]: unknown;
}

export interface ApiEnvelope<T = unknown> {
  ok: boolean;
  data: T | null;
  error: ApiErrorShape | null;
  meta: Record<string, unknown> | null;
}

export function isApiEnvelope(value: unknown): value is ApiEnvelope {
  if (!isRecord(value)) {
    return false;
  }

  return (
    typeof value.ok === "boolean"
    && "data" in value
    && "error" in value
    && "meta" in value
  );
}

export function okResponse<T>(data: T, meta: Record<string, unknown> | null = null): ApiEnvelope<T> {
  return {
    ok: true,
    data,
    error: null,
    meta,
  };
}

export function errorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ApiEnvelope<never> {
  return {
    ok: false,
    data: null,
    error: {
      code,
      message,
      ...(details ?? {}),
    },
    meta: null,
  };
}

export function withRequestMeta<T>(
  payload: T,
  requestId: string,
): T | ApiEnvelope {
  if (!isApiEnvelope(payload)) {
    return payload;
  }

  const existingMeta = payload.meta && isRecord(payload.meta) ? payload.meta : {};
  return {
    ...payload,
    meta: {
      ...existingMeta,
      request_id: requestId,
    },
  };
}
