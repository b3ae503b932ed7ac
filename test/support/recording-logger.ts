import type { LoggerLike } from "../../src/utils/logger";

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string | undefined;
  payload: Record<string, unknown>;
}

export interface RecordingLogger extends LoggerLike {
  entries: LogEntry[];
}

/** Collects log calls; child bindings are merged into each payload. */
export function createRecordingLogger(
  entries: LogEntry[] = [],
  bindings: Record<string, unknown> = {},
): RecordingLogger {
  const record = (level: LogEntry["level"]) =>
    (payload: Record<string, unknown>, message?: string) => {
      entries.push({ level, message, payload: { ...bindings, ...payload } });
    };

  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: (extra) => createRecordingLogger(entries, { ...bindings, ...extra }),
  };
}
