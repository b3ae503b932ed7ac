import pino, { type Logger } from "pino";
import type { AppConfig } from "../config";

export interface LoggerLike {
  debug(payload: Record<string, unknown>, message?: string): void;
  info(payload: Record<string, unknown>, message?: string): void;
  warn(payload: Record<string, unknown>, message?: string): void;
  error(payload: Record<string, unknown>, message?: string): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export function createLogger(
  config: Pick<AppConfig, "logLevel">,
  options: { stderr?: boolean } = {},
): Logger {
  const settings = {
    name: "ops-assistant",
    level: config.logLevel,
  };

  // The CLI keeps stdout for results.
  return options.stderr ? pino(settings, pino.destination(2)) : pino(settings);
}

export function createSilentLogger(): LoggerLike {
  return pino({ level: "silent" });
}
