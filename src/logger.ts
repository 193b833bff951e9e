import { optionalEnv } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function threshold(): number {
  const raw = optionalEnv("CP_SAMPLES_LOG_LEVEL")?.toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return LEVEL_ORDER[raw];
  }
  return LEVEL_ORDER.warn;
}

/**
 * Diagnostic logging. User-facing status lines do not go through here, they
 * are printed by the caller's `notify` callback.
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < threshold()) return;

  const timestamp = new Date().toISOString();
  const contextStr = context ? ` ${JSON.stringify(context)}` : "";
  const line = `[${timestamp}] [cp-samples] ${message}${contextStr}`;
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console[level](line);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
