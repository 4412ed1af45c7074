import { z } from "zod";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

export interface CorrelationContext {
  requestId?: string | null;
  corpusVersion?: number | null;
}

export interface LogFields {
  [key: string]: unknown;
}

type LogFn = (event: string, context: CorrelationContext, fields?: LogFields) => void;

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(LOG_LEVELS))
  .catch("info");

const threshold = LOG_LEVELS.indexOf(logLevelSchema.parse(process.env.LOG_LEVEL));

export const isLogLevelEnabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

const sinks: Record<LogLevel, (line: string) => void> = {
  trace: (line) => console.info(line),
  debug: (line) => console.info(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

const writer =
  (level: LogLevel): LogFn =>
  (event, context, fields = {}) => {
    if (!isLogLevelEnabled(level)) {
      return;
    }
    sinks[level](
      JSON.stringify({
        ts: new Date().toISOString(),
        level,
        event,
        request_id: context.requestId ?? null,
        corpus_version: context.corpusVersion ?? null,
        ...fields
      })
    );
  };

export const logDebug = writer("debug");
export const logInfo = writer("info");
export const logWarn = writer("warn");
export const logError = writer("error");

/** Flattens a thrown value into log fields, keeping a domain `code` when present. */
export const errorFields = (error: unknown): LogFields => {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return { error: error.message, error_name: error.name, ...(code ? { error_code: code } : {}) };
};
