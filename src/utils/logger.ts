// Thin interface and default logger instance
export type Level = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface Logger {
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
  log?(level: Level, category: string, msg: string, meta?: unknown): void;
}

const LEVELS: readonly Level[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

let context: Record<string, string | number | boolean> = {};

/**
 * Converts a log level string to its corresponding numeric value.
 * - "TRACE" = 0
 * - "DEBUG" = 10
 * - "INFO"  = 20
 * - "WARN"  = 30
 * - "ERROR" = 40
 * - "FATAL" = 50
 */
function levelValue(l: Level): number {
  switch (l) {
    case "TRACE": return 0;
    case "DEBUG": return 10;
    case "INFO": return 20;
    case "WARN": return 30;
    case "ERROR": return 40;
    case "FATAL": return 50;
  }
}

function isLevel(v: string): v is Level {
  return LEVELS.some(l => l === v);
}

/**
 * Threshold from LOG_LEVEL; unset or unknown values fall back to INFO.
 */
function currentThreshold(): number {
  const env = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  return levelValue(isLevel(env) ? env : "INFO");
}

function ts(): string { return new Date().toISOString(); }

/**
 * Emits a log message if its level is at or above the current threshold.
 * LOG_JSON=1 switches to one JSON object per line.
 */
function emit(level: Level, category: string | undefined, message: string, meta?: unknown) {
  if (levelValue(level) < currentThreshold()) return;
  const write = level === "ERROR" || level === "FATAL" ? console.error : level === "WARN" ? console.warn : console.log;

  if (process.env.LOG_JSON === "1") {
    const entry = {
      ts: ts(),
      level,
      category,
      message,
      data: meta !== undefined ? [meta] : [],
      ...context
    };
    write(JSON.stringify(entry));
    return;
  }

  let ctxStr = "";
  if (Object.keys(context).length > 0) {
    ctxStr = " " + Object.entries(context).map(([k, v]) => `[${k}=${String(v)}]`).join(" ");
  }
  const prefix = `[${level}]${category ? `[${category}]` : ''}`;
  const line = `${prefix} ${message}${ctxStr}`;
  if (meta !== undefined) write(line, meta);
  else write(line);
}

/**
 * Merges the provided context into every subsequent log line.
 * Existing keys are overwritten.
 */
export function setLoggerContext(ctx: Record<string, string | number | boolean>) {
  context = { ...context, ...ctx };
}

/** Clears the whole context, or only the given keys. */
export function clearLoggerContext(keys?: string[]) {
  if (!keys) { context = {}; return; }
  for (const k of keys) delete context[k];
}

export function logTrace(message: string, meta?: unknown) { emit("TRACE", undefined, message, meta); }
export function logDebug(message: string, meta?: unknown) { emit("DEBUG", undefined, message, meta); }
export function logInfo(message: string, meta?: unknown) { emit("INFO", undefined, message, meta); }
export function logWarn(message: string, meta?: unknown) { emit("WARN", undefined, message, meta); }
export function logError(message: string, meta?: unknown) { emit("ERROR", undefined, message, meta); }
export function logFatal(message: string, meta?: unknown) { emit("FATAL", undefined, message, meta); }

// category-aware API
export function log(level: Level, category: string, message: string, meta?: unknown) {
  emit(level, category, message, meta);
}

// Default DI-friendly logger implementation
export const logger: Logger = {
  debug: (msg, meta) => emit("DEBUG", undefined, msg, meta),
  info: (msg, meta) => emit("INFO", undefined, msg, meta),
  warn: (msg, meta) => emit("WARN", undefined, msg, meta),
  error: (msg, meta) => emit("ERROR", undefined, msg, meta),
  log: (level, category, msg, meta) => emit(level, category, msg, meta),
};
