// Thin interface and default logger instance
export type Level = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface Logger {
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
  log?(level: Level, category: string, msg: string, meta?: unknown): void;
}

const LEVELS: Level[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

let context: Record<string, string | number | boolean> = {};
const redactKeys = new Set<string>([
  'apikey', 'key', 'secret', 'passphrase', 'signature', 'token', 'refreshtoken',
  'privatekey', 'seed', 'mnemonic', 'authorization', 'auth', 'password',
]);
const onceFlags = new Set<string>();

/**
 * Converts a log level string to its corresponding numeric value.
 * TRACE=0, DEBUG=10, INFO=20, WARN=30, ERROR=40, FATAL=50.
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
 * Retrieves the current log level threshold from LOG_LEVEL.
 * Falls back to INFO when unset or invalid.
 */
function currentThreshold(): number {
  const env = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  return levelValue(isLevel(env) ? env : "INFO");
}
function ts(): string { return new Date().toISOString(); }

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Redacts sensitive keys and renders bigint values as decimal strings. */
export function redactMeta(meta: unknown): unknown {
  if (meta == null) return meta;
  if (typeof meta === 'bigint') return meta.toString();
  if (Array.isArray(meta)) return meta.map(redactMeta);
  if (meta instanceof Error) return { name: meta.name, message: meta.message };
  if (!isPlainObject(meta)) return meta;
  const out: Record<string, unknown> = {};
  let redacted = false;
  for (const [k, v] of Object.entries(meta)) {
    if (redactKeys.has(k.toLowerCase())) { out[k] = '***'; redacted = true; continue; }
    out[k] = redactMeta(v);
  }
  if (redacted) out.redacted = true;
  return out;
}

/**
 * Emits a log line if its level is at or above the current threshold.
 * JSON output when LOG_JSON=1, otherwise `[LEVEL][CATEGORY] message`.
 */
function emit2(level: Level, category: string | undefined, message: string, meta?: unknown) {
  // TEST_MODE silences everything below ERROR unless a quieter LOG_LEVEL was chosen explicitly
  const lvlEnv = (process.env.LOG_LEVEL || '').toUpperCase();
  const verbose = lvlEnv === 'DEBUG' || lvlEnv === 'TRACE' || !lvlEnv;
  if (process.env.TEST_MODE === '1' && verbose && levelValue(level) < 40) return;
  // Sampling for TRACE/DEBUG (default 1/10), off under tests
  const isUnitTest = !!process.env.VITEST_WORKER_ID || process.env.NODE_ENV === 'test';
  if (process.env.TEST_MODE !== '1' && !isUnitTest && (level === 'TRACE' || level === 'DEBUG')) {
    const n = Math.max(1, Number(process.env.DEBUG_SAMPLING || '10'));
    if (Math.floor(Math.random() * n) !== 0) return;
  }
  if (levelValue(level) < currentThreshold()) return;
  const redMeta = redactMeta(meta);
  if (process.env.LOG_JSON === "1") {
    const entry = {
      ts: ts(),
      level,
      category,
      message,
      data: redMeta != null ? [redMeta] : [],
      ...context
    };
    const line = JSON.stringify(entry);
    if (level === "ERROR" || level === "FATAL") console.error(line);
    else if (level === "WARN") console.warn(line);
    else console.log(line);
    return;
  }

  let ctxStr = "";
  if (Object.keys(context).length > 0) {
    ctxStr = " " + Object.entries(context).map(([k, v]) => `[${k}=${String(v)}]`).join(" ");
  }
  const prefix = `[${level}]${category ? `[${category}]` : ''}`;
  const line = `${prefix} ${message}${ctxStr}`;
  const rest = redMeta != null ? [redMeta] : [];

  if (level === "ERROR" || level === "FATAL") console.error(line, ...rest);
  else if (level === "WARN") console.warn(line, ...rest);
  else console.log(line, ...rest);
}

function emit(level: Level, message: string, args: unknown[]) {
  const meta = args.length ? (args.length === 1 ? args[0] : args) : undefined;
  emit2(level, undefined, message, meta);
}

/**
 * Merges the provided context into the logger context; existing keys are overwritten.
 */
export function setLoggerContext(ctx: Record<string, string | number | boolean>) {
  context = { ...context, ...ctx };
}

/** Clears the whole context, or only the given keys. */
export function clearLoggerContext(keys?: string[]) {
  if (!keys) { context = {}; return; }
  const next = { ...context };
  for (const k of keys) delete next[k];
  context = next;
}

export function addLoggerRedactFields(keys: string[]) {
  for (const k of keys) redactKeys.add(String(k).toLowerCase());
}

export function warnOnce(id: string, message: string, meta?: unknown) {
  if (onceFlags.has(id)) return;
  onceFlags.add(id);
  emit2('WARN', 'CONFIG', message, meta);
}

export function logTrace(message: string, ...args: unknown[]) { emit("TRACE", message, args); }
export function logDebug(message: string, ...args: unknown[]) { emit("DEBUG", message, args); }
export function logInfo(message: string, ...args: unknown[]) { emit("INFO", message, args); }
export function logWarn(message: string, ...args: unknown[]) { emit("WARN", message, args); }
export function logError(message: string, ...args: unknown[]) { emit("ERROR", message, args); }
export function logFatal(message: string, ...args: unknown[]) { emit("FATAL", message, args); }

// Category-aware API
export function log(level: Level, category: string, message: string, meta?: unknown) {
  emit2(level, category, message, meta);
}

// Default DI-friendly logger implementation
export const logger: Logger = {
  debug: (msg, meta) => emit2("DEBUG", undefined, msg, meta),
  info: (msg, meta) => emit2("INFO", undefined, msg, meta),
  warn: (msg, meta) => emit2("WARN", undefined, msg, meta),
  error: (msg, meta) => emit2("ERROR", undefined, msg, meta),
  log: (level, category, msg, meta) => emit2(level, category, msg, meta),
};

/** Logger bound to one category; used by components that take an injectable logger. */
export function categoryLogger(category: string): Logger {
  return {
    debug: (msg, meta) => emit2("DEBUG", category, msg, meta),
    info: (msg, meta) => emit2("INFO", category, msg, meta),
    warn: (msg, meta) => emit2("WARN", category, msg, meta),
    error: (msg, meta) => emit2("ERROR", category, msg, meta),
    log: (level, cat, msg, meta) => emit2(level, cat, msg, meta),
  };
}
