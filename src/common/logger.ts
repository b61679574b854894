export type LogLevel = "debug" | "info" | "warn" | "error";

const levelValue: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseLevel(input?: string | null): LogLevel {
  const v = (input || "").toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return "info";
}

export interface LoggerContext {
  service: string;
  requestId?: string;
}

export interface Logger {
  debug: (msg: string, extra?: Record<string, unknown>) => void;
  info: (msg: string, extra?: Record<string, unknown>) => void;
  warn: (msg: string, extra?: Record<string, unknown>) => void;
  error: (msg: string, extra?: Record<string, unknown>) => void;
  /** Same sink and level, with extra context fields on every line. */
  child: (ctx: Partial<LoggerContext>) => Logger;
}

function emit(
  level: LogLevel,
  ctx: LoggerContext,
  enabled: LogLevel,
  msg: string,
  extra?: Record<string, unknown>
) {
  if (levelValue[level] < levelValue[enabled]) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    service: ctx.service,
  };
  if (ctx.requestId) entry.requestId = ctx.requestId;
  entry.msg = msg;
  if (extra) {
    for (const [k, v] of Object.entries(extra)) entry[k] = v;
  }
  const line = JSON.stringify(entry);
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.info(line);
}

export function createLogger(level: string | undefined, base: LoggerContext): Logger {
  const enabled = parseLevel(level);
  return {
    debug: (msg, extra) => emit("debug", base, enabled, msg, extra),
    info: (msg, extra) => emit("info", base, enabled, msg, extra),
    warn: (msg, extra) => emit("warn", base, enabled, msg, extra),
    error: (msg, extra) => emit("error", base, enabled, msg, extra),
    child: (ctx) => createLogger(enabled, { ...base, ...ctx }),
  };
}

/** Render an unknown thrown value for a log line. */
export function describeError(e: unknown): { error: string; stack?: string } {
  if (e instanceof Error) return { error: e.message, stack: e.stack };
  return { error: String(e) };
}
