export type LogCtx = {
  requestId?: string;
  route?: string;
  method?: string;
  service?: string;
};

type Extra = Record<string, unknown> | undefined;

type Level = "debug" | "info" | "warn" | "error";

function clean(obj: Record<string, unknown>) {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v === undefined) continue;
    out[k] = v;
  }
  return out;
}

function log(level: Level, ctx: LogCtx | undefined, msg: string, extra?: Extra) {
  const target = level === "error" ? console.error : console.log;
  const base = clean({
    level,
    msg,
    service: ctx?.service,
    requestId: ctx?.requestId,
    route: ctx?.route,
    method: ctx?.method,
    ts: new Date().toISOString(),
  });
  const payload = extra ? { ...base, ...extra } : base;
  try {
    target(JSON.stringify(payload));
  } catch {
    // circular or BigInt extras: fall back to the unserialized payload
    target(payload);
  }
}

export const logger = {
  debug: (ctx: LogCtx | undefined, msg: string, extra?: Extra) => log("debug", ctx, msg, extra),
  info: (ctx: LogCtx | undefined, msg: string, extra?: Extra) => log("info", ctx, msg, extra),
  warn: (ctx: LogCtx | undefined, msg: string, extra?: Extra) => log("warn", ctx, msg, extra),
  error: (ctx: LogCtx | undefined, msg: string, extra?: Extra) => log("error", ctx, msg, extra),
};

/** Keep primitive values only; nested objects and arrays are dropped. */
export function sanitizeEventPayload(payload?: Record<string, unknown>): Record<string, unknown> {
  if (!payload) return {};

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    const type = typeof value;
    if (value === null || value === undefined) {
      sanitized[key] = value;
    } else if (type === "string" || type === "number" || type === "boolean") {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

/**
 * Emit a structured domain event backed by the logger.
 * Adds envelope fields and merges the sanitized payload.
 */
export function emitDomainEvent(
  ctx: LogCtx | undefined,
  eventName: string,
  payload?: Record<string, unknown>
) {
  const base = clean({
    eventName,
    ts: new Date().toISOString(),
    source: "api",
  });
  log("info", ctx, `[DOMAIN_EVENT] ${eventName}`, { ...base, ...sanitizeEventPayload(payload) });
}
