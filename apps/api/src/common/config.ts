// apps/api/src/common/config.ts

export type AppConfig = {
  port: number;
  host: string;
  appEnv: string;
  isProd: boolean;
  serviceName: string;
  /** Log every applied move with before/after counters. */
  debugMoves: boolean;
};

type Env = Record<string, string | undefined>;

export function asBool(v: string | undefined, dflt: boolean) {
  if (v == null) return dflt;
  const s = v.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  return dflt;
}

function asPort(v: string | undefined, dflt: number) {
  if (v == null || v.trim() === "") return dflt;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    throw new Error(`Invalid PORT: ${v}`);
  }
  return n;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const appEnv = (env.APP_ENV ?? env.NODE_ENV ?? "dev").toLowerCase();
  return {
    port: asPort(env.PORT, 8000),
    host: env.HOST || "0.0.0.0",
    appEnv,
    isProd: appEnv === "prod" || appEnv === "production",
    serviceName: env.SERVICE_NAME || "stock-pwa-api",
    debugMoves: asBool(env.STOCK_DEBUG_MOVES, false),
  };
}
