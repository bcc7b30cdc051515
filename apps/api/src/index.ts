// apps/api/src/index.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { isHttpError } from "./common/errors";
import { logger } from "./common/logger";
import { fromHttpError, internalError, methodNotAllowed, notFound, ok, type ApiResult } from "./common/responses";
import { isPreflight, preflight, withCors } from "./cors";
import { buildCtx, type Ctx } from "./shared/ctx";
import type { ApiDeps } from "./shared/deps";

/* Routes */
import * as MovePost from "./inventory/move-post";
import * as InventoryList from "./inventory/list-get";
import * as InventoryReset from "./inventory/reset-post";

export type ApiHandler = (event: APIGatewayProxyEventV2) => Promise<ApiResult>;

async function route(event: APIGatewayProxyEventV2, ctx: Ctx, deps: ApiDeps): Promise<ApiResult> {
  const { method, route: path } = ctx;

  // Public
  if (method === "GET" && (path === "/health" || path === "/")) {
    return ok({ ok: true, service: deps.config.serviceName, now: new Date().toISOString() });
  }

  // Inventory
  if (path === "/api/move") {
    if (method === "POST") return MovePost.handle(event, ctx, deps);
    return methodNotAllowed(ctx.requestId);
  }
  if (path === "/api/inventory") {
    if (method === "GET") return InventoryList.handle(deps);
    return methodNotAllowed(ctx.requestId);
  }
  if (path === "/api/reset") {
    if (method === "POST") return InventoryReset.handle(ctx, deps);
    return methodNotAllowed(ctx.requestId);
  }

  return notFound("Not Found", ctx.requestId);
}

/**
 * Build the API Gateway v2 handler over an explicitly owned store.
 * Each call to createHandler gets its own state.
 */
export function createHandler(deps: ApiDeps): ApiHandler {
  return async function handler(event) {
    if (isPreflight(event)) return preflight(event);

    const ctx = buildCtx(event, deps.config.serviceName);
    let resp: ApiResult;
    try {
      resp = await route(event, ctx, deps);
    } catch (err) {
      if (isHttpError(err)) {
        resp = fromHttpError(err, ctx.requestId);
      } else {
        logger.error(ctx, "unhandled error", {
          error: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
        resp = internalError(err, ctx.requestId);
      }
    }

    const withId = { ...resp, headers: { ...resp.headers, "x-request-id": ctx.requestId } };
    return withCors(event, withId);
  };
}

export { InventoryStore } from "./inventory/store";
export { loadConfig, type AppConfig } from "./common/config";
export type { ApiDeps } from "./shared/deps";
export type { ApiResult } from "./common/responses";
