// apps/api/src/cors.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import type { ApiResult } from "./common/responses";
import { getHeader } from "./shared/ctx";

const ALLOW_METHODS = "DELETE,GET,HEAD,OPTIONS,PATCH,POST,PUT";

export function isPreflight(event: APIGatewayProxyEventV2) {
  return (event.requestContext?.http?.method || "").toUpperCase() === "OPTIONS";
}

/** Any origin is allowed. A request naming its Origin gets it echoed, with credentials. */
export function corsHeaders(event: APIGatewayProxyEventV2): Record<string, string> {
  const origin = getHeader(event, "Origin");
  if (!origin) {
    return {
      "access-control-allow-origin": "*",
      "access-control-allow-methods": ALLOW_METHODS,
    };
  }
  return {
    "access-control-allow-origin": origin,
    "access-control-allow-credentials": "true",
    "access-control-allow-methods": ALLOW_METHODS,
    vary: "Origin",
  };
}

/** Preflight answer; echoes the requested headers, or "*" when none were named. */
export function preflight(event: APIGatewayProxyEventV2): ApiResult {
  return {
    statusCode: 204,
    headers: {
      ...corsHeaders(event),
      "access-control-allow-headers": getHeader(event, "Access-Control-Request-Headers") || "*",
      "access-control-max-age": "600",
    },
    body: "",
  };
}

export function withCors(event: APIGatewayProxyEventV2, resp: ApiResult): ApiResult {
  return {
    ...resp,
    headers: { ...resp.headers, ...corsHeaders(event) },
  };
}
