import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { randomUUID } from "node:crypto";
import type { LogCtx } from "../common/logger";

export type Ctx = LogCtx & {
  /** API Gateway request id, or a fresh one for local requests. */
  requestId: string;
  route: string;
  method: string;
};

/** Case-insensitive header getter. */
export function getHeader(
  event: APIGatewayProxyEventV2,
  name: string
): string | undefined {
  const h = event.headers || {};
  const key = Object.keys(h).find(k => k.toLowerCase() === name.toLowerCase());
  return key ? h[key] : undefined;
}

export function buildCtx(event: APIGatewayProxyEventV2, service?: string): Ctx {
  const http = event.requestContext?.http;
  return {
    requestId: event.requestContext?.requestId || randomUUID(),
    route: event.rawPath || http?.path || "/",
    method: (http?.method || "GET").toUpperCase(),
    service,
  };
}

/** Decoded request body, or undefined when the request carried none. */
export function readBody(event: APIGatewayProxyEventV2): string | undefined {
  if (event.body == null || event.body === "") return undefined;
  return event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body;
}
