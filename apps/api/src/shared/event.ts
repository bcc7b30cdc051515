import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { randomUUID } from "node:crypto";

export type RequestLike = {
  method: string;
  /** Path with optional query string, e.g. "/api/inventory?x=1". */
  url: string;
  headers?: Record<string, string | undefined>;
  body?: string;
  sourceIp?: string;
  requestId?: string;
};

/** Shape a plain request into the HTTP API (v2) event the router expects. */
export function toApiEvent(req: RequestLike): APIGatewayProxyEventV2 {
  const method = req.method.toUpperCase();
  const [rawPath, rawQueryString = ""] = req.url.split("?", 2);
  const headers: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(req.headers ?? {})) headers[k.toLowerCase()] = v;

  const query = new URLSearchParams(rawQueryString);
  const queryStringParameters: Record<string, string> = {};
  query.forEach((v, k) => { queryStringParameters[k] = v; });

  const now = new Date();
  const path = rawPath || "/";
  return {
    version: "2.0",
    routeKey: "$default",
    rawPath: path,
    rawQueryString,
    headers,
    queryStringParameters: rawQueryString ? queryStringParameters : undefined,
    requestContext: {
      accountId: "local",
      apiId: "local",
      domainName: headers.host ?? "localhost",
      domainPrefix: "local",
      http: {
        method,
        path,
        protocol: "HTTP/1.1",
        sourceIp: req.sourceIp ?? "127.0.0.1",
        userAgent: headers["user-agent"] ?? "",
      },
      requestId: req.requestId ?? randomUUID(),
      routeKey: "$default",
      stage: "$default",
      time: now.toISOString(),
      timeEpoch: now.getTime(),
    },
    body: req.body,
    isBase64Encoded: false,
  };
}
