import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { errorMessage, type HttpError } from "./errors";

type Json = Record<string, unknown> | unknown[];

/** Structured result with the fields every route fills in. */
export type ApiResult = APIGatewayProxyStructuredResultV2 & {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
};

const baseHeaders = {
  "content-type": "application/json",
};

const respond = (statusCode: number, body: unknown): ApiResult => ({
  statusCode,
  headers: { ...baseHeaders },
  body: typeof body === "string" ? body : JSON.stringify(body),
});

// Inject requestId into error payloads when provided
const withRequestId = <T extends Record<string, unknown>>(body: T, requestId?: string) =>
  requestId ? { ...body, requestId } : body;

export const ok = (data: Json, status = 200) => respond(status, data);

/** 422 with field-level issues. */
export const validationError = (message: string, detail: unknown, requestId?: string) =>
  respond(422, withRequestId({ code: "validation_error", message, detail }, requestId));

export const notFound = (message = "Not Found", requestId?: string) =>
  respond(404, withRequestId({ code: "not_found", message }, requestId));

export const methodNotAllowed = (requestId?: string) =>
  respond(405, withRequestId({ code: "method_not_allowed", message: "Method Not Allowed" }, requestId));

export const internalError = (err: unknown, requestId?: string) =>
  respond(500, withRequestId({ code: "internal_error", message: errorMessage(err) }, requestId));

/** Map a thrown HttpError onto its response shape; `detail` falls back to the message. */
export const fromHttpError = (err: HttpError, requestId?: string) => {
  if (err.statusCode === 422 && err.code === "validation_error") {
    return validationError(err.message, err.details ?? [], requestId);
  }
  return respond(
    err.statusCode,
    withRequestId({ code: err.code, message: err.message, detail: err.details ?? err.message }, requestId)
  );
};
