import { z } from "zod";
import { HttpError } from "../common/errors";
import type { Move } from "./moves";

// JSON numbers, or strings holding a plain decimal ("10", " 2.5 ")
const numeric = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number),
]);

const count = z.number().int().max(Number.MAX_SAFE_INTEGER);

// POST /api/move body (wire names are snake_case)
export const movePayloadSchema = z.object({
  type: z.enum(["sale", "purchase"]),
  product: z.string().min(1),
  quantity: numeric.pipe(count.positive()),
  total_cost: numeric.pipe(z.number().positive()).nullish(),
  min_stock: numeric.pipe(count.nonnegative()).nullish(),
});
export type MovePayload = z.infer<typeof movePayloadSchema>;

export type ValidationIssue = {
  loc: Array<string | number>;
  msg: string;
  type: string;
};

const invalid = (detail: ValidationIssue[]) =>
  new HttpError(422, "validation_error", "Invalid request body", detail);

export function toMove(payload: MovePayload): Move {
  return {
    type: payload.type,
    product: payload.product,
    quantity: payload.quantity,
    totalCost: payload.total_cost ?? undefined,
    minStock: payload.min_stock ?? undefined,
  };
}

/** Parse and validate a raw JSON body; throws a 422 HttpError with field issues. */
export function parseMoveBody(raw: string | undefined): Move {
  if (raw === undefined) {
    throw invalid([{ loc: ["body"], msg: "Field required", type: "missing" }]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    const reason = e instanceof Error ? e.message : "JSON decode error";
    throw invalid([{ loc: ["body"], msg: reason, type: "json_invalid" }]);
  }

  const parsed = movePayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw invalid(
      parsed.error.issues.map(issue => ({
        loc: ["body", ...issue.path],
        msg: issue.message,
        type: issue.code,
      }))
    );
  }
  return toMove(parsed.data);
}
