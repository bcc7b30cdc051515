// apps/api/src/inventory/move-post.ts
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { emitDomainEvent, logger } from "../common/logger";
import { ok, type ApiResult } from "../common/responses";
import { readBody, type Ctx } from "../shared/ctx";
import type { ApiDeps } from "../shared/deps";
import { applyMove, MoveError, productKey } from "./moves";
import { parseMoveBody } from "./validation";

/** HTTP handler — POST /api/move */
export async function handle(event: APIGatewayProxyEventV2, ctx: Ctx, deps: ApiDeps): Promise<ApiResult> {
  const move = parseMoveBody(readBody(event));
  const key = productKey(move.product);
  const before = deps.store.get(key);
  const quantityBefore = before?.quantity ?? 0;

  try {
    const view = applyMove(deps.store, move);
    emitDomainEvent(ctx, "inventory.move.applied", {
      moveType: move.type,
      productKey: key,
      qty: move.quantity,
      quantity: view.quantity,
      status: view.status,
    });
    if (deps.config.debugMoves) {
      logger.debug(ctx, "[move] applied", {
        productKey: key,
        quantityBefore,
        quantityAfter: view.quantity,
        unitCost: view.unit_cost,
        minStock: view.min_stock,
      });
    }
    return ok(view);
  } catch (err) {
    if (err instanceof MoveError) {
      emitDomainEvent(ctx, "inventory.move.rejected", {
        moveType: move.type,
        productKey: key,
        qty: move.quantity,
        reason: err.code,
      });
    }
    throw err;
  }
}

export default { handle };
