// apps/api/src/inventory/reset-post.ts
import { emitDomainEvent } from "../common/logger";
import { ok, type ApiResult } from "../common/responses";
import type { Ctx } from "../shared/ctx";
import type { ApiDeps } from "../shared/deps";

/** HTTP handler — POST /api/reset */
export async function handle(ctx: Ctx, deps: ApiDeps): Promise<ApiResult> {
  const cleared = deps.store.size;
  deps.store.reset();
  emitDomainEvent(ctx, "inventory.reset", { cleared });
  return ok({ message: "Inventario reiniciado" });
}

export default { handle };
