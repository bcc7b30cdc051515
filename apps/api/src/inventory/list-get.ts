// apps/api/src/inventory/list-get.ts
import { ok, type ApiResult } from "../common/responses";
import type { ApiDeps } from "../shared/deps";
import { listInventory } from "./view";

/** HTTP handler — GET /api/inventory */
export async function handle(deps: ApiDeps): Promise<ApiResult> {
  return ok(listInventory(deps.store));
}

export default { handle };
