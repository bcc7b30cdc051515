import type { AppConfig } from "../common/config";
import type { InventoryStore } from "../inventory/store";

/** What every route handler receives from the composition root. */
export type ApiDeps = {
  store: InventoryStore;
  config: AppConfig;
};
