// apps/api/src/inventory/moves.ts
// Applies a single purchase or sale to the store.

import { HttpError } from "../common/errors";
import { weightedAverageCost } from "./costing";
import type { InventoryItem, InventoryStore } from "./store";
import { toView, type InventoryView } from "./view";

export type MoveType = "purchase" | "sale";

export type Move = {
  type: MoveType;
  product: string;
  quantity: number;
  /** Required for purchases, ignored for sales. */
  totalCost?: number;
  /** Only applied on purchases. */
  minStock?: number;
};

export class MoveError extends HttpError {
  constructor(statusCode: number, code: string, message: string) {
    super(statusCode, code, message);
    this.name = "MoveError";
  }
}

export const productRequired = () =>
  new MoveError(400, "product_required", "El producto es obligatorio.");
export const totalCostRequired = () =>
  new MoveError(422, "total_cost_required", "El total gastado es obligatorio.");
export const insufficientStock = () =>
  new MoveError(400, "insufficient_stock", "No hay suficiente stock para completar la venta.");

export function productKey(product: string): string {
  return product.trim().toLowerCase();
}

function applyPurchase(store: InventoryStore, key: string, move: Move): InventoryItem {
  if (move.totalCost == null) throw totalCostRequired();

  const item = store.getOrCreate(key);
  item.unitCost = weightedAverageCost(item, { quantity: move.quantity, totalCost: move.totalCost });
  item.quantity += move.quantity;
  if (move.minStock != null) item.minStock = move.minStock;
  return item;
}

function applySale(store: InventoryStore, key: string, move: Move): InventoryItem {
  const onHand = store.get(key)?.quantity ?? 0;
  if (move.quantity > onHand) throw insufficientStock();

  const item = store.getOrCreate(key);
  item.quantity -= move.quantity;
  return item;
}

/**
 * Validate business rules and fold one move into the item it names.
 * A rejected move throws a MoveError and leaves the store untouched,
 * without creating an entry for an unknown product.
 */
export function applyMove(store: InventoryStore, move: Move): InventoryView {
  const product = move.product.trim();
  const key = productKey(move.product);
  if (!key) throw productRequired();

  const item = move.type === "purchase"
    ? applyPurchase(store, key, move)
    : applySale(store, key, move);

  return toView(product, item);
}
