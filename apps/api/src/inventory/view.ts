// apps/api/src/inventory/view.ts
// Response shapes for moves and listings.

import type { InventoryItem, InventoryStore } from "./store";
import { deriveStatus, type StockStatus } from "./status";

export type InventoryView = {
  product: string;
  quantity: number;
  unit_cost: number;
  min_stock: number;
  status: StockStatus;
};

const isLetter = (ch: string) => ch.toLowerCase() !== ch.toUpperCase();

/**
 * Upper-case every letter that follows a non-letter, lower-case the rest.
 * "widget-2x" -> "Widget-2X"
 */
export function titleCase(s: string): string {
  let out = "";
  let prevLetter = false;
  for (const ch of s) {
    const letter = isLetter(ch);
    out += letter ? (prevLetter ? ch.toLowerCase() : ch.toUpperCase()) : ch;
    prevLetter = letter;
  }
  return out;
}

/**
 * Round to two decimals on the exact binary value; exact ties go to the even neighbour.
 * A binary double sits exactly halfway between two cents only when it is an odd multiple of 1/8.
 */
export function roundHalfEven(value: number): number {
  const isTie = Number.isInteger(value * 8) && !Number.isInteger(value * 4);
  if (isTie) {
    const floor = Math.floor(value * 100);
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Number(value.toFixed(2));
}

export function toView(product: string, item: InventoryItem): InventoryView {
  return {
    product,
    quantity: item.quantity,
    unit_cost: roundHalfEven(item.unitCost),
    min_stock: item.minStock,
    status: deriveStatus(item.quantity, item.minStock),
  };
}

/** Every known product, ordered by key, with the key title-cased for display. */
export function listInventory(store: InventoryStore): InventoryView[] {
  return store.listAll().map(([key, item]) => toView(titleCase(key), item));
}
