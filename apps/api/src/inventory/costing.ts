// apps/api/src/inventory/costing.ts

export type OnHand = { quantity: number; unitCost: number };
export type Purchase = { quantity: number; totalCost: number };

/**
 * Blend the cost of the units on hand with an incoming purchase,
 * weighted by quantity.
 */
export function weightedAverageCost(onHand: OnHand, purchase: Purchase): number {
  const purchaseUnitCost = purchase.totalCost / purchase.quantity;
  const totalUnits = onHand.quantity + purchase.quantity;
  // only reachable with a zero-quantity purchase, which validation rejects
  if (totalUnits === 0) return purchaseUnitCost;

  const existingValue = onHand.quantity * onHand.unitCost;
  const newValue = purchase.quantity * purchaseUnitCost;
  return (existingValue + newValue) / totalUnits;
}
