// apps/api/src/inventory/status.ts

export const StockStatus = {
  Ok: "OK",
  Attention: "Atento",
  Low: "Bajo",
} as const;
export type StockStatus = typeof StockStatus[keyof typeof StockStatus];

export function deriveStatus(quantity: number, minStock: number): StockStatus {
  if (minStock <= 0) return StockStatus.Ok;
  if (quantity <= 0) return StockStatus.Low;
  if (quantity <= minStock) return StockStatus.Attention;
  return StockStatus.Ok;
}
