// apps/api/src/inventory/store.ts
// In-memory item state keyed by normalized product name.

export type InventoryItem = {
  quantity: number;
  /** Weighted-average cost per unit; 0 until the first purchase. */
  unitCost: number;
  /** Reorder threshold; 0 means none configured. */
  minStock: number;
};

// Order by Unicode code point, not UTF-16 code unit.
export function compareKeys(a: string, b: string): number {
  const ca = Array.from(a);
  const cb = Array.from(b);
  const n = Math.min(ca.length, cb.length);
  for (let i = 0; i < n; i++) {
    const d = (ca[i].codePointAt(0) ?? 0) - (cb[i].codePointAt(0) ?? 0);
    if (d !== 0) return d;
  }
  return ca.length - cb.length;
}

const emptyItem = (): InventoryItem => ({ quantity: 0, unitCost: 0, minStock: 0 });

export class InventoryStore {
  private readonly items = new Map<string, InventoryItem>();

  get size(): number {
    return this.items.size;
  }

  get(key: string): InventoryItem | undefined {
    return this.items.get(key);
  }

  getOrCreate(key: string): InventoryItem {
    let item = this.items.get(key);
    if (!item) {
      item = emptyItem();
      this.items.set(key, item);
    }
    return item;
  }

  /** Entries ordered by ascending key. */
  listAll(): Array<[string, InventoryItem]> {
    return [...this.items.entries()].sort(([a], [b]) => compareKeys(a, b));
  }

  reset(): void {
    this.items.clear();
  }
}
