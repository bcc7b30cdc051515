import assert from "node:assert/strict";
import { beforeEach, describe, it } from "node:test";
import { applyMove, MoveError, productKey } from "./moves";
import { InventoryStore } from "./store";

describe("applyMove", () => {
  let store: InventoryStore;
  beforeEach(() => {
    store = new InventoryStore();
  });

  it("normalizes product keys", () => {
    assert.equal(productKey("  Widget "), "widget");
  });

  it("records a first purchase at its unit cost", () => {
    const view = applyMove(store, { type: "purchase", product: "apple", quantity: 10, totalCost: 20, minStock: 3 });
    assert.deepEqual(view, { product: "apple", quantity: 10, unit_cost: 2, min_stock: 3, status: "OK" });
  });

  it("shows a cent for a fraction-of-a-cent unit cost just above the half", () => {
    const view = applyMove(store, { type: "purchase", product: "pin", quantity: 200, totalCost: 1 });
    assert.equal(view.unit_cost, 0.01);
  });

  it("keeps a running weighted average across purchases", () => {
    applyMove(store, { type: "purchase", product: "bolt", quantity: 4, totalCost: 4 });
    applyMove(store, { type: "purchase", product: "bolt", quantity: 6, totalCost: 18 });
    const view = applyMove(store, { type: "purchase", product: "bolt", quantity: 10, totalCost: 38 });
    // (4*1 + 6*3 + 10*3.8) / 20
    assert.equal(view.unit_cost, 3);
    assert.equal(view.quantity, 20);
  });

  it("leaves min stock alone when a purchase omits it", () => {
    applyMove(store, { type: "purchase", product: "nut", quantity: 5, totalCost: 5, minStock: 2 });
    const view = applyMove(store, { type: "purchase", product: "nut", quantity: 5, totalCost: 5 });
    assert.equal(view.min_stock, 2);
  });

  it("overwrites min stock when a purchase supplies zero", () => {
    applyMove(store, { type: "purchase", product: "nut", quantity: 5, totalCost: 5, minStock: 2 });
    const view = applyMove(store, { type: "purchase", product: "nut", quantity: 1, totalCost: 1, minStock: 0 });
    assert.equal(view.min_stock, 0);
  });

  it("sales reduce quantity and keep cost and threshold", () => {
    applyMove(store, { type: "purchase", product: "apple", quantity: 10, totalCost: 20, minStock: 3 });
    const view = applyMove(store, { type: "sale", product: "apple", quantity: 8, minStock: 9, totalCost: 99 });
    assert.deepEqual(view, { product: "apple", quantity: 2, unit_cost: 2, min_stock: 3, status: "Atento" });
  });

  it("selling the whole stock reaches Bajo", () => {
    applyMove(store, { type: "purchase", product: "apple", quantity: 2, totalCost: 2, minStock: 1 });
    const view = applyMove(store, { type: "sale", product: "apple", quantity: 2 });
    assert.equal(view.quantity, 0);
    assert.equal(view.status, "Bajo");
  });

  it("rejects an oversold sale without touching the item", () => {
    applyMove(store, { type: "purchase", product: "apple", quantity: 2, totalCost: 5, minStock: 3 });
    assert.throws(
      () => applyMove(store, { type: "sale", product: "apple", quantity: 5 }),
      (err: unknown) =>
        err instanceof MoveError &&
        err.statusCode === 400 &&
        err.message === "No hay suficiente stock para completar la venta."
    );
    assert.deepEqual(store.get("apple"), { quantity: 2, unitCost: 2.5, minStock: 3 });
  });

  it("does not create an entry for a rejected sale of an unknown product", () => {
    assert.throws(() => applyMove(store, { type: "sale", product: "ghost", quantity: 1 }), MoveError);
    assert.equal(store.size, 0);
  });

  it("requires total cost on purchases", () => {
    assert.throws(
      () => applyMove(store, { type: "purchase", product: "apple", quantity: 1 }),
      (err: unknown) => err instanceof MoveError && err.statusCode === 422 && err.code === "total_cost_required"
    );
    assert.equal(store.size, 0);
  });

  it("rejects a blank product name", () => {
    assert.throws(
      () => applyMove(store, { type: "purchase", product: "   ", quantity: 1, totalCost: 1 }),
      (err: unknown) => err instanceof MoveError && err.statusCode === 400 && err.message === "El producto es obligatorio."
    );
  });

  it("treats product names case-insensitively and echoes the request casing", () => {
    applyMove(store, { type: "purchase", product: "Widget", quantity: 5, totalCost: 10 });
    const view = applyMove(store, { type: "sale", product: "  wIDGET ", quantity: 2 });
    assert.equal(view.product, "wIDGET");
    assert.equal(view.quantity, 3);
    assert.equal(store.size, 1);
  });
});
