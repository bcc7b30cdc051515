import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { InventoryStore } from "./store";

describe("InventoryStore", () => {
  it("creates a zeroed item on first reference and returns the same one after", () => {
    const store = new InventoryStore();
    const item = store.getOrCreate("apple");
    assert.deepEqual(item, { quantity: 0, unitCost: 0, minStock: 0 });

    item.quantity = 4;
    assert.equal(store.getOrCreate("apple"), item);
    assert.equal(store.size, 1);
  });

  it("get does not create entries", () => {
    const store = new InventoryStore();
    assert.equal(store.get("pear"), undefined);
    assert.equal(store.size, 0);
  });

  it("lists entries by ascending key", () => {
    const store = new InventoryStore();
    store.getOrCreate("pear");
    store.getOrCreate("apple");
    store.getOrCreate("banana");
    assert.deepEqual(store.listAll().map(([k]) => k), ["apple", "banana", "pear"]);
  });

  it("orders keys by code point", () => {
    const store = new InventoryStore();
    store.getOrCreate("\u{1F34E}");
    store.getOrCreate("\uFF41pple");
    assert.deepEqual(store.listAll().map(([k]) => k), ["\uFF41pple", "\u{1F34E}"]);
  });

  it("listing reflects state at call time", () => {
    const store = new InventoryStore();
    store.getOrCreate("apple");
    const first = store.listAll();
    store.getOrCreate("kiwi");
    assert.equal(first.length, 1);
    assert.equal(store.listAll().length, 2);
  });

  it("reset empties the store and is idempotent", () => {
    const store = new InventoryStore();
    store.getOrCreate("apple");
    store.reset();
    store.reset();
    assert.equal(store.size, 0);
    assert.deepEqual(store.listAll(), []);
  });
});
