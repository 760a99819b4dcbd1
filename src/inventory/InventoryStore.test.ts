import { describe, it, expect, beforeEach } from "vitest";
import { InventoryStore } from "./InventoryStore";
import { recordingLogger } from "../testing/recordingLogger";

const fixedNow = () => new Date("2026-01-02T03:04:05.000Z");

describe("InventoryStore", () => {
  let log: ReturnType<typeof recordingLogger>;
  let store: InventoryStore;

  beforeEach(() => {
    log = recordingLogger();
    store = new InventoryStore({ logger: log, now: fixedNow });
  });

  describe("addItem", () => {
    it("creates an entry and returns a timestamped entry line", () => {
      const result = store.addItem("apple", 10);
      expect(result).toEqual({
        item: "apple",
        added: 10,
        quantity: 10,
        entry: "2026-01-02T03:04:05.000Z: Added 10 of apple"
      });
      expect(log.records).toEqual([{ level: "info", message: "Added 10 of apple. New qty: 10" }]);
    });

    it("sums repeated adds of the same item", () => {
      store.addItem("bolt", 3);
      store.addItem("bolt", 4);
      store.addItem("bolt", 5);
      expect(store.getQty("bolt")).toBe(12);
      expect(store.size).toBe(1);
    });

    it("does not create an entry when adding zero", () => {
      const result = store.addItem("pear", 0);
      expect(result?.quantity).toBe(0);
      expect(store.snapshot()).toEqual({});
    });

    it("prunes an entry that a negative add takes to zero or below", () => {
      store.addItem("apple", 2);
      store.addItem("apple", -3);
      expect(store.snapshot()).toEqual({});
    });

    it("rejects a non-integer quantity without touching the store", () => {
      store.addItem("apple", 1);
      expect(store.addItem("apple", 2.5)).toBeNull();
      expect(store.getQty("apple")).toBe(1);
      expect(log.records.at(-1)).toEqual({ level: "error", message: "addItem: qty must be an integer, got 2.5" });
    });

    it("rejects an empty item name", () => {
      expect(store.addItem("", 1)).toBeNull();
      expect(store.size).toBe(0);
      expect(log.records.at(-1)?.level).toBe("error");
    });
  });

  describe("removeItem", () => {
    it("decreases the stored quantity", () => {
      store.addItem("apple", 10);
      expect(store.removeItem("apple", 3)).toEqual({ status: "decreased", item: "apple", quantity: 7 });
      expect(store.getQty("apple")).toBe(7);
      expect(log.records.at(-1)?.message).toBe("removeItem: decreased 'apple' by 3. New qty: 7");
    });

    it("deletes the item when removing exactly what is stored", () => {
      store.addItem("apple", 4);
      expect(store.removeItem("apple", 4)).toEqual({ status: "removed", item: "apple" });
      expect(store.snapshot()).toEqual({});
    });

    it("deletes the item when removing more than is stored", () => {
      store.addItem("apple", 4);
      store.removeItem("apple", 40);
      expect(store.getQty("apple")).toBe(0);
      expect(store.snapshot()).toEqual({});
    });

    it("adds back a negative quantity", () => {
      store.addItem("apple", 4);
      expect(store.removeItem("apple", -3)).toEqual({ status: "decreased", item: "apple", quantity: 7 });
      expect(store.getQty("apple")).toBe(7);
    });

    it("warns and does nothing for an absent item", () => {
      store.addItem("apple", 4);
      expect(store.removeItem("orange", 1)).toEqual({ status: "not_found", item: "orange" });
      expect(store.snapshot()).toEqual({ apple: 4 });
      expect(log.records.at(-1)).toEqual({ level: "warn", message: "removeItem: item 'orange' not found." });
    });

    it("rejects a non-integer quantity", () => {
      store.addItem("apple", 4);
      expect(store.removeItem("apple", Number.NaN)).toEqual({ status: "invalid" });
      expect(store.getQty("apple")).toBe(4);
    });
  });

  describe("getQty", () => {
    it("returns 0 for an absent item", () => {
      expect(store.getQty("ghost")).toBe(0);
      expect(log.records).toEqual([]);
    });

    it("returns 0 and logs an error for an empty name", () => {
      expect(store.getQty("")).toBe(0);
      expect(log.records.map((r) => r.level)).toEqual(["error"]);
    });
  });

  describe("checkLowItems", () => {
    beforeEach(() => {
      store.addItem("apple", 7);
      store.addItem("banana", 2);
      store.addItem("cherry", 5);
      store.addItem("date", 1);
    });

    it("returns items strictly below the default threshold of 5 in insertion order", () => {
      expect(store.checkLowItems()).toEqual(["banana", "date"]);
    });

    it("excludes an item whose quantity equals the threshold", () => {
      expect(store.checkLowItems(5)).not.toContain("cherry");
      expect(store.checkLowItems(6)).toEqual(["banana", "cherry", "date"]);
    });

    it("returns an empty list for a non-integer threshold", () => {
      expect(store.checkLowItems(2.5)).toEqual([]);
      expect(log.records.at(-1)).toEqual({ level: "error", message: "checkLowItems: threshold must be an integer, got 2.5" });
    });
  });

  describe("report", () => {
    it("logs a header and one line per item", () => {
      store.addItem("apple", 7);
      store.addItem("banana", 2);
      log.records.length = 0;

      expect(store.report()).toEqual(["apple -> 7", "banana -> 2"]);
      expect(log.records.map((r) => r.message)).toEqual(["Items Report", "apple -> 7", "banana -> 2"]);
    });
  });

  describe("replace", () => {
    it("clears the store and skips entries at or below zero", () => {
      store.addItem("old", 3);
      store.replace({ apple: 7, pear: 0, plum: -1, "": 4 });
      expect(store.snapshot()).toEqual({ apple: 7 });
    });
  });

  it("keeps independent state per instance", () => {
    const other = new InventoryStore({ logger: recordingLogger() });
    store.addItem("apple", 1);
    expect(other.getQty("apple")).toBe(0);
  });

  it("runs the stocktake scenario", () => {
    store.addItem("apple", 10);
    store.addItem("banana", 2);
    store.addItem("pear", 0);
    store.removeItem("apple", 3);
    store.removeItem("orange", 1);

    expect(store.snapshot()).toEqual({ apple: 7, banana: 2 });
    expect(store.getQty("apple")).toBe(7);
    expect(store.checkLowItems(5)).toEqual(["banana"]);
  });
});
