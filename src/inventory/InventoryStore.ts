import { DEFAULT_DATA_FILE, DEFAULT_LOW_STOCK_THRESHOLD } from "../config";
import { createLogger, Logger } from "../logger";
import { AddResult, RemoveResult, StockLevels } from "../types";
import { InventoryAdapter } from "./InventoryAdapter";
import { loadData, saveData } from "./persistence";

export type InventoryStoreOptions = {
  logger?: Logger;
  now?: () => Date;
};

function isItemName(item: unknown): item is string {
  return typeof item === "string" && item.length > 0;
}

/**
 * Item name → quantity, kept in insertion order.
 *
 * Stored quantities are always > 0: any mutation that leaves an entry at or
 * below zero deletes it.
 */
export class InventoryStore implements InventoryAdapter {
  private readonly stock = new Map<string, number>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: InventoryStoreOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.now = options.now ?? (() => new Date());
  }

  get size() {
    return this.stock.size;
  }

  addItem(item: string, qty: number): AddResult | null {
    if (!isItemName(item)) {
      this.logger.error(`addItem: item must be a non-empty string, got ${JSON.stringify(item)}`);
      return null;
    }
    if (!Number.isInteger(qty)) {
      this.logger.error(`addItem: qty must be an integer, got ${String(qty)}`);
      return null;
    }

    const quantity = (this.stock.get(item) ?? 0) + qty;
    if (quantity > 0) this.stock.set(item, quantity);
    else this.stock.delete(item);

    const stored = this.stock.get(item) ?? 0;
    this.logger.info(`Added ${qty} of ${item}. New qty: ${stored}`);
    return { item, added: qty, quantity: stored, entry: `${this.now().toISOString()}: Added ${qty} of ${item}` };
  }

  removeItem(item: string, qty: number): RemoveResult {
    if (!isItemName(item)) {
      this.logger.error(`removeItem: item must be a non-empty string, got ${JSON.stringify(item)}`);
      return { status: "invalid" };
    }
    if (!Number.isInteger(qty)) {
      this.logger.error(`removeItem: qty must be an integer, got ${String(qty)}`);
      return { status: "invalid" };
    }

    try {
      const current = this.stock.get(item);
      if (current === undefined) {
        this.logger.warn(`removeItem: item '${item}' not found.`);
        return { status: "not_found", item };
      }

      const quantity = current - qty;
      if (quantity <= 0) {
        this.stock.delete(item);
        this.logger.info(`removeItem: item '${item}' removed from inventory.`);
        return { status: "removed", item };
      }
      this.stock.set(item, quantity);
      this.logger.info(`removeItem: decreased '${item}' by ${qty}. New qty: ${quantity}`);
      return { status: "decreased", item, quantity };
    } catch (err) {
      this.logger.error(`removeItem: unexpected failure while removing '${item}'`, err);
      return { status: "invalid" };
    }
  }

  getQty(item: string): number {
    if (!isItemName(item)) {
      this.logger.error(`getQty: item must be a non-empty string, got ${JSON.stringify(item)}`);
      return 0;
    }
    return this.stock.get(item) ?? 0;
  }

  /** Items with quantity strictly below `threshold`, in insertion order. */
  checkLowItems(threshold: number = DEFAULT_LOW_STOCK_THRESHOLD): string[] {
    if (!Number.isInteger(threshold)) {
      this.logger.error(`checkLowItems: threshold must be an integer, got ${String(threshold)}`);
      return [];
    }
    const low: string[] = [];
    for (const [item, qty] of this.stock) {
      if (qty < threshold) low.push(item);
    }
    return low;
  }

  report(): string[] {
    const lines = [...this.stock].map(([item, qty]) => `${item} -> ${qty}`);
    this.logger.info("Items Report");
    for (const line of lines) this.logger.info(line);
    return lines;
  }

  snapshot(): StockLevels {
    return Object.fromEntries(this.stock);
  }

  /** Clears the store, then repopulates it. Entries at or below zero are skipped. */
  replace(levels: StockLevels) {
    this.stock.clear();
    for (const [item, qty] of Object.entries(levels)) {
      if (isItemName(item) && Number.isInteger(qty) && qty > 0) this.stock.set(item, qty);
    }
  }

  load(fileName: string = DEFAULT_DATA_FILE): StockLevels {
    const levels = loadData(fileName, this.logger);
    this.replace(levels);
    return this.snapshot();
  }

  save(fileName: string = DEFAULT_DATA_FILE): boolean {
    return saveData(this.snapshot(), fileName, this.logger);
  }
}
