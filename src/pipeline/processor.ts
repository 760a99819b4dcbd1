import { DEFAULT_DATA_FILE, DEFAULT_LOW_STOCK_THRESHOLD } from "../config";
import { InventoryAdapter } from "../inventory/InventoryAdapter";
import { ParsedCommand } from "../types";

export const UNKNOWN_COMMAND_REPLY = "Unknown command. Try: add, remove, qty, low, report, save, load.";

export function parseCommand(text: string): ParsedCommand | null {
  const t = (text || "").trim().toLowerCase().replace(/\s+/g, " ");

  const change = t.match(/^(add|remove) (.+) ([+-]?\d+)$/);
  if (change) {
    const quantity = parseInt(change[3], 10);
    return change[1] === "add"
      ? { kind: "add", item: change[2], quantity }
      : { kind: "remove", item: change[2], quantity };
  }

  const qty = t.match(/^(?:qty|get) (.+)$/);
  if (qty) return { kind: "qty", item: qty[1] };

  const low = t.match(/^low(?: ([+-]?\d+))?$/);
  if (low) return { kind: "low", threshold: low[1] !== undefined ? parseInt(low[1], 10) : null };

  if (t === "report" || t === "save" || t === "load") return { kind: t };
  return null;
}

export type ProcessorOptions = {
  dataFile?: string;
  lowStockThreshold?: number;
};

export class Processor {
  private readonly dataFile: string;
  private readonly lowStockThreshold: number;

  constructor(private inventory: InventoryAdapter, options: ProcessorOptions = {}) {
    this.dataFile = options.dataFile ?? DEFAULT_DATA_FILE;
    this.lowStockThreshold = options.lowStockThreshold ?? DEFAULT_LOW_STOCK_THRESHOLD;
  }

  handleIncomingText(text: string): string {
    const command = parseCommand(text);
    if (!command) return UNKNOWN_COMMAND_REPLY;

    switch (command.kind) {
      case "add": {
        const result = this.inventory.addItem(command.item, command.quantity);
        if (!result) return `Could not add "${command.item}".`;
        return `Added ${result.added} of ${result.item}. Now ${result.quantity}.`;
      }
      case "remove": {
        const result = this.inventory.removeItem(command.item, command.quantity);
        switch (result.status) {
          case "decreased":
            return `Removed ${command.quantity} of ${result.item}. Now ${result.quantity}.`;
          case "removed":
            return `${result.item} is no longer in stock.`;
          case "not_found":
            return `${result.item} is not in the inventory.`;
          case "invalid":
            return `Could not remove "${command.item}".`;
        }
      }
      case "qty":
        return `${command.item}: ${this.inventory.getQty(command.item)}`;
      case "low": {
        const threshold = command.threshold ?? this.lowStockThreshold;
        const items = this.inventory.checkLowItems(threshold);
        return items.length > 0 ? `Low items: ${items.join(", ")}` : `No items below ${threshold}.`;
      }
      case "report": {
        const lines = this.inventory.report();
        return lines.length > 0 ? lines.join("; ") : "Inventory is empty.";
      }
      case "save":
        return this.inventory.save(this.dataFile)
          ? `Saved inventory to ${this.dataFile}.`
          : `Could not save inventory to ${this.dataFile}.`;
      case "load": {
        const levels = this.inventory.load(this.dataFile);
        return `Loaded ${Object.keys(levels).length} items from ${this.dataFile}.`;
      }
    }
  }
}
