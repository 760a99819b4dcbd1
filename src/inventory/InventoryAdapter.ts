import { AddResult, RemoveResult, StockLevels } from "../types";

export interface InventoryAdapter {
  addItem(item: string, qty: number): AddResult | null;
  removeItem(item: string, qty: number): RemoveResult;
  getQty(item: string): number;
  checkLowItems(threshold?: number): string[];
  report(): string[];
  snapshot(): StockLevels;
  replace(levels: StockLevels): void;
  load(fileName?: string): StockLevels;
  save(fileName?: string): boolean;
}
