/** Item name → quantity, as persisted and as returned by snapshots. */
export type StockLevels = Record<string, number>;

export type AddResult = {
  item: string;
  added: number;
  quantity: number;
  entry: string;
};

export type RemoveResult =
  | { status: "decreased"; item: string; quantity: number }
  | { status: "removed"; item: string }
  | { status: "not_found"; item: string }
  | { status: "invalid" };

export type ParsedCommand =
  | { kind: "add"; item: string; quantity: number }
  | { kind: "remove"; item: string; quantity: number }
  | { kind: "qty"; item: string }
  | { kind: "low"; threshold: number | null }
  | { kind: "report" }
  | { kind: "save" }
  | { kind: "load" };
