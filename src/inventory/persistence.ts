import fs from "node:fs";
import { z } from "zod";
import { DEFAULT_DATA_FILE } from "../config";
import { createLogger, Logger } from "../logger";
import { StockLevels } from "../types";

const integerText = /^\s*[+-]?\d+\s*$/;

// Values are cast to integers the lenient way: 7.9 -> 7, true -> 1, " 12 " -> 12.
export const quantitySchema = z
  .union([z.number().finite(), z.boolean(), z.string().regex(integerText, "not an integer")])
  .transform((v) => {
    if (typeof v === "boolean") return v ? 1 : 0;
    if (typeof v === "string") return Number.parseInt(v.trim(), 10);
    return Math.trunc(v);
  })
  .refine(Number.isSafeInteger, "not a safe integer");

export const stockObjectSchema = z.record(z.unknown());

function isStockObject(value: unknown): value is Record<string, unknown> {
  return stockObjectSchema.safeParse(value).success;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Reads stock levels from a JSON file. Never throws: a missing, unreadable or
 * malformed file yields `{}` and a log record. Callers decide whether to apply
 * the result to a store.
 */
export function loadData(fileName: string = DEFAULT_DATA_FILE, logger: Logger = createLogger()): StockLevels {
  let raw: string;
  try {
    raw = fs.readFileSync(fileName, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      logger.info(`${fileName} not found. Starting with empty inventory.`);
    } else {
      logger.error(`Failed to read ${fileName}. Starting with empty inventory.`, err);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    logger.error(`Failed to decode JSON in ${fileName} (${err instanceof Error ? err.message : String(err)}). Resetting inventory.`);
    return {};
  }

  if (!isStockObject(parsed)) {
    logger.warn(`${fileName} did not contain an object. Resetting inventory.`);
    return {};
  }

  // Parsed per entry: a zod record drops a "__proto__" key, Object.fromEntries keeps it.
  const entries: [string, number][] = [];
  const bad: string[] = [];
  for (const [item, value] of Object.entries(parsed)) {
    const qty = quantitySchema.safeParse(value);
    if (qty.success) entries.push([item, qty.data]);
    else bad.push(item);
  }
  if (bad.length > 0) {
    logger.error(`${fileName} holds quantities that are not integers (${bad.join(", ")}). Resetting inventory.`);
    return {};
  }
  return Object.fromEntries(entries);
}

/** Writes stock levels as pretty-printed JSON, overwriting the file. Returns false on I/O failure. */
export function saveData(levels: StockLevels, fileName: string = DEFAULT_DATA_FILE, logger: Logger = createLogger()): boolean {
  try {
    fs.writeFileSync(fileName, `${JSON.stringify(levels, null, 2)}\n`, "utf-8");
    logger.info(`Saved inventory to ${fileName}.`);
    return true;
  } catch (err) {
    logger.error(`Failed to write inventory to ${fileName}.`, err);
    return false;
  }
}
