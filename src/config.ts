import dotenv from "dotenv";
import { isLogLevel, LogLevel } from "./logger";
dotenv.config();

export type AppConfig = {
  port: number;
  dataFile: string;
  lowStockThreshold: number;
  logLevel: LogLevel;
  saveOnExit: boolean;
};

export const DEFAULT_DATA_FILE = "inventory.json";
export const DEFAULT_LOW_STOCK_THRESHOLD = 5;

function intOr(value: string | undefined, fallback: number) {
  const n = Number(value);
  return value && Number.isInteger(n) ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.LOG_LEVEL || "info").toLowerCase();
  return {
    port: intOr(env.PORT, 3000),
    dataFile: env.INVENTORY_FILE || DEFAULT_DATA_FILE,
    lowStockThreshold: intOr(env.LOW_STOCK_THRESHOLD, DEFAULT_LOW_STOCK_THRESHOLD),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    saveOnExit: !["false", "0", "no"].includes((env.SAVE_ON_EXIT || "true").toLowerCase())
  };
}

export const config = loadConfig();
