import { createApp } from "./app";
import { config } from "./config";
import { InventoryStore } from "./inventory/InventoryStore";
import { createLogger } from "./logger";

const logger = createLogger(config.logLevel);
const inventory = new InventoryStore({ logger });
inventory.load(config.dataFile);

const app = createApp({
  inventory,
  dataFile: config.dataFile,
  lowStockThreshold: config.lowStockThreshold,
  logger
});

const server = app.listen(config.port, () => logger.info(`Server running on ${config.port}`));

function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  if (config.saveOnExit) inventory.save(config.dataFile);
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
