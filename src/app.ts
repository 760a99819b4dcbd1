import express, { ErrorRequestHandler } from "express";
import bodyParser from "body-parser";
import { InventoryAdapter } from "./inventory/InventoryAdapter";
import { Logger } from "./logger";
import { Processor } from "./pipeline/processor";
import { inventoryRouter } from "./http/inventoryRouter";
import { ErrorCode, send400, sendError } from "./http/apiError";

export type AppDeps = {
  inventory: InventoryAdapter;
  dataFile: string;
  lowStockThreshold: number;
  logger: Logger;
  processor?: Processor;
};

function isMalformedBody(err: unknown) {
  return err instanceof Error && "type" in err && err.type === "entity.parse.failed";
}

export function createApp({ inventory, dataFile, lowStockThreshold, logger, processor }: AppDeps) {
  const app = express();
  app.use(bodyParser.json());

  app.get("/health", (_req, res) => res.send({ ok: true }));
  app.use(
    "/",
    inventoryRouter({
      inventory,
      processor: processor ?? new Processor(inventory, { dataFile, lowStockThreshold }),
      dataFile,
      lowStockThreshold,
      logger
    })
  );

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (isMalformedBody(err)) return send400(res, "request body is not valid JSON");
    logger.error("Unhandled request error", err);
    sendError(res, 500, "internal error", ErrorCode.INTERNAL_ERROR);
  };
  app.use(onError);

  return app;
}
