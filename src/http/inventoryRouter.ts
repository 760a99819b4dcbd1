import express from "express";
import { InventoryAdapter } from "../inventory/InventoryAdapter";
import { Logger } from "../logger";
import { Processor } from "../pipeline/processor";
import { send400, send404, sendError, ErrorCode } from "./apiError";
import { commandBodySchema, itemNameSchema, lowQuerySchema, quantityBodySchema } from "./schemas";

export type InventoryRouterDeps = {
  inventory: InventoryAdapter;
  processor: Processor;
  dataFile: string;
  lowStockThreshold: number;
  logger: Logger;
};

export function inventoryRouter({ inventory, processor, dataFile, lowStockThreshold, logger }: InventoryRouterDeps) {
  const router = express.Router();

  router.get("/items", (_req, res) => {
    res.json(inventory.snapshot());
  });

  router.get("/items/:name", (req, res) => {
    const name = itemNameSchema.safeParse(req.params.name);
    if (!name.success) return send400(res, "item name is required", name.error.flatten());
    res.json({ item: name.data, quantity: inventory.getQty(name.data) });
  });

  router.post("/items/:name/add", (req, res) => {
    const name = itemNameSchema.safeParse(req.params.name);
    const body = quantityBodySchema.safeParse(req.body);
    if (!name.success) return send400(res, "item name is required", name.error.flatten());
    if (!body.success) return send400(res, "quantity must be an integer", body.error.flatten());

    const result = inventory.addItem(name.data, body.data.quantity);
    if (!result) return send400(res, `could not add ${name.data}`);
    res.status(201).json(result);
  });

  router.post("/items/:name/remove", (req, res) => {
    const name = itemNameSchema.safeParse(req.params.name);
    const body = quantityBodySchema.safeParse(req.body);
    if (!name.success) return send400(res, "item name is required", name.error.flatten());
    if (!body.success) return send400(res, "quantity must be an integer", body.error.flatten());

    const result = inventory.removeItem(name.data, body.data.quantity);
    if (result.status === "not_found") return send404(res, `item '${name.data}'`);
    if (result.status === "invalid") return send400(res, `could not remove ${name.data}`);
    res.json(result);
  });

  router.get("/low", (req, res) => {
    const query = lowQuerySchema.safeParse(req.query);
    if (!query.success) return send400(res, "threshold must be an integer", query.error.flatten());
    const threshold = query.data.threshold ?? lowStockThreshold;
    res.json({ threshold, items: inventory.checkLowItems(threshold) });
  });

  router.get("/report", (_req, res) => {
    res.json({ lines: inventory.report() });
  });

  router.post("/save", (_req, res) => {
    if (!inventory.save(dataFile)) {
      return sendError(res, 500, `could not save inventory to ${dataFile}`, ErrorCode.INTERNAL_ERROR);
    }
    res.json({ saved: true, file: dataFile });
  });

  router.post("/load", (_req, res) => {
    const levels = inventory.load(dataFile);
    logger.debug(`Reloaded ${Object.keys(levels).length} items over HTTP`);
    res.json({ loaded: Object.keys(levels).length, file: dataFile });
  });

  router.post("/command", (req, res) => {
    const body = commandBodySchema.safeParse(req.body);
    if (!body.success) return send400(res, "text is required", body.error.flatten());
    res.json({ reply: processor.handleIncomingText(body.data.text) });
  });

  return router;
}
