import express from "express";
import { InvalidStockError, type Shop } from "../pipeline/shop";
import { itemInputSchema } from "../types";

export function inventoryRouter(shop: Shop) {
  const router = express.Router();

  router.get("/items", (_req, res) => {
    res.send({ day: shop.currentDay, items: shop.listItems() });
  });

  router.get("/items/:name", (req, res) => {
    const items = shop.findItems(req.params.name);
    if (items.length === 0) return res.status(404).send({ error: "not_found" });
    res.send({ items });
  });

  router.post("/items", (req, res, next) => {
    const parsed = itemInputSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: "invalid_item", issues: parsed.error.issues });
    }
    try {
      res.status(201).send(shop.stock(parsed.data));
    } catch (e) {
      if (e instanceof InvalidStockError) {
        return res.status(400).send({ error: "invalid_stock", message: e.message });
      }
      next(e);
    }
  });

  router.post("/tick", (_req, res) => {
    res.send(shop.advanceDay());
  });

  return router;
}
