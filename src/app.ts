import express from "express";
import bodyParser from "body-parser";
import type { Shop } from "./pipeline/shop";
import { inventoryRouter } from "./http/inventoryRouter";

export function createApp(shop: Shop) {
  const app = express();
  app.use(bodyParser.json());

  app.use("/", inventoryRouter(shop));

  app.get("/health", (_req, res) => res.send({ ok: true }));

  return app;
}
