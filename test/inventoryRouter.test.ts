import test from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";

import { createApp } from "../src/app";
import { InventoryUpdater } from "../src/inventory/InventoryUpdater";
import { Shop } from "../src/pipeline/shop";

async function withServer(shop: Shop, fn: (baseUrl: string) => Promise<void>) {
  const server = createApp(shop).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  try {
    if (!address || typeof address === "string") throw new Error("server has no port");
    await fn(`http://127.0.0.1:${address.port}`);
  } finally {
    server.close();
    server.closeAllConnections();
    await once(server, "close");
  }
}

function shopWith(...inputs: Array<{ name: string; daysToSell: number; quality: number }>) {
  const shop = new Shop(new InventoryUpdater([]), { logTicks: false });
  for (const input of inputs) shop.stock(input);
  return shop;
}

function postJson(url: string, body: unknown) {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("[http] health check", async () => {
  await withServer(shopWith(), async baseUrl => {
    const res = await fetch(`${baseUrl}/health`);
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { ok: true });
  });
});

test("[http] lists the stock and advances one day per tick", async () => {
  const shop = shopWith({ name: "Aged Brie", daysToSell: 2, quality: 0 }, { name: "Normal Item", daysToSell: 0, quality: 10 });

  await withServer(shop, async baseUrl => {
    const before = await fetch(`${baseUrl}/items`);
    assert.deepEqual(await before.json(), {
      day: 0,
      items: [
        { name: "Aged Brie", daysToSell: 2, quality: 0 },
        { name: "Normal Item", daysToSell: 0, quality: 10 }
      ]
    });

    const tick = await postJson(`${baseUrl}/tick`, {});
    assert.equal(tick.status, 200);
    assert.deepEqual(await tick.json(), {
      day: 1,
      items: [
        { name: "Aged Brie", daysToSell: 1, quality: 1 },
        { name: "Normal Item", daysToSell: -1, quality: 8 }
      ]
    });
  });
});

test("[http] looks items up by exact name", async () => {
  const shop = shopWith({ name: "Sulfuras, Hand of Ragnaros", daysToSell: 0, quality: 80 });

  await withServer(shop, async baseUrl => {
    const found = await fetch(`${baseUrl}/items/${encodeURIComponent("Sulfuras, Hand of Ragnaros")}`);
    assert.equal(found.status, 200);
    assert.deepEqual(await found.json(), {
      items: [{ name: "Sulfuras, Hand of Ragnaros", daysToSell: 0, quality: 80 }]
    });

    const missing = await fetch(`${baseUrl}/items/${encodeURIComponent("sulfuras")}`);
    assert.equal(missing.status, 404);
    assert.deepEqual(await missing.json(), { error: "not_found" });
  });
});

test("[http] stocks a valid item", async () => {
  const shop = shopWith();

  await withServer(shop, async baseUrl => {
    const res = await postJson(`${baseUrl}/items`, { name: "Herbal Tonic", daysToSell: 5, quality: 7 });
    assert.equal(res.status, 201);
    assert.deepEqual(await res.json(), { name: "Herbal Tonic", daysToSell: 5, quality: 7 });
  });

  assert.deepEqual(shop.listItems(), [{ name: "Herbal Tonic", daysToSell: 5, quality: 7 }]);
});

test("[http] rejects a body that does not describe an item", async () => {
  const shop = shopWith();

  await withServer(shop, async baseUrl => {
    const res = await postJson(`${baseUrl}/items`, { name: "", daysToSell: "soon", quality: 3 });
    assert.equal(res.status, 400);
    const body = await res.json();
    assert.ok(typeof body === "object" && body !== null && "error" in body);
    assert.equal(body.error, "invalid_item");
  });

  assert.deepEqual(shop.listItems(), []);
});

test("[http] rejects integers beyond the safe range", async () => {
  const shop = shopWith();

  await withServer(shop, async baseUrl => {
    const res = await postJson(`${baseUrl}/items`, { name: "Normal Item", daysToSell: 1e20, quality: 10 });
    assert.equal(res.status, 400);
    const body = await res.json();
    assert.ok(typeof body === "object" && body !== null && "error" in body);
    assert.equal(body.error, "invalid_item");
  });

  assert.deepEqual(shop.listItems(), []);
});

test("[http] rejects quality outside the allowed range", async () => {
  await withServer(shopWith(), async baseUrl => {
    const res = await postJson(`${baseUrl}/items`, { name: "Normal Item", daysToSell: 5, quality: 60 });
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), {
      error: "invalid_stock",
      message: 'Quality for "Normal Item" must be between 0 and 50, got 60'
    });
  });
});
