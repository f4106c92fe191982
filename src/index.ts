import { config } from "./config";
import { createApp } from "./app";
import { InventoryUpdater } from "./inventory/InventoryUpdater";
import { loadInventoryFile } from "./inventory/seed";
import { Shop } from "./pipeline/shop";

async function main() {
  const opening = await loadInventoryFile(config.inventoryFile);
  const shop = new Shop(new InventoryUpdater([]), { logTicks: config.logTicks });
  for (const input of opening) {
    shop.stock(input);
  }
  console.log(`Loaded ${opening.length} items from ${config.inventoryFile}`);

  const app = createApp(shop);
  app.listen(config.port, () => console.log(`Server running on ${config.port}`));
}

main().catch(e => {
  console.error("startup error", e);
  process.exit(1);
});
