import dotenv from "dotenv";
import path from "path";
dotenv.config();

export const config = {
  port: Number(process.env.PORT || 3000),
  inventoryFile: process.env.INVENTORY_FILE || path.resolve(process.cwd(), "data", "inventory.json"),
  logTicks: process.env.LOG_TICKS !== "false"
};
