import { readFile } from "fs/promises";
import { inventoryFileSchema, type ItemInput } from "../types";

export class InventoryFileError extends Error {
  constructor(readonly filepath: string, cause: unknown) {
    super(`Could not load inventory file ${filepath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "InventoryFileError";
  }
}

export async function loadInventoryFile(filepath: string): Promise<ItemInput[]> {
  try {
    const data = await readFile(filepath, "utf8");
    return inventoryFileSchema.parse(JSON.parse(data));
  } catch (e) {
    throw new InventoryFileError(filepath, e);
  }
}
