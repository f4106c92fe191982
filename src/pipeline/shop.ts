import { Item } from "../inventory/Item";
import type { InventoryUpdater } from "../inventory/InventoryUpdater";
import { MAX_QUALITY, MIN_QUALITY } from "../strategies/CategoryStrategy";
import { LEGENDARY_CATEGORY } from "../strategies/categories/LegendaryStrategy";
import type { DayReport, ItemInput, ItemSnapshot } from "../types";

export class InvalidStockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStockError";
  }
}

function snapshot(item: Item): ItemSnapshot {
  return { name: item.name, daysToSell: item.daysToSell, quality: item.quality };
}

export class Shop {
  private day = 0;

  constructor(private updater: InventoryUpdater, private options: { logTicks: boolean } = { logTicks: true }) {}

  get currentDay() {
    return this.day;
  }

  stock(input: ItemInput): ItemSnapshot {
    const strategy = this.updater.strategyFor(input.name);
    const outOfRange = input.quality < MIN_QUALITY || input.quality > MAX_QUALITY;
    if (outOfRange && strategy.category !== LEGENDARY_CATEGORY) {
      throw new InvalidStockError(
        `Quality for "${input.name}" must be between ${MIN_QUALITY} and ${MAX_QUALITY}, got ${input.quality}`
      );
    }
    const item = new Item(input.name, input.daysToSell, input.quality);
    this.updater.add(item);
    return snapshot(item);
  }

  listItems(): ItemSnapshot[] {
    return this.updater.items.map(snapshot);
  }

  findItems(name: string): ItemSnapshot[] {
    return this.updater.items.filter(it => it.name === name).map(snapshot);
  }

  advanceDay(): DayReport {
    this.updater.tick();
    this.day += 1;
    if (this.options.logTicks) {
      console.log(`Day ${this.day}: updated ${this.updater.items.length} items`);
    }
    return { day: this.day, items: this.listItems() };
  }
}
