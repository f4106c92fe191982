import type { Item } from "./Item";
import type { CategoryStrategy } from "../strategies/CategoryStrategy";
import { StrategySelector } from "../strategies/StrategySelector";

export class InventoryUpdater {
  constructor(readonly items: Item[], private readonly selector: StrategySelector = new StrategySelector()) {}

  /** Advances every item by one day, in collection order. */
  tick(): void {
    for (const item of this.items) {
      this.updateItem(item);
    }
  }

  add(item: Item): void {
    this.items.push(item);
  }

  registerStrategy(name: string, strategy: CategoryStrategy): void {
    this.selector.register(name, strategy);
  }

  strategyFor(name: string): CategoryStrategy {
    return this.selector.resolve(name);
  }

  private updateItem(item: Item): void {
    const strategy = this.selector.resolve(item.name);
    strategy.updateQuality(item);
    strategy.updateDaysToSell(item);
  }
}
