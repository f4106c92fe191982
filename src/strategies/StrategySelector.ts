import type { CategoryStrategy } from "./CategoryStrategy";
import { BackstageStrategy } from "./categories/BackstageStrategy";
import { GenericStrategy } from "./categories/GenericStrategy";
import { ImprovingStrategy } from "./categories/ImprovingStrategy";
import { LegendaryStrategy } from "./categories/LegendaryStrategy";

export const ItemNames = {
  agedBrie: "Aged Brie",
  backstagePass: "Backstage passes to a TAFKAL80ETC concert",
  sulfuras: "Sulfuras, Hand of Ragnaros"
} as const;

export class StrategySelector {
  private readonly strategies = new Map<string, CategoryStrategy>();

  constructor(private readonly fallback: CategoryStrategy = new GenericStrategy()) {
    this.strategies.set(ItemNames.agedBrie, new ImprovingStrategy());
    this.strategies.set(ItemNames.backstagePass, new BackstageStrategy());
    this.strategies.set(ItemNames.sulfuras, new LegendaryStrategy());
  }

  // Exact, case-sensitive lookup; anything unregistered gets the fallback.
  resolve(name: string): CategoryStrategy {
    return this.strategies.get(name) ?? this.fallback;
  }

  register(name: string, strategy: CategoryStrategy): void {
    this.strategies.set(name, strategy);
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }
}
