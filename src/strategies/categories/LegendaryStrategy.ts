import type { CategoryStrategy } from "../CategoryStrategy";

export const LEGENDARY_CATEGORY = "legendary";

// Never sold, never degrades. Values outside the usual quality range are kept as-is.
export class LegendaryStrategy implements CategoryStrategy {
  readonly category = LEGENDARY_CATEGORY;

  updateQuality(): void {}

  updateDaysToSell(): void {}
}
