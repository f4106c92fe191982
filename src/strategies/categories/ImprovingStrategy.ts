import type { Item } from "../../inventory/Item";
import { type CategoryStrategy, clampQuality, decreaseDaysToSell, isPastDue } from "../CategoryStrategy";

// Aged goods: gain value every day, twice as fast once past due.
export class ImprovingStrategy implements CategoryStrategy {
  readonly category = "improving";

  updateQuality(item: Item): void {
    item.quality = clampQuality(item.quality + 1);
  }

  updateDaysToSell(item: Item): void {
    decreaseDaysToSell(item);
    if (isPastDue(item)) {
      item.quality = clampQuality(item.quality + 1);
    }
  }
}
